import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError, QueryIntent } from '@insights/shared';
import { InsightsAgent } from '../src/agent.js';
import { SessionManager } from '../src/session-manager.js';
import { ScriptedProvider, createAnalyticsDb, makeTempDir, removeDir } from './helpers.js';

let dir: string;
let configPath: string;

beforeEach(() => {
  dir = makeTempDir();
  for (const key of ['OPENAI_API_KEY', 'OPENAI_MODEL', 'OPENAI_BASE_URL', 'DATABASE_URL', 'LONG_TERM_DB_PATH', 'SHORT_TERM_CHECKPOINT_PATH', 'INSIGHTS_LOG_LEVEL']) {
    vi.stubEnv(key, '');
  }
  const analytics = createAnalyticsDb(dir);
  configPath = path.join(dir, 'insights.config.yaml');
  fs.writeFileSync(configPath, [
    'database:',
    `  url: sqlite:///${analytics}`,
    'memory:',
    `  longTermDbPath: ${path.join(dir, 'long_term.sqlite')}`,
    `  checkpointPath: ${path.join(dir, 'checkpoints.sqlite')}`,
    '  passwordIterations: 100000',
    '',
  ].join('\n'));
});

afterEach(() => {
  vi.unstubAllEnvs();
  removeDir(dir);
});

describe('InsightsAgent', () => {
  it('runs a turn end to end and checkpoints the session', async () => {
    const provider = new ScriptedProvider([
      'SELECT week, pass_rate FROM test_runs ORDER BY week',
      '{"pass_rate": 0.82}',
      'Pass rate is trending up.',
    ]);
    const agent = await InsightsAgent.create({ configPath, provider });

    const userId = agent.credentials.provisionOrAuthenticate('dana', 'test-password');
    const session = { userId, shortTermMemory: { olderSummary: '', recentTurns: [] }, metrics: {} };
    const result = await (await agent.getOrchestrator()).handle(session, 'show me pass rate trends');

    expect(result.intent).toBe(QueryIntent.SqlAnalytic);
    expect(result.sqlResults?.split('\n')).toHaveLength(5);
    expect(agent.ledger.count(userId)).toBe(1);

    const key = SessionManager.keyFor(userId);
    agent.sessions.save(key, result.session);
    expect(agent.sessions.load(key)).toEqual(result.session);
    agent.shutdown();
  });

  it('keeps users and memories across restarts', async () => {
    const first = await InsightsAgent.create({ configPath });
    const id = first.credentials.provisionOrAuthenticate('dana', 'test-password');
    first.ledger.append(id, 'remember the login suite');
    first.shutdown();

    const second = await InsightsAgent.create({ configPath });
    expect(second.credentials.authenticate('dana', 'test-password')).toBe(id);
    expect(second.ledger.fetchRecentCandidates(id).map(e => e.text)).toEqual(['remember the login suite']);
    second.shutdown();
  });

  it('needs no API key until a conversation starts', async () => {
    const agent = await InsightsAgent.create({ configPath });

    expect(agent.credentials.listUsers()).toEqual([]);
    await expect(agent.getOrchestrator()).rejects.toThrow(ConfigError);
    agent.shutdown();
  });

  it('applies overrides to the orchestrator options', async () => {
    const agent = await InsightsAgent.create({
      configPath,
      provider: new ScriptedProvider([]),
      overrides: { memory: { recentTurns: 2 }, database: { rowLimit: 10 } },
    });

    const orchestrator = await agent.getOrchestrator();
    expect(orchestrator.options.recentTurns).toBe(2);
    expect(orchestrator.options.rowLimit).toBe(10);
    expect(await agent.getOrchestrator()).toBe(orchestrator);
    agent.shutdown();
  });

  it('refuses a provider that reports itself unavailable', async () => {
    class OfflineProvider extends ScriptedProvider {
      override async isAvailable(): Promise<boolean> {
        return false;
      }
    }
    const agent = await InsightsAgent.create({ configPath, provider: new OfflineProvider([]) });

    await expect(agent.getOrchestrator()).rejects.toThrow('Model provider "openai" is not available');
    agent.shutdown();
  });
});
