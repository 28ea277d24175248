import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ModelProvider } from '@insights/models';
import { initializeLongTermStore, openDatabase, type LongTermStore } from '@insights/store';
import type { ModelRequest, ModelResponse } from '@insights/shared';

/** Replies in order; an Error entry is thrown instead of returned. */
export class ScriptedProvider extends ModelProvider {
  readonly name = 'openai' as const;
  readonly requests: ModelRequest[] = [];

  constructor(private replies: Array<string | Error>) {
    super();
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('No scripted reply left');
    if (next instanceof Error) throw next;
    return {
      model: request.model,
      provider: 'openai',
      content: next,
      tokenUsage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      latencyMs: 1,
      costUsd: 0.001,
      finishReason: 'stop',
    };
  }
}

export function memoryStore(): LongTermStore {
  return initializeLongTermStore(':memory:');
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'insights-core-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Analytics fixture: weekly pass rates for three weeks. */
export function createAnalyticsDb(dir: string): string {
  const dbPath = path.join(dir, 'analytics.db');
  const db = openDatabase({ dbPath });
  db.exec(`
    CREATE TABLE test_runs (week TEXT NOT NULL, suite TEXT, pass_rate REAL);
    INSERT INTO test_runs VALUES ('2024-W01', 'login', 0.78);
    INSERT INTO test_runs VALUES ('2024-W02', NULL, 0.8);
    INSERT INTO test_runs VALUES ('2024-W03', 'search', 0.82);
  `);
  db.close();
  return dbPath;
}

export const daysAgo = (now: Date, days: number): string =>
  new Date(now.getTime() - days * 86_400_000).toISOString();
