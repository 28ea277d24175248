import { Command } from 'commander';
import * as readline from 'node:readline';
import { EXIT_KEYWORDS, isLevelEnabled, type ConversationSession } from '@insights/shared';
import {
  SessionManager,
  createSession,
  setOlderSummary,
  summarizeTrace,
  type InsightsAgent,
} from '@insights/core';
import {
  formatCheckpoints,
  formatHistory,
  formatMetrics,
  formatUsage,
} from '../output/formatter.js';
import { ask, reportError, withAgent } from '../setup.js';

interface ChatOptions {
  config?: string;
  resume?: boolean;
  anonymous?: boolean;
  username?: string;
  trace?: boolean;
  list?: boolean;
}

export const chatCommand = new Command('chat')
  .description('Interactive analytics chat')
  .option('-c, --config <path>', 'Path to a config file')
  .option('-r, --resume', 'Resume from the last saved checkpoint')
  .option('--anonymous', 'Chat without an identity; nothing is written to long-term memory')
  .option('-u, --username <username>', 'Username (prompted when omitted)')
  .option('--trace', 'Print a trace summary after every turn')
  .option('--list', 'List saved checkpoints')
  .action(async (options: ChatOptions) => {
    await withAgent(options, async (agent) => {
      if (options.list) {
        console.log(formatCheckpoints(agent.sessions.list()));
        return;
      }
      await runChat(agent, options);
    });
  });

async function signIn(agent: InsightsAgent, options: ChatOptions): Promise<number | null> {
  if (options.anonymous) return null;
  const username = options.username ?? (await ask('Username: '));
  const password = await ask('Password: ', { muted: true });
  return agent.credentials.provisionOrAuthenticate(username, password);
}

async function runChat(agent: InsightsAgent, options: ChatOptions): Promise<void> {
  const userId = await signIn(agent, options);
  // Fails here, before the loop, when no API key is configured
  const orchestrator = await agent.getOrchestrator();
  const key = SessionManager.keyFor(userId);
  const level = agent.config.logging.level;
  const showTrace = options.trace === true || isLevelEnabled(level, 'debug');
  const showUsage = isLevelEnabled(level, 'info');

  let session: ConversationSession = createSession(userId);
  if (options.resume) {
    const saved = agent.sessions.load(key);
    if (saved && saved.userId === userId) {
      session = saved;
      console.log(`Resumed with ${session.shortTermMemory.recentTurns.length} turns`);
    } else {
      console.log('No checkpoint found; starting a new session.');
    }
  }

  console.log('Insights Chat');
  console.log(userId === null ? 'Signed in anonymously' : `Signed in as user ${userId}`);
  console.log('Commands: /metrics, /history, /summary <text>, /save, /quit');
  console.log('');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'insights> ',
  });
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();

    if (!input) {
      rl.prompt();
      continue;
    }

    if (input === '/quit' || EXIT_KEYWORDS.has(input.toLowerCase())) {
      agent.sessions.save(key, session);
      break;
    }

    if (input === '/metrics') {
      console.log(formatMetrics(session.metrics));
    } else if (input === '/history') {
      console.log(formatHistory(session.shortTermMemory.olderSummary, session.shortTermMemory.recentTurns));
    } else if (input === '/summary' || input.startsWith('/summary ')) {
      session = setOlderSummary(session, input.slice('/summary'.length).trim());
      console.log(session.shortTermMemory.olderSummary ? 'Summary updated.' : 'Summary cleared.');
    } else if (input === '/save') {
      agent.sessions.save(key, session);
      console.log(`Session saved: ${key}`);
    } else {
      try {
        const result = await orchestrator.handle(session, input);
        session = result.session;
        console.log('');
        console.log(result.answer);
        console.log('');
        if (showUsage) console.log(formatUsage(result.usage));
        agent.sessions.save(key, session);
      } catch (err) {
        reportError(err);
      }
      const trace = orchestrator.lastTrace();
      if (showTrace && trace) {
        console.log(summarizeTrace(trace));
      }
    }

    rl.prompt();
  }

  rl.close();
}
