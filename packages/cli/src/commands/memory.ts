import { Command } from 'commander';
import { AuthenticationError } from '@insights/shared';
import { formatMemoryHits } from '../output/formatter.js';
import { parseInteger, parseScore, withAgent } from '../setup.js';

interface SearchOptions {
  config?: string;
  username: string;
  password: string;
  k?: number;
  minScore?: number;
}

export const memoryCommand = new Command('memory')
  .description('Inspect long-term memory');

memoryCommand
  .command('search')
  .description('Rank a user\'s stored memories against a query')
  .argument('<query>', 'Search text')
  .option('-c, --config <path>', 'Path to a config file')
  .requiredOption('-u, --username <username>', 'Username')
  .requiredOption('-p, --password <password>', 'Password')
  .option('-k, --k <n>', 'Maximum number of hits', parseInteger)
  .option('--min-score <score>', 'Minimum lexical score', parseScore)
  .action(async (query: string, options: SearchOptions) => {
    await withAgent(options, (agent) => {
      const userId = agent.credentials.authenticate(options.username, options.password);
      if (userId === null) {
        throw new AuthenticationError(options.username);
      }
      const hits = agent.ranker.rank(userId, query, {
        k: options.k,
        minScore: options.minScore,
      });
      console.log(formatMemoryHits(hits));
    });
  });

memoryCommand
  .command('stats')
  .description('Show stored memory counts per user')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    await withAgent(options, (agent) => {
      const users = agent.credentials.listUsers();
      if (users.length === 0) {
        console.log('No users found.');
        return;
      }
      let total = 0;
      for (const user of users) {
        const count = agent.ledger.count(user.id);
        total += count;
        console.log(`  ${user.username.padEnd(20)} ${count}`);
      }
      console.log(`  ${'total'.padEnd(20)} ${total}`);
    });
  });
