import { Command } from 'commander';
import { SQL_ERROR_PREFIX } from '@insights/shared';
import { parseInteger, withAgent } from '../setup.js';

export const sqlCommand = new Command('sql')
  .description('Run a read-only SELECT against the analytics database')
  .argument('<statement>', 'A single SELECT statement')
  .option('-c, --config <path>', 'Path to a config file')
  .option('-l, --limit <n>', 'Maximum rows to print', parseInteger)
  .action(async (statement: string, options: { config?: string; limit?: number }) => {
    await withAgent(options, async (agent) => {
      const output = await agent.sqlRunner.run(statement, options.limit ?? agent.config.database.rowLimit);
      if (output.startsWith(SQL_ERROR_PREFIX)) {
        console.error(output);
        process.exitCode = 1;
        return;
      }
      console.log(output);
    });
  });
