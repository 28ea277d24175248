import { Command } from 'commander';
import { chatCommand } from './commands/chat.js';
import { usersCommand } from './commands/users.js';
import { memoryCommand } from './commands/memory.js';
import { sqlCommand } from './commands/sql.js';
import { configCommand } from './commands/config.js';

export const program = new Command();

program
  .name('insights')
  .description('Conversational analytics assistant')
  .version('0.1.0');

program.addCommand(chatCommand);
program.addCommand(usersCommand);
program.addCommand(memoryCommand);
program.addCommand(sqlCommand);
program.addCommand(configCommand);

export * from './output/formatter.js';
