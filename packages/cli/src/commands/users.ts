import { Command } from 'commander';
import { formatUsers } from '../output/formatter.js';
import { withAgent } from '../setup.js';

interface CredentialOptions {
  config?: string;
  username: string;
  password: string;
}

export const usersCommand = new Command('users')
  .description('Manage user identities');

usersCommand
  .command('create')
  .description('Register a new user')
  .option('-c, --config <path>', 'Path to a config file')
  .requiredOption('-u, --username <username>', 'Username')
  .requiredOption('-p, --password <password>', 'Password')
  .action(async (options: CredentialOptions) => {
    await withAgent(options, (agent) => {
      const id = agent.credentials.register(options.username, options.password);
      console.log('User created:');
      console.log(`  ID:       ${id}`);
      console.log(`  Username: ${options.username.trim()}`);
    });
  });

usersCommand
  .command('list')
  .description('List all users')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    await withAgent(options, (agent) => {
      console.log(formatUsers(agent.credentials.listUsers()));
    });
  });

usersCommand
  .command('verify')
  .description('Check a username and password')
  .option('-c, --config <path>', 'Path to a config file')
  .requiredOption('-u, --username <username>', 'Username')
  .requiredOption('-p, --password <password>', 'Password')
  .action(async (options: CredentialOptions) => {
    await withAgent(options, (agent) => {
      const id = agent.credentials.authenticate(options.username, options.password);
      if (id === null) {
        console.log('Invalid username or password.');
        process.exitCode = 1;
        return;
      }
      console.log(`Verified: user ${id}`);
    });
  });
