import { Command } from 'commander';
import { CONFIG_FILE_NAMES, ConfigManager } from '@insights/core';
import { maskSecret } from '../output/formatter.js';
import { reportError } from '../setup.js';

const ENV_VARS = [
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'OPENAI_BASE_URL',
  'DATABASE_URL',
  'LONG_TERM_DB_PATH',
  'SHORT_TERM_CHECKPOINT_PATH',
  'INSIGHTS_LOG_LEVEL',
];

export const configCommand = new Command('config')
  .description('Inspect configuration');

configCommand
  .command('show')
  .description('Show the resolved configuration')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    try {
      const mgr = new ConfigManager();
      const config = await mgr.load({ configPath: options.config });
      const openai = config.providers.openai;
      const shown = {
        ...config,
        providers: { openai: { ...openai, apiKey: maskSecret(openai.apiKey) } },
      };
      console.log(JSON.stringify(shown, null, 2));
    } catch (err) {
      reportError(err);
      process.exitCode = 1;
    }
  });

configCommand
  .command('path')
  .description('Show the config file in use and the search order')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: { config?: string }) => {
    try {
      const mgr = new ConfigManager();
      await mgr.load({ configPath: options.config });
      console.log(`In use: ${mgr.getSourcePath() ?? '(none, defaults and environment only)'}`);
    } catch (err) {
      reportError(err);
      process.exitCode = 1;
    }
    console.log('');
    console.log('Config files searched upward from the working directory (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
    console.log('');
    console.log('Environment variables:');
    for (const name of ENV_VARS) console.log(`  ${name}`);
  });
