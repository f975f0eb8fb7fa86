// Path: src/commands/config.ts
// Configuration commands

import type { Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_KEYS,
  getConfigPath,
  isConfigKey,
  loadConfig,
  resetConfig,
  setConfigValue,
  unsetConfigValue,
  type ConfigKey,
} from '../lib/config/index.js';
import { formatValidationResult, validateConfig, validateConfigValue } from '../lib/validation.js';
import { ConfigError } from '../utils/error.js';
import { exitWithError } from './common.js';
import type { ConfigListCommandOptions } from './types.js';

function parseKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Show or change op-env-sync settings')
    .addHelpText('after', `
Keys:
  opBin            1Password CLI executable (default: op)
  flyBin           Fly CLI executable (default: fly)
  editor           Editor command for "fly edit" (default: code --wait)
  vault            Only search this 1Password vault
  defaultEnvFile   Env file used when a note has no file_name field (default: .env)

Environment variables OP_ENV_SYNC_OP_BIN, OP_ENV_SYNC_FLY_BIN, OP_ENV_SYNC_EDITOR,
OP_ENV_SYNC_VAULT and OP_ENV_SYNC_ENV_FILE override stored values.

Examples:
  op-env-sync config list
  op-env-sync config set editor "vim"
  op-env-sync config unset vault
`);

  configCmd
    .command('list')
    .description('Show the effective configuration')
    .option('--json', 'Output as JSON')
    .action((options: ConfigListCommandOptions) => {
      try {
        const config = loadConfig();

        if (options.json === true) {
          console.log(JSON.stringify({ path: getConfigPath(), config }, null, 2));
          return;
        }

        console.log();
        console.log(chalk.bold('Configuration'), chalk.gray(getConfigPath()));
        console.log();
        for (const key of CONFIG_KEYS) {
          const value = config[key];
          console.log(`  ${key.padEnd(16)} ${value === undefined ? chalk.gray('(not set)') : value}`);
        }
        console.log();
        console.log(formatValidationResult(validateConfig(config)));
      } catch (err) {
        exitWithError(err);
      }
    });

  configCmd
    .command('get <key>')
    .description('Print one effective value')
    .action((key: string) => {
      try {
        const value = loadConfig()[parseKey(key)];
        if (value !== undefined) {
          console.log(value);
        }
      } catch (err) {
        exitWithError(err);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Store a value')
    .action((key: string, value: string) => {
      try {
        const configKey = parseKey(key);
        setConfigValue(configKey, value);

        const { warnings } = validateConfigValue(configKey, value);
        for (const warning of warnings) {
          console.log(chalk.yellow(`⚠ ${warning.message}`) + (warning.suggestion ? ` (${warning.suggestion})` : ''));
        }
        console.log(chalk.green('✓') + ` ${configKey} = ${value}`);
      } catch (err) {
        exitWithError(err);
      }
    });

  configCmd
    .command('unset <key>')
    .description('Remove a stored value so the default applies')
    .action((key: string) => {
      try {
        const configKey = parseKey(key);
        unsetConfigValue(configKey);
        console.log(chalk.green('✓') + ` ${configKey} reset to default`);
      } catch (err) {
        exitWithError(err);
      }
    });

  configCmd
    .command('reset')
    .description('Restore every default')
    .action(() => {
      resetConfig();
      console.log(chalk.green('✓') + ' Configuration reset');
    });
}
