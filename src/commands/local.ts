// Path: src/commands/local.ts
// Local .env commands

import type { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { getLocalSecrets, localStatus, pushLocalSecrets } from '../lib/sync/index.js';
import { hasChanges } from '../lib/onepassword/index.js';
import { buildContext, exitWithError, printDiff } from './common.js';
import type { LocalPushCommandOptions, LocalStatusCommandOptions } from './types.js';

export function registerLocalCommands(program: Command): void {
  const localCmd = program
    .command('local')
    .description('Manage local secrets of the current git repository')
    .addHelpText('after', `
The secure note is found by its title, which must contain "repo:<owner>/<repo>"
as read from the "origin" remote. An optional "file_name" field on the note
chooses the local file (default: .env).

Examples:
  op-env-sync local get               # Write .env from 1Password
  op-env-sync local status            # Compare .env with 1Password
  op-env-sync local push --dry-run    # Preview what push would change
  op-env-sync local push              # Add/update 1Password fields from .env
`);

  localCmd
    .command('get')
    .description('Write the secure note\'s secrets to the local env file')
    .action(() => {
      const spinner = ora('Fetching secrets from 1Password...').start();

      try {
        const result = getLocalSecrets(buildContext());
        spinner.succeed(`Successfully updated ${result.fileName} from 1Password (${result.keys.length} secret(s))`);
      } catch (err) {
        exitWithError(err, spinner, 'Failed to get secrets');
      }
    });

  localCmd
    .command('push')
    .description('Add and update secure note fields from the local env file (never deletes)')
    .option('--dry-run', 'Show what would be pushed without changing 1Password')
    .action((options: LocalPushCommandOptions) => {
      const spinner = ora('Comparing with 1Password...').start();

      try {
        const result = pushLocalSecrets(buildContext(), { dryRun: options.dryRun });
        const skippedNote = result.skipped.length > 0
          ? chalk.yellow(`Skipped ${result.skipped.join(', ')}: reserved for the note's own settings`)
          : undefined;

        if (options.dryRun === true) {
          spinner.info(`Dry run - ${result.fileName} compared with 1Password:`);
          printDiff(result.diff);
          if (skippedNote) console.log(skippedNote);
          return;
        }

        if (!result.pushed) {
          spinner.succeed(`1Password is already up to date with ${result.fileName}`);
        } else {
          spinner.succeed(`Successfully pushed secrets from ${result.fileName} to 1Password`);
        }
        printDiff(result.diff);
        if (skippedNote) console.log(skippedNote);
      } catch (err) {
        exitWithError(err, spinner, 'Failed to push secrets');
      }
    });

  localCmd
    .command('status')
    .description('Compare the local env file with the secure note')
    .option('--json', 'Output as JSON')
    .action((options: LocalStatusCommandOptions) => {
      try {
        const result = localStatus(buildContext());

        if (options.json === true) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        console.log();
        console.log(chalk.bold(`${result.fileName} vs 1Password`));
        console.log();
        printDiff(result.diff);

        if (hasChanges(result.diff)) {
          console.log();
          console.log('Run ' + chalk.cyan('op-env-sync local push') + ' to upload local changes');
        }
      } catch (err) {
        exitWithError(err);
      }
    });
}
