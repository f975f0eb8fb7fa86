// Path: src/commands/fly.ts
// Fly.io secret commands

import type { Command } from 'commander';
import inquirer from 'inquirer';
import ora from 'ora';
import chalk from 'chalk';
import { editFlySecrets, importToFly, type SyncContext } from '../lib/sync/index.js';
import { buildContext, exitWithError, printDiff } from './common.js';
import type { FlyEditCommandOptions } from './types.js';

function runImport(ctx: SyncContext, appName: string): void {
  const spinner = ora(`Importing secrets to Fly app ${appName}...`).start();

  try {
    const result = importToFly(ctx, appName);
    spinner.succeed(`Imported ${result.keys.length} secret(s) to Fly app ${chalk.cyan(appName)}`);
  } catch (err) {
    exitWithError(err, spinner, `Failed to import secrets to ${appName}`);
  }
}

export function registerFlyCommands(program: Command): void {
  const flyCmd = program
    .command('fly')
    .description('Manage Fly.io application secrets')
    .addHelpText('after', `
The secure note is found by its title, which must contain "fly:<app-name>".

Examples:
  op-env-sync fly import myapp        # Set the note's secrets on app "myapp"
  op-env-sync fly edit myapp          # Edit the note, then optionally import
  op-env-sync fly edit myapp --yes    # Edit and import without asking
`);

  flyCmd
    .command('import <app-name>')
    .description('Set every secret of the secure note on the Fly app')
    .action((appName: string) => {
      let ctx: SyncContext;
      try {
        ctx = buildContext();
      } catch (err) {
        exitWithError(err);
      }
      runImport(ctx, appName);
    });

  flyCmd
    .command('edit <app-name>')
    .description('Edit the secure note in your editor and push the changes')
    .option('-y, --yes', 'Import to Fly after editing without asking')
    .option('--no-import', 'Never import to Fly after editing')
    .action(async (appName: string, options: FlyEditCommandOptions) => {
      let ctx: SyncContext;

      try {
        ctx = buildContext();
        console.log(chalk.gray('Waiting for the editor to close...'));
        const result = editFlySecrets(ctx, appName);

        if (!result.changed) {
          console.log('No changes detected, aborting.');
          if (result.diff.remoteOnly.length > 0) {
            console.log(chalk.yellow('Removed keys are kept in 1Password; delete them there explicitly.'));
          }
          return;
        }

        console.log(chalk.green('✓') + ' Secrets updated in 1Password');
        printDiff(result.diff);
      } catch (err) {
        exitWithError(err);
      }

      if (options.import === false) {
        return;
      }

      let confirm = options.yes === true;
      if (!confirm) {
        const answers = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: `Do you wish to import secrets to the Fly app ${appName}?`,
            default: false,
          },
        ]);
        confirm = answers.confirm;
      }

      if (confirm) {
        runImport(ctx, appName);
      }
    });
}
