// Path: src/commands/common.ts
// Helpers shared by the command handlers

import chalk from 'chalk';
import type { Ora } from 'ora';
import { loadConfig } from '../lib/config/index.js';
import { createSyncContext, type SyncContext } from '../lib/sync/index.js';
import type { SecretDiff } from '../lib/onepassword/index.js';
import { extractErrorMessage, isSyncError } from '../utils/error.js';
import { logger } from '../lib/logger.js';

export function buildContext(): SyncContext {
  return createSyncContext(loadConfig());
}

/**
 * Report a failure on stderr and exit non-zero
 */
export function exitWithError(err: unknown, spinner?: Ora, failText?: string): never {
  if (spinner) {
    spinner.fail(failText);
  }
  if (!isSyncError(err)) {
    logger.error({ err }, 'Unexpected failure');
  }
  console.error(chalk.red('Error:'), extractErrorMessage(err));
  process.exit(1);
}

/**
 * Render a diff as one line per key, values omitted
 */
export function formatDiff(diff: SecretDiff): string[] {
  const lines: string[] = [];

  for (const key of diff.added) {
    lines.push(`  ${chalk.green('+')} ${key}`);
  }
  for (const key of diff.changed) {
    lines.push(`  ${chalk.yellow('~')} ${key}`);
  }
  for (const key of diff.remoteOnly) {
    lines.push(`  ${chalk.gray('=')} ${key} ${chalk.gray('(only in 1Password, kept)')}`);
  }

  return lines;
}

export function printDiff(diff: SecretDiff): void {
  for (const line of formatDiff(diff)) {
    console.log(line);
  }
  console.log(
    chalk.gray(
      `Added: ${diff.added.length}, Changed: ${diff.changed.length}, ` +
        `Unchanged: ${diff.unchanged.length}, Only in 1Password: ${diff.remoteOnly.length}`
    )
  );
}
