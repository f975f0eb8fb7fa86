// Path: src/lib/sync/local.ts
// `local get|push|status`: secure note <-> .env file of the current repository

import { syncLogger as log } from '../logger.js';
import { getRepositoryName, repoLocator } from '../git.js';
import { parseEnv, serializeEnv, type SecretSet } from '../env-file.js';
import { resolveNote } from '../onepassword/resolver.js';
import {
  diffSecrets,
  getFileName,
  hasChanges,
  pullFields,
  pushFields,
  reservedKeys,
  type SecretDiff,
} from '../onepassword/fields.js';
import type { SecureNote } from '../onepassword/types.js';
import { writeAtomic, readFileIfExists } from '../../utils/file.js';
import { safeJoinPath } from '../../utils/path.js';
import { EmptySecretsError, FileNotFoundError } from '../../utils/error.js';
import type { SyncContext } from './context.js';

export interface LocalTarget {
  locator: string;
  note: SecureNote;
  /** File name as configured on the note (or the default) */
  fileName: string;
  /** Absolute path inside the working directory */
  filePath: string;
}

export interface GetResult {
  fileName: string;
  filePath: string;
  keys: string[];
}

export interface PushResult {
  fileName: string;
  diff: SecretDiff;
  /** False when nothing differed or on a dry run */
  pushed: boolean;
  /** Local keys naming note metadata fields, never pushed */
  skipped: string[];
}

/**
 * Resolve the note for the repository in `ctx.cwd` and where its file lives
 */
export function resolveLocalTarget(ctx: SyncContext): LocalTarget {
  const locator = repoLocator(getRepositoryName(ctx.run, ctx.cwd));
  const note = resolveNote(ctx.op, locator);
  const fileName = getFileName(note) ?? ctx.defaultEnvFile;

  return {
    locator,
    note,
    fileName,
    filePath: safeJoinPath(ctx.cwd, fileName),
  };
}

function readLocalSecrets(target: LocalTarget): SecretSet {
  const content = readFileIfExists(target.filePath);
  if (content === null) {
    throw new FileNotFoundError(target.fileName);
  }
  return parseEnv(content);
}

/**
 * Write the note's secrets to the repository's env file.
 * A note without secret fields leaves the file untouched.
 */
export function getLocalSecrets(ctx: SyncContext): GetResult {
  const target = resolveLocalTarget(ctx);
  const secrets = pullFields(target.note);

  if (Object.keys(secrets).length === 0) {
    throw new EmptySecretsError(target.locator);
  }

  writeAtomic(target.filePath, serializeEnv(secrets), { mode: 0o600 });
  log.info({ locator: target.locator, filePath: target.filePath, keys: Object.keys(secrets) }, 'Env file written');

  return { fileName: target.fileName, filePath: target.filePath, keys: Object.keys(secrets) };
}

/**
 * Push the env file to the note: added and changed keys are written,
 * keys only present in 1Password are kept.
 */
export function pushLocalSecrets(ctx: SyncContext, options: { dryRun?: boolean } = {}): PushResult {
  const target = resolveLocalTarget(ctx);
  const local = readLocalSecrets(target);

  const diff = pushFields(ctx.op, target.note, local, {
    stamp: 'last edited at',
    now: ctx.now(),
    dryRun: options.dryRun,
  });

  return {
    fileName: target.fileName,
    diff,
    pushed: !options.dryRun && hasChanges(diff),
    skipped: reservedKeys(local),
  };
}

/**
 * Compare the env file with the note without writing anything
 */
export function localStatus(ctx: SyncContext): { fileName: string; diff: SecretDiff } {
  const target = resolveLocalTarget(ctx);
  const local = readLocalSecrets(target);
  return { fileName: target.fileName, diff: diffSecrets(local, pullFields(target.note)) };
}
