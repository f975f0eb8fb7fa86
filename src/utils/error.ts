// Path: src/utils/error.ts
// Error types for note resolution, git, file and external tool failures

/**
 * Extract error message from unknown error type.
 * Safely handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

export type SyncErrorCode =
  | 'NOTE_NOT_FOUND'
  | 'NOTE_AMBIGUOUS'
  | 'GIT_REMOTE'
  | 'FILE_NOT_FOUND'
  | 'EXTERNAL_TOOL'
  | 'EMPTY_SECRETS'
  | 'INVALID_PATH'
  | 'INVALID_FORMAT'
  | 'CONFIG';

/**
 * Base class for every failure the CLI reports to the user.
 */
export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    code: SyncErrorCode,
    options?: {
      cause?: Error;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.metadata = options?.metadata;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/**
 * No secure note title contains the locator.
 */
export class NotFoundError extends SyncError {
  readonly locator: string;

  constructor(locator: string) {
    super(
      `There is no secure note in 1Password with a name containing \`${locator}\``,
      'NOTE_NOT_FOUND',
      { metadata: { locator } }
    );
    this.name = 'NotFoundError';
    this.locator = locator;
  }
}

/**
 * More than one secure note title contains the locator.
 */
export class AmbiguousError extends SyncError {
  readonly locator: string;
  readonly titles: string[];

  constructor(locator: string, titles: string[]) {
    super(
      `${titles.length} secure notes match \`${locator}\`: ${titles.map(t => `"${t}"`).join(', ')}. ` +
        'Rename them so that exactly one matches.',
      'NOTE_AMBIGUOUS',
      { metadata: { locator, titles } }
    );
    this.name = 'AmbiguousError';
    this.locator = locator;
    this.titles = titles;
  }
}

export class GitRemoteError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'GIT_REMOTE', { cause });
    this.name = 'GitRemoteError';
  }
}

export class FileNotFoundError extends SyncError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`File not found: ${filePath}`, 'FILE_NOT_FOUND', { metadata: { filePath } });
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/**
 * A child process (op, fly, git, editor) could not be started or exited non-zero.
 * Only the first two arguments are kept in the message; the rest may carry secret values.
 */
export class ExternalToolError extends SyncError {
  readonly tool: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    tool: string,
    args: string[],
    details: { exitCode: number | null; stderr: string; cause?: Error }
  ) {
    const command = [tool, ...args.slice(0, 2)].join(' ');
    const status = details.exitCode === null ? 'could not be run' : `exited with code ${details.exitCode}`;
    const stderr = details.stderr.trim();
    super(
      stderr ? `\`${command}\` ${status}: ${stderr}` : `\`${command}\` ${status}`,
      'EXTERNAL_TOOL',
      { cause: details.cause, metadata: { tool, exitCode: details.exitCode } }
    );
    this.name = 'ExternalToolError';
    this.tool = tool;
    this.exitCode = details.exitCode;
    this.stderr = stderr;
  }
}

export class EmptySecretsError extends SyncError {
  constructor(locator: string) {
    super(`Secure note \`${locator}\` holds no secrets, aborting`, 'EMPTY_SECRETS', {
      metadata: { locator },
    });
    this.name = 'EmptySecretsError';
  }
}

export class InvalidPathError extends SyncError {
  constructor(message: string) {
    super(message, 'INVALID_PATH');
    this.name = 'InvalidPathError';
  }
}

/**
 * Data that cannot be converted: unreadable `op` output, or a secret that a .env line cannot hold.
 */
export class InvalidFormatError extends SyncError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'INVALID_FORMAT', { metadata });
    this.name = 'InvalidFormatError';
  }
}

export class ConfigError extends SyncError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Check whether an error came from this tool rather than an unexpected crash.
 */
export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError;
}
