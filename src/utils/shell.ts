// Path: src/utils/shell.ts
// Child process execution for op, fly, git and the editor - no shell invocation

import { execFileSync, spawnSync } from 'node:child_process';
import { ExternalToolError } from './error.js';

export interface RunOptions {
  /** Data written to the child's stdin */
  input?: string;
  /** Working directory for the child */
  cwd?: string;
}

/**
 * Runs a command to completion and returns its stdout.
 * Throws ExternalToolError on spawn failure or non-zero exit.
 */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => string;

/**
 * Runs a command attached to the user's terminal and waits for it to exit.
 */
export type InteractiveRunner = (command: string, args: string[]) => void;

function exitCodeOf(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return null;
}

function stderrOf(err: Error): string {
  if ('stderr' in err) {
    if (typeof err.stderr === 'string') return err.stderr;
    if (Buffer.isBuffer(err.stderr)) return err.stderr.toString('utf-8');
  }
  return err.message;
}

/**
 * Safely run a command using execFileSync (no shell invocation).
 * Arguments are passed as-is, so secret values never go through shell parsing.
 *
 * @param command - Executable name or path
 * @param args - Argument vector
 * @param options - stdin input and working directory
 * @returns stdout decoded as UTF-8
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  try {
    return execFileSync(command, args, {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      input: options.input,
      cwd: options.cwd,
    });
  } catch (err) {
    if (err instanceof Error) {
      throw new ExternalToolError(command, args, {
        exitCode: exitCodeOf(err),
        stderr: stderrOf(err),
        cause: err,
      });
    }
    throw err;
  }
};

/**
 * Run a command with inherited stdio (editors, prompts) and wait for it.
 *
 * @param command - Executable name or path
 * @param args - Argument vector
 */
export const runInteractive: InteractiveRunner = (command, args) => {
  const result = spawnSync(command, args, { stdio: 'inherit' });

  if (result.error) {
    throw new ExternalToolError(command, args, {
      exitCode: null,
      stderr: result.error.message,
      cause: result.error,
    });
  }
  if (result.status !== 0) {
    throw new ExternalToolError(command, args, {
      exitCode: result.status,
      stderr: result.signal ? `terminated by ${result.signal}` : '',
    });
  }
};

/**
 * Split a configured command line such as `code --wait` into argv.
 * Single and double quotes group words; there is no escaping.
 *
 * @param line - Command line
 * @returns Argument vector (empty for a blank line)
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(line)) !== null) {
    words.push(match[1] ?? match[2] ?? match[3] ?? '');
  }

  return words;
}
