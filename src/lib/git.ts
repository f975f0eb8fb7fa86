// Path: src/lib/git.ts
// Repository name lookup from the git `origin` remote

import { gitLogger as log } from './logger.js';
import { runCommand, type CommandRunner } from '../utils/shell.js';
import { ExternalToolError, GitRemoteError } from '../utils/error.js';

// https://host/owner/repo.git, git@host:owner/repo.git, git://host/owner/repo.git
const GIT_REPOSITORY_REGEX = /^(https|git)(:\/\/|@)([^/:]+)[/:]([^/:]+)\/(.+)\.git$/;

/**
 * Extract `<owner>/<repo>` from a remote URL.
 *
 * @throws GitRemoteError if the URL does not have the expected shape
 */
export function parseRepositoryName(remoteUrl: string): string {
  const match = GIT_REPOSITORY_REGEX.exec(remoteUrl.trim());

  if (!match) {
    throw new GitRemoteError(`Could not get repository name from remote "origin" url: ${remoteUrl.trim()}`);
  }

  return `${match[4]}/${match[5]}`;
}

/**
 * Read the `origin` remote of the repository in `cwd` and return `<owner>/<repo>`.
 *
 * @throws GitRemoteError if not in a git repository, no origin is set, or the URL is malformed
 */
export function getRepositoryName(run: CommandRunner = runCommand, cwd?: string): string {
  let remoteUrl: string;

  try {
    remoteUrl = run('git', ['config', '--get', 'remote.origin.url'], { cwd });
  } catch (err) {
    if (err instanceof ExternalToolError) {
      throw new GitRemoteError('Either not in a git repository or remote "origin" is not set', err);
    }
    throw err;
  }

  const repository = parseRepositoryName(remoteUrl);
  log.debug({ repository }, 'Resolved repository from origin remote');
  return repository;
}

/**
 * Locator of the secure note backing a repository's local .env file
 */
export function repoLocator(repository: string): string {
  return `repo:${repository}`;
}

/**
 * Locator of the secure note backing a Fly application's secrets
 */
export function flyLocator(appName: string): string {
  return `fly:${appName}`;
}
