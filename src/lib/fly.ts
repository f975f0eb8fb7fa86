// Path: src/lib/fly.ts
// Thin wrapper over the Fly CLI (`fly`)

import { flyLogger as log } from './logger.js';
import { runCommand, type CommandRunner } from '../utils/shell.js';
import type { SecretSet } from './env-file.js';

export interface FlyClientOptions {
  /** fly executable (default: `fly`) */
  bin?: string;
  run?: CommandRunner;
}

export class FlyClient {
  private readonly bin: string;
  private readonly run: CommandRunner;

  constructor(options: FlyClientOptions = {}) {
    this.bin = options.bin ?? 'fly';
    this.run = options.run ?? runCommand;
  }

  /**
   * Set every secret on the app in one `fly secrets set` call.
   * Secrets already on the app but absent here are kept.
   */
  setSecrets(appName: string, secrets: SecretSet): void {
    const pairs = Object.entries(secrets).map(([key, value]) => `${key}=${value}`);
    if (pairs.length === 0) {
      return;
    }

    const output = this.run(this.bin, ['secrets', 'set', '--app', appName, ...pairs]);
    log.info({ app: appName, keys: Object.keys(secrets) }, 'Set Fly secrets');
    log.debug({ app: appName, output: output.trim() }, 'fly secrets set output');
  }
}
