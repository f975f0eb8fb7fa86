// Path: src/lib/sync/context.ts
// Collaborators shared by every sync operation

import { OnePasswordClient } from '../onepassword/client.js';
import { FlyClient } from '../fly.js';
import type { SyncConfig } from '../config/types.js';
import {
  runCommand,
  runInteractive,
  splitCommandLine,
  type CommandRunner,
  type InteractiveRunner,
} from '../../utils/shell.js';

export interface SyncContext {
  op: OnePasswordClient;
  fly: FlyClient;
  /** Runner used for git */
  run: CommandRunner;
  /** Runner used for the editor */
  interactive: InteractiveRunner;
  /** Directory .env files are resolved against */
  cwd: string;
  defaultEnvFile: string;
  /** Editor argv; the file path is appended */
  editor: string[];
  now: () => Date;
}

export interface SyncContextOverrides {
  run?: CommandRunner;
  interactive?: InteractiveRunner;
  cwd?: string;
  now?: () => Date;
}

/**
 * Build the context from configuration; tests swap the runners for fakes
 */
export function createSyncContext(config: SyncConfig, overrides: SyncContextOverrides = {}): SyncContext {
  const run = overrides.run ?? runCommand;

  return {
    op: new OnePasswordClient({ bin: config.opBin, vault: config.vault, run }),
    fly: new FlyClient({ bin: config.flyBin, run }),
    run,
    interactive: overrides.interactive ?? runInteractive,
    cwd: overrides.cwd ?? process.cwd(),
    defaultEnvFile: config.defaultEnvFile,
    editor: splitCommandLine(config.editor),
    now: overrides.now ?? (() => new Date()),
  };
}
