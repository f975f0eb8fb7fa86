// Path: src/lib/config/storage.ts
// Internal config storage management

import Conf from 'conf';
import { DEFAULT_CONFIG, type SyncConfig } from './types.js';

let store: Conf<SyncConfig> | null = null;

/**
 * Config directory override - read on first use to support test isolation
 */
export function getConfigDirOverride(): string | undefined {
  return process.env.OP_ENV_SYNC_CONFIG_DIR || undefined;
}

/**
 * User-level config store.
 * Uses Conf package for cross-platform user config storage; created lazily so
 * commands that never touch configuration do not create the file.
 */
export function getUserConfig(): Conf<SyncConfig> {
  if (!store) {
    store = new Conf<SyncConfig>({
      projectName: 'op-env-sync',
      cwd: getConfigDirOverride(),
      defaults: { ...DEFAULT_CONFIG },
    });
  }
  return store;
}
