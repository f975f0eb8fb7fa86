// Path: src/lib/config/types.ts
// Type definitions for op-env-sync configuration

/**
 * User configuration
 */
export interface SyncConfig {
  /** 1Password CLI executable */
  opBin: string;
  /** Fly CLI executable */
  flyBin: string;
  /** Command line of the editor used by `fly edit` (must block until closed) */
  editor: string;
  /** Restrict note lookups to one 1Password vault */
  vault?: string;
  /** Local file used when a note has no `file_name` field */
  defaultEnvFile: string;
}

export type ConfigKey = keyof SyncConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = ['opBin', 'flyBin', 'editor', 'vault', 'defaultEnvFile'];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: SyncConfig = {
  opBin: 'op',
  flyBin: 'fly',
  editor: 'code --wait',
  defaultEnvFile: '.env',
};

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key);
}
