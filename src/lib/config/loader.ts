// Path: src/lib/config/loader.ts
// Configuration loading, environment overrides and saving

import { configLogger as log } from '../logger.js';
import { DEFAULT_CONFIG, type ConfigKey, type SyncConfig } from './types.js';
import { getUserConfig } from './storage.js';
import { validateConfigValue } from '../validation.js';
import { ConfigError } from '../../utils/error.js';

/**
 * Apply environment variable overrides on top of a stored config.
 *
 * Environment variables:
 * - OP_ENV_SYNC_OP_BIN: 1Password CLI executable
 * - OP_ENV_SYNC_FLY_BIN: Fly CLI executable
 * - OP_ENV_SYNC_EDITOR: editor command line (falls back to VISUAL, then EDITOR)
 * - OP_ENV_SYNC_VAULT: 1Password vault to search
 * - OP_ENV_SYNC_ENV_FILE: default local env file
 */
export function applyEnvOverrides(config: SyncConfig, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const result: SyncConfig = { ...config };

  if (env.OP_ENV_SYNC_OP_BIN) {
    result.opBin = env.OP_ENV_SYNC_OP_BIN;
  }
  if (env.OP_ENV_SYNC_FLY_BIN) {
    result.flyBin = env.OP_ENV_SYNC_FLY_BIN;
  }
  const editor = env.OP_ENV_SYNC_EDITOR || env.VISUAL || env.EDITOR;
  if (editor) {
    result.editor = editor;
  }
  if (env.OP_ENV_SYNC_VAULT) {
    result.vault = env.OP_ENV_SYNC_VAULT;
  }
  if (env.OP_ENV_SYNC_ENV_FILE) {
    result.defaultEnvFile = env.OP_ENV_SYNC_ENV_FILE;
  }

  return result;
}

/**
 * Load the user config merged with defaults and environment overrides
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const userConfig = getUserConfig();
  const config = applyEnvOverrides({ ...DEFAULT_CONFIG, ...userConfig.store }, env);
  log.debug({ path: userConfig.path }, 'Loaded user config');
  return config;
}

/**
 * Path of the user config file
 */
export function getConfigPath(): string {
  return getUserConfig().path;
}

/**
 * Set a specific config value after validating it
 *
 * @throws ConfigError if the value is rejected
 */
export function setConfigValue(key: ConfigKey, value: string): void {
  const result = validateConfigValue(key, value);
  if (!result.valid) {
    throw new ConfigError(result.errors.map(e => `${e.field}: ${e.message}`).join('; '));
  }

  getUserConfig().set(key, value);
  log.debug({ key }, 'Config value saved');
}

/**
 * Remove a stored value so the default applies again
 */
export function unsetConfigValue(key: ConfigKey): void {
  getUserConfig().delete(key);
  log.debug({ key }, 'Config value removed');
}

/**
 * Restore every default
 */
export function resetConfig(): void {
  getUserConfig().clear();
  log.debug('Config reset to defaults');
}
