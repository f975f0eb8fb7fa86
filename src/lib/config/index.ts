// Path: src/lib/config/index.ts
// Public API for configuration module

export type { SyncConfig, ConfigKey } from './types.js';
export { DEFAULT_CONFIG, CONFIG_KEYS, isConfigKey } from './types.js';

export {
  applyEnvOverrides,
  loadConfig,
  getConfigPath,
  setConfigValue,
  unsetConfigValue,
  resetConfig,
} from './loader.js';
