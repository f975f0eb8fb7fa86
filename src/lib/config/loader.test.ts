// Path: src/lib/config/loader.test.ts
// Unit tests for configuration loading and saving

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG } from './types.js';
import { ConfigError } from '../../utils/error.js';

const configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'op-env-sync-config-test-'));
process.env.OP_ENV_SYNC_CONFIG_DIR = configDir;

// Import after pointing the store at the temp dir
const { applyEnvOverrides, getConfigPath, loadConfig, resetConfig, setConfigValue, unsetConfigValue } =
  await import('./loader.js');

describe('applyEnvOverrides', () => {
  it('should keep the config when no variables are set', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('should apply every override', () => {
    const result = applyEnvOverrides(DEFAULT_CONFIG, {
      OP_ENV_SYNC_OP_BIN: '/opt/op',
      OP_ENV_SYNC_FLY_BIN: 'flyctl',
      OP_ENV_SYNC_EDITOR: 'nano',
      OP_ENV_SYNC_VAULT: 'Dev',
      OP_ENV_SYNC_ENV_FILE: '.env.local',
    });

    expect(result).toEqual({
      opBin: '/opt/op',
      flyBin: 'flyctl',
      editor: 'nano',
      vault: 'Dev',
      defaultEnvFile: '.env.local',
    });
  });

  it('should fall back to VISUAL then EDITOR', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, { EDITOR: 'vi' }).editor).toBe('vi');
    expect(applyEnvOverrides(DEFAULT_CONFIG, { EDITOR: 'vi', VISUAL: 'emacs' }).editor).toBe('emacs');
    expect(applyEnvOverrides(DEFAULT_CONFIG, { OP_ENV_SYNC_EDITOR: 'nano', VISUAL: 'emacs' }).editor).toBe('nano');
  });

  it('should not mutate its input', () => {
    const config = { ...DEFAULT_CONFIG };
    applyEnvOverrides(config, { OP_ENV_SYNC_OP_BIN: 'x' });
    expect(config.opBin).toBe('op');
  });
});

describe('stored configuration', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterAll(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  beforeAll(() => {
    expect(getConfigPath().startsWith(configDir)).toBe(true);
  });

  it('should load defaults from an empty store', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should persist values', () => {
    setConfigValue('vault', 'Engineering');
    setConfigValue('defaultEnvFile', '.env.development');

    expect(loadConfig({})).toEqual({ ...DEFAULT_CONFIG, vault: 'Engineering', defaultEnvFile: '.env.development' });
  });

  it('should let environment variables win over stored values', () => {
    setConfigValue('flyBin', 'flyctl');

    expect(loadConfig({ OP_ENV_SYNC_FLY_BIN: 'fly-beta' }).flyBin).toBe('fly-beta');
  });

  it('should restore the default after unset', () => {
    setConfigValue('opBin', '/opt/op');
    unsetConfigValue('opBin');

    expect(loadConfig({}).opBin).toBe('op');
  });

  it('should reject invalid values', () => {
    expect(() => setConfigValue('defaultEnvFile', '../secrets.env')).toThrow(ConfigError);
    expect(loadConfig({}).defaultEnvFile).toBe('.env');
  });
});
