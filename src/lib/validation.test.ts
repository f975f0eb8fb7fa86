// Path: src/lib/validation.test.ts
// Unit tests for config validation

import { describe, it, expect } from 'vitest';
import { formatValidationResult, validateConfig, validateConfigValue } from './validation.js';
import { DEFAULT_CONFIG } from './config/types.js';

describe('validateConfigValue', () => {
  it('should pass for the defaults', () => {
    const result = validateConfig(DEFAULT_CONFIG);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  it('should fail when an executable is empty', () => {
    const result = validateConfigValue('opBin', '  ');
    expect(result.valid).toBe(false);
    expect(result.errors[0].field).toBe('opBin');
  });

  it('should fail for an empty editor', () => {
    expect(validateConfigValue('editor', '').valid).toBe(false);
  });

  it('should warn when a GUI editor is not told to wait', () => {
    const result = validateConfigValue('editor', 'code');
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      { field: 'editor', message: 'code returns before the file is closed', suggestion: 'Use "code --wait"' },
    ]);
  });

  it('should not warn for terminal editors', () => {
    expect(validateConfigValue('editor', 'vim').warnings).toHaveLength(0);
    expect(validateConfigValue('editor', '/usr/bin/subl -w').warnings).toHaveLength(0);
  });

  it('should reject env files outside the repository', () => {
    expect(validateConfigValue('defaultEnvFile', '/etc/app.env').valid).toBe(false);
    expect(validateConfigValue('defaultEnvFile', '../app.env').valid).toBe(false);
    expect(validateConfigValue('defaultEnvFile', 'config/.env').valid).toBe(true);
  });
});

describe('validateConfig', () => {
  it('should collect errors across keys', () => {
    const result = validateConfig({ ...DEFAULT_CONFIG, flyBin: '', vault: '' });
    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.field)).toEqual(['flyBin', 'vault']);
  });
});

describe('formatValidationResult', () => {
  it('should format valid result', () => {
    expect(formatValidationResult({ valid: true, errors: [], warnings: [] })).toBe('✓ Configuration is valid');
  });

  it('should format errors and warnings', () => {
    const output = formatValidationResult({
      valid: false,
      errors: [{ field: 'opBin', message: 'Executable cannot be empty', value: '' }],
      warnings: [{ field: 'editor', message: 'code returns before the file is closed', suggestion: 'Use "code --wait"' }],
    });

    expect(output).toBe([
      'Errors:',
      '  ✗ opBin: Executable cannot be empty',
      '    Value: ""',
      '',
      'Warnings:',
      '  ⚠ editor: code returns before the file is closed',
      '    Suggestion: Use "code --wait"',
    ].join('\n'));
  });
});
