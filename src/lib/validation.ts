// Path: src/lib/validation.ts
// Configuration validation for op-env-sync

import type { ConfigKey, SyncConfig } from './config/types.js';
import { CONFIG_KEYS } from './config/types.js';
import { isPathSafe } from '../utils/path.js';
import { splitCommandLine } from '../utils/shell.js';
import { configLogger as log } from './logger.js';
import path from 'node:path';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

/**
 * Editors that return immediately unless told to wait
 */
const NON_BLOCKING_EDITORS = new Set(['code', 'subl', 'atom', 'zed', 'cursor']);

/**
 * Validate a single configuration value
 */
export function validateConfigValue(key: ConfigKey, value: string): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  switch (key) {
    case 'opBin':
    case 'flyBin':
      if (!value.trim()) {
        errors.push({ field: key, message: 'Executable cannot be empty', value });
      }
      break;

    case 'editor': {
      const argv = splitCommandLine(value);
      if (argv.length === 0) {
        errors.push({ field: key, message: 'Editor command cannot be empty', value });
        break;
      }
      const name = path.basename(argv[0]);
      if (NON_BLOCKING_EDITORS.has(name) && !argv.includes('--wait') && !argv.includes('-w')) {
        warnings.push({
          field: key,
          message: `${name} returns before the file is closed`,
          suggestion: `Use "${argv[0]} --wait"`,
        });
      }
      break;
    }

    case 'vault':
      if (!value.trim()) {
        errors.push({ field: key, message: 'Vault name cannot be empty', value });
      }
      break;

    case 'defaultEnvFile':
      if (!value.trim()) {
        errors.push({ field: key, message: 'File name cannot be empty', value });
      } else if (path.isAbsolute(value) || !isPathSafe(value)) {
        errors.push({
          field: key,
          message: 'Must be a relative path inside the repository',
          value,
        });
      }
      break;
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate a complete configuration
 */
export function validateConfig(config: SyncConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  for (const key of CONFIG_KEYS) {
    const value = config[key];
    if (value === undefined) continue;
    const result = validateConfigValue(key, value);
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  const result = { valid: errors.length === 0, errors, warnings };
  log.debug({ valid: result.valid, errors: errors.length, warnings: warnings.length }, 'Config validated');
  return result;
}

/**
 * Format validation result for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ✗ ${error.field}: ${error.message}`);
      if (error.value !== undefined) {
        lines.push(`    Value: ${JSON.stringify(error.value)}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.field}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    Suggestion: ${warning.suggestion}`);
      }
    }
  }

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Configuration is valid');
  } else if (result.valid) {
    lines.push('');
    lines.push('✓ Configuration is valid (with warnings)');
  }

  return lines.join('\n');
}
