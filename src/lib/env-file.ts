// Path: src/lib/env-file.ts
// .env text <-> SecretSet conversion

import { InvalidFormatError } from '../utils/error.js';

/**
 * In-memory key-value view of a secure note, a .env file or a platform's secrets.
 * Keys are case-sensitive; the last write wins.
 */
export type SecretSet = Record<string, string>;

/**
 * Parse .env text into a SecretSet
 * Handles:
 *   KEY=value
 *   export KEY=value
 *   # comments and blank lines (skipped)
 *
 * Each line is split on the first `=`; the value is kept verbatim, so there is
 * no quoting or escaping. Lines without `=` or with an empty key are ignored.
 */
export function parseEnv(content: string): SecretSet {
  const result: SecretSet = {};

  for (const rawLine of content.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) continue;

    const eqIndex = line.indexOf('=');
    if (eqIndex === -1) continue;

    let key = line.substring(0, eqIndex).trim();
    if (key.startsWith('export ')) {
      key = key.substring(7).trim();
    }
    if (!key) continue;

    result[key] = line.substring(eqIndex + 1);
  }

  return result;
}

/**
 * Why a key would not read back as itself through parseEnv, if it would not
 */
function unreadableKeyReason(key: string): string | undefined {
  if (key !== key.trim()) return 'has surrounding whitespace';
  if (/[=\r\n]/.test(key)) return 'contains "=" or a line break';
  if (key.startsWith('#')) return 'starts with "#"';
  if (key.startsWith('export ')) return 'starts with "export "';
  return undefined;
}

/**
 * Serialize a SecretSet as `KEY=value` lines in insertion order.
 * Keys that would parse back differently and values containing newlines
 * cannot be represented and are rejected.
 */
export function serializeEnv(secrets: SecretSet): string {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(secrets)) {
    const reason = unreadableKeyReason(key);
    if (reason) {
      throw new InvalidFormatError(`Key "${key}" ${reason}, which .env files cannot hold`, { key });
    }
    if (value.includes('\n')) {
      throw new InvalidFormatError(`Value of ${key} contains a newline, which .env files cannot hold`, { key });
    }
    lines.push(`${key}=${value}`);
  }

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}
