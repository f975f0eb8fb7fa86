// Path: src/utils/file.ts
// Atomic file write utilities - prevent partial .env writes

import fs from 'node:fs';
import path from 'node:path';
import { validateOutputPath } from './path.js';

export interface AtomicWriteOptions {
  /**
   * File permissions (octal number, e.g., 0o600).
   * Defaults to 0o600, since the files written hold secrets.
   */
  mode?: number;

  /**
   * Create parent directories if they don't exist.
   * Defaults to true.
   */
  createDirs?: boolean;
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o600,
  createDirs: true,
};

/**
 * Write content to a file atomically.
 *
 * Uses temp file + rename pattern to ensure the file is either
 * fully written or not modified at all.
 *
 * @param filePath - Absolute path to target file
 * @param content - Content to write
 * @param options - Write options
 */
export function writeAtomic(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): void {
  validateOutputPath(filePath);

  const opts = { ...DEFAULT_OPTIONS, ...options };
  const dir = path.dirname(filePath);
  const tempPath = `${filePath}.tmp.${process.pid}`;

  if (opts.createDirs && !fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o750 });
  }

  try {
    fs.writeFileSync(tempPath, content, { mode: opts.mode });
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    // Clean up temp file on error
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch {
      // Ignore cleanup errors
    }
    throw err;
  }
}

/**
 * Read a UTF-8 file, or return null when it does not exist.
 *
 * @param filePath - Path to read
 */
export function readFileIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}
