// Path: src/utils/path.ts
// Path traversal protection utilities

import path from 'node:path';
import { InvalidPathError } from './error.js';

/**
 * Check if a path is safe (no traversal attempts).
 * Detects:
 * - Directory traversal (../)
 * - Null bytes (\0)
 *
 * @param userPath - Path to validate
 * @returns true if path is safe
 */
export function isPathSafe(userPath: string): boolean {
  if (userPath.includes('\0')) {
    return false;
  }

  const normalized = path.normalize(userPath);

  // Catches "../", "/../", "..\" after normalization
  if (normalized.split(/[\\/]/).includes('..')) {
    return false;
  }

  return true;
}

/**
 * Validate an output path for file operations.
 *
 * @param filePath - Path to validate
 * @throws InvalidPathError if the path is empty, relative or contains traversal attempts
 */
export function validateOutputPath(filePath: string): void {
  if (!filePath) {
    throw new InvalidPathError('Path cannot be empty');
  }

  if (!path.isAbsolute(filePath)) {
    throw new InvalidPathError(`Path must be absolute: ${filePath}`);
  }

  if (!isPathSafe(filePath)) {
    throw new InvalidPathError(`Invalid path (potential traversal): ${filePath}`);
  }
}

/**
 * Safely join paths with traversal protection.
 * The resulting path is validated to not escape the base directory.
 *
 * @param basePath - Base directory (must be absolute)
 * @param userPath - User-provided relative path
 * @returns Joined and validated path
 * @throws InvalidPathError if the result would escape basePath
 */
export function safeJoinPath(basePath: string, userPath: string): string {
  if (!path.isAbsolute(basePath)) {
    throw new InvalidPathError(`Base path must be absolute: ${basePath}`);
  }
  if (!userPath || userPath.includes('\0')) {
    throw new InvalidPathError(`Invalid file name: ${JSON.stringify(userPath)}`);
  }

  const resolved = path.resolve(basePath, userPath);
  const normalizedBase = path.resolve(basePath);

  if (!resolved.startsWith(normalizedBase + path.sep) || resolved === normalizedBase) {
    throw new InvalidPathError(`Path escapes base directory: ${userPath}`);
  }

  return resolved;
}
