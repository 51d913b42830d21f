import * as path from 'node:path';
import { StorageError } from '@taskloom/coordinator-sdk';

/**
 * Normalize a store-relative path to `a/b/c` form.
 *
 * @throws StorageError for empty or absolute paths and paths leaving the root
 */
export function normalizeStorePath(relPath: string): string {
  const unified = relPath.trim().replace(/\\/g, '/');
  if (unified.length === 0) {
    throw new StorageError(relPath, 'Path must be non-empty');
  }
  if (unified.startsWith('/') || /^[A-Za-z]:/.test(unified)) {
    throw new StorageError(relPath, `Path must be relative: ${relPath}`);
  }

  const normalized = path.posix.normalize(unified).replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new StorageError(relPath, `Path escapes the store root: ${relPath}`);
  }
  if (normalized === '.' || normalized.length === 0) {
    throw new StorageError(relPath, `Path must name a file: ${relPath}`);
  }
  return normalized;
}
