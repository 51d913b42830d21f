/**
 * FileStore backed by a directory on disk
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { StorageError, errorMessage, type FileStore } from '@taskloom/coordinator-sdk';
import { normalizeStorePath } from './store-paths.js';

export class NodeFileStore implements FileStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async save(relPath: string, content: string | Uint8Array): Promise<void> {
    const target = this.resolve(relPath);
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, content);
    } catch (error) {
      throw new StorageError(relPath, `Cannot write ${relPath}: ${errorMessage(error)}`, error);
    }
  }

  async load(relPath: string): Promise<Uint8Array> {
    const target = this.resolve(relPath);
    try {
      return await fs.promises.readFile(target);
    } catch (error) {
      if (isNotFound(error)) {
        throw new StorageError(relPath, `File not found: ${relPath}`, error);
      }
      throw new StorageError(relPath, `Cannot read ${relPath}: ${errorMessage(error)}`, error);
    }
  }

  async exists(relPath: string): Promise<boolean> {
    const target = this.resolve(relPath);
    try {
      await fs.promises.access(target);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StorageError(relPath, `Cannot access ${relPath}: ${errorMessage(error)}`, error);
    }
  }

  private resolve(relPath: string): string {
    return path.join(this.rootDir, ...normalizeStorePath(relPath).split('/'));
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
