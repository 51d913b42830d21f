import { StorageError, type FileStore } from '@taskloom/coordinator-sdk';
import { normalizeStorePath } from './store-paths.js';

const encoder = new TextEncoder();

/**
 * In-process FileStore. Contents are copied on the way in and out.
 */
export class MemoryFileStore implements FileStore {
  private readonly files = new Map<string, Uint8Array>();

  async save(relPath: string, content: string | Uint8Array): Promise<void> {
    const bytes = typeof content === 'string' ? encoder.encode(content) : content.slice();
    this.files.set(normalizeStorePath(relPath), bytes);
  }

  async load(relPath: string): Promise<Uint8Array> {
    const bytes = this.files.get(normalizeStorePath(relPath));
    if (!bytes) {
      throw new StorageError(relPath, `File not found: ${relPath}`);
    }
    return bytes.slice();
  }

  async exists(relPath: string): Promise<boolean> {
    return this.files.has(normalizeStorePath(relPath));
  }

  /** Stored paths, sorted */
  paths(): string[] {
    return [...this.files.keys()].sort();
  }
}
