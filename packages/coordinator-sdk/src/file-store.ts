/**
 * FileStore — optional persistence collaborator.
 *
 * The coordinator never inspects file contents; it only forwards paths.
 * Paths are relative and `/`-separated. Implementations reject paths that
 * escape their root with a `StorageError`.
 */

export interface FileStore {
  save(path: string, content: string | Uint8Array): Promise<void>;
  /** Rejects with `StorageError` when the file does not exist */
  load(path: string): Promise<Uint8Array>;
  exists(path: string): Promise<boolean>;
}

const decoder = new TextDecoder();

export async function loadText(store: FileStore, path: string): Promise<string> {
  return decoder.decode(await store.load(path));
}
