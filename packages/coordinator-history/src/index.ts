/**
 * @taskloom/coordinator-history
 *
 * File stores and the archive of terminal tasks.
 */

export { NodeFileStore } from './node-file-store.js';
export { MemoryFileStore } from './memory-file-store.js';
export { normalizeStorePath } from './store-paths.js';
export { TaskArchive } from './task-archive.js';
export type { ArchivedTaskBundle, TaskArchiveOptions } from './task-archive.js';
export {
  ArchivedTaskSchema,
  ArchivedExecutionSchema,
  ArchiveIndexEntrySchema,
  ArchiveIndexSchema,
} from './archive-schemas.js';
export type { ArchivedTask, ArchivedExecution, ArchiveIndexEntry, ArchiveIndex } from './archive-schemas.js';
