/**
 * TaskArchive — persists terminal tasks for audit.
 *
 * Layout under the store root:
 *   tasks/index.json                 one entry per archived task
 *   tasks/<taskId>/task.json         the task record without its executions
 *   tasks/<taskId>/executions.json   every ToolExecutionRecord, in order
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Task } from '@taskloom/coordinator-contracts';
import {
  StorageError,
  errorMessage,
  loadText,
  type CoordinatorLogger,
  type FileStore,
  type TaskArchiver,
} from '@taskloom/coordinator-sdk';
import {
  ArchiveIndexSchema,
  ArchivedExecutionSchema,
  ArchivedTaskSchema,
  type ArchiveIndex,
  type ArchiveIndexEntry,
  type ArchivedExecution,
  type ArchivedTask,
} from './archive-schemas.js';

const INDEX_PATH = 'tasks/index.json';

export interface ArchivedTaskBundle {
  task: ArchivedTask;
  executions: ArchivedExecution[];
}

export interface TaskArchiveOptions {
  logger?: CoordinatorLogger;
}

export class TaskArchive implements TaskArchiver {
  private readonly store: FileStore;
  private readonly logger?: CoordinatorLogger;
  /** Serializes index read-modify-write cycles */
  private queue: Promise<void> = Promise.resolve();

  constructor(store: FileStore, options: TaskArchiveOptions = {}) {
    this.store = store;
    this.logger = options.logger?.child({ component: 'task-archive' });
  }

  /**
   * Write the task and its executions, then upsert its index entry.
   * Archiving the same task again overwrites the earlier copy.
   */
  archive(task: Readonly<Task>): Promise<void> {
    const run = this.queue.then(() => this.write(task));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * @returns null when the task was never archived
   * @throws StorageError when an archive file is unreadable or invalid
   */
  async load(taskId: string): Promise<ArchivedTaskBundle | null> {
    const dir = taskDir(taskId);
    if (!(await this.store.exists(`${dir}/task.json`))) {
      return null;
    }
    const task = await this.readJson(`${dir}/task.json`, ArchivedTaskSchema);
    const executions = (await this.store.exists(`${dir}/executions.json`))
      ? await this.readJson(`${dir}/executions.json`, ArchivedExecutionSchema.array())
      : [];
    return { task, executions };
  }

  /** Index entries in archive order */
  async list(): Promise<ArchiveIndexEntry[]> {
    return (await this.readIndex()).tasks;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Private Methods
  // ═══════════════════════════════════════════════════════════════════════

  private async write(task: Readonly<Task>): Promise<void> {
    const dir = taskDir(task.taskId);
    const { toolExecutions, ...record } = task;

    await this.store.save(`${dir}/task.json`, JSON.stringify(record, null, 2));
    await this.store.save(`${dir}/executions.json`, JSON.stringify(toolExecutions, null, 2));

    const index = await this.readIndex();
    const entry: ArchiveIndexEntry = {
      taskId: task.taskId,
      status: task.status,
      completionScore: task.completionScore,
      createdAt: task.createdAt,
      completedAt: task.completedAt,
    };
    const position = index.tasks.findIndex((existing) => existing.taskId === task.taskId);
    if (position === -1) {
      index.tasks.push(entry);
    } else {
      index.tasks[position] = entry;
    }
    await this.store.save(INDEX_PATH, JSON.stringify(index, null, 2));

    this.logger?.debug('Task archived', { taskId: task.taskId, executions: toolExecutions.length });
  }

  private async readIndex(): Promise<ArchiveIndex> {
    if (!(await this.store.exists(INDEX_PATH))) {
      return { version: 1, tasks: [] };
    }
    return this.readJson(INDEX_PATH, ArchiveIndexSchema);
  }

  private async readJson<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const text = await loadText(this.store, path);
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StorageError(path, `Corrupted archive file ${path}: ${errorMessage(error)}`, error);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new StorageError(path, `Invalid archive file ${path}: ${where}${issue?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }
}

function taskDir(taskId: string): string {
  if (!/^[A-Za-z0-9][A-Za-z0-9_.-]*$/.test(taskId)) {
    throw new StorageError(taskId, `Task id cannot be used as a directory name: ${taskId}`);
  }
  return `tasks/${taskId}`;
}
