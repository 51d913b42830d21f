import type { Task } from '@taskloom/coordinator-contracts';

/**
 * Receives every task that reaches a terminal state.
 */
export interface TaskArchiver {
  archive(task: Readonly<Task>): Promise<void>;
}
