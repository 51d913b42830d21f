import { describe, it, expect } from 'vitest';
import type { Task, ToolExecutionRecord } from '@taskloom/coordinator-contracts';
import { StorageError, loadText } from '@taskloom/coordinator-sdk';
import { MemoryFileStore } from '../memory-file-store.js';
import { TaskArchive } from '../task-archive.js';

function record(attempt: number, success: boolean): ToolExecutionRecord {
  const base = {
    recordId: `task-1/1/call_1/${attempt}`,
    taskId: 'task-1',
    invocationId: 'call_1',
    toolName: 'run_simulation',
    agentId: 'verifier',
    iteration: 1,
    attempt,
    parameters: { target: 'counter' },
    repaired: false,
    durationMs: 12,
    timestamp: '2026-01-01T00:00:01.000Z',
  };
  return success
    ? { ...base, success: true, result: { passed: 4 } }
    : { ...base, success: false, error: { kind: 'timeout', message: 'Tool "run_simulation" timed out after 10ms', retryable: true } };
}

function finishedTask(overrides: Partial<Task> = {}): Task {
  return {
    taskId: 'task-1',
    originalRequest: 'Simulate the counter',
    status: 'completed',
    phase: 'completed',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:02.000Z',
    completedAt: '2026-01-01T00:00:02.000Z',
    completionScore: 100,
    missingRequirements: [],
    qualityAssessment: 'excellent',
    agentResults: {
      verifier: {
        agentId: 'verifier',
        iteration: 1,
        outcome: 'tool_calls',
        response: '{"tool_calls":[{"tool_name":"run_simulation"}]}',
        toolsSucceeded: ['run_simulation'],
        toolsFailed: [],
        timestamp: '2026-01-01T00:00:02.000Z',
      },
    },
    toolExecutions: [record(1, false), record(2, true)],
    iterationCount: 1,
    maxIterations: 5,
    currentAgentId: 'verifier',
    finalAnswer: null,
    reason: 'All requirements satisfied (score 100)',
    failure: null,
    phaseDurationsMs: { pending: 1, selecting: 2, dispatching: 40, validating: 3, evaluating: 1 },
    ...overrides,
  };
}

describe('TaskArchive', () => {
  it('writes the task, its executions and an index entry', async () => {
    const store = new MemoryFileStore();
    const archive = new TaskArchive(store);

    await archive.archive(finishedTask());

    expect(store.paths()).toEqual(['tasks/index.json', 'tasks/task-1/executions.json', 'tasks/task-1/task.json']);
    const taskJson: unknown = JSON.parse(await loadText(store, 'tasks/task-1/task.json'));
    expect(taskJson).not.toHaveProperty('toolExecutions');
    expect(await archive.list()).toEqual([
      {
        taskId: 'task-1',
        status: 'completed',
        completionScore: 100,
        createdAt: '2026-01-01T00:00:00.000Z',
        completedAt: '2026-01-01T00:00:02.000Z',
      },
    ]);
  });

  it('loads an archived task back', async () => {
    const archive = new TaskArchive(new MemoryFileStore());
    await archive.archive(finishedTask());

    const bundle = await archive.load('task-1');

    expect(bundle?.task.reason).toBe('All requirements satisfied (score 100)');
    expect(bundle?.task.phaseDurationsMs).toEqual({
      pending: 1,
      selecting: 2,
      dispatching: 40,
      validating: 3,
      evaluating: 1,
    });
    expect(bundle?.executions.map((item) => [item.attempt, item.success])).toEqual([
      [1, false],
      [2, true],
    ]);
    expect(bundle?.executions[0]?.error?.kind).toBe('timeout');
    expect(bundle?.executions[1]?.result).toEqual({ passed: 4 });
  });

  it('returns null for a task that was never archived', async () => {
    expect(await new TaskArchive(new MemoryFileStore()).load('task-9')).toBeNull();
  });

  it('upserts index entries and keeps concurrent writes', async () => {
    const archive = new TaskArchive(new MemoryFileStore());

    await Promise.all([
      archive.archive(finishedTask()),
      archive.archive(finishedTask({ taskId: 'task-2', status: 'failed', phase: 'failed', completionScore: 40 })),
    ]);
    await archive.archive(finishedTask({ completionScore: 90 }));

    expect((await archive.list()).map((entry) => [entry.taskId, entry.status, entry.completionScore])).toEqual([
      ['task-1', 'completed', 90],
      ['task-2', 'failed', 40],
    ]);
  });

  it('rejects task ids that are not safe directory names', async () => {
    const archive = new TaskArchive(new MemoryFileStore());

    await expect(archive.archive(finishedTask({ taskId: '../task' }))).rejects.toThrow(
      'Task id cannot be used as a directory name: ../task',
    );
  });

  it('reports a corrupted archive file', async () => {
    const store = new MemoryFileStore();
    await store.save('tasks/index.json', '{"version":1,"tasks":[{"taskId":"x"}]}');
    const archive = new TaskArchive(store);

    await expect(archive.list()).rejects.toBeInstanceOf(StorageError);
    await expect(archive.list()).rejects.toThrow('Invalid archive file tasks/index.json: tasks.0.status: Required');

    await store.save('tasks/index.json', '{not json');
    await expect(archive.list()).rejects.toThrow(/^Corrupted archive file tasks\/index.json: /);
  });
});
