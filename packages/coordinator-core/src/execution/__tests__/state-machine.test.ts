import { describe, it, expect } from 'vitest';
import type { EnginePhase, ToolExecutionRecord } from '@taskloom/coordinator-contracts';
import { TaskStateMachine, statusOfPhase } from '../state-machine.js';
import { TaskLedger } from '../task-ledger.js';

function walk(machine: TaskStateMachine, phases: EnginePhase[]): void {
  for (const phase of phases) {
    machine.transition(phase);
  }
}

describe('TaskStateMachine', () => {
  it('follows the coordination cycle', () => {
    const machine = new TaskStateMachine();
    walk(machine, ['selecting', 'dispatching', 'validating', 'evaluating', 'selecting', 'dispatching']);

    expect(machine.getCurrent()).toBe('dispatching');
    expect(machine.getStatus()).toBe('in_progress');
    expect(Object.keys(machine.getPhaseDurationsMs()).sort()).toEqual([
      'dispatching',
      'evaluating',
      'pending',
      'selecting',
      'validating',
    ]);
  });

  it('allows evaluating to loop straight back to dispatching', () => {
    const machine = new TaskStateMachine();
    walk(machine, ['selecting', 'dispatching', 'validating', 'evaluating']);

    expect(machine.canTransition('dispatching')).toBe(true);
    expect(machine.canTransition('completed')).toBe(true);
  });

  it('rejects skipping phases', () => {
    const machine = new TaskStateMachine();

    expect(() => machine.transition('completed')).toThrow('Invalid state transition: pending -> completed');
    expect(() => machine.transition('evaluating')).toThrow('Invalid state transition: pending -> evaluating');
  });

  it('can fail or abort from every non-terminal phase', () => {
    const paths: EnginePhase[][] = [
      [],
      ['selecting'],
      ['selecting', 'dispatching'],
      ['selecting', 'dispatching', 'validating'],
      ['selecting', 'dispatching', 'validating', 'evaluating'],
    ];
    for (const path of paths) {
      for (const terminal of ['failed', 'aborted'] as const) {
        const machine = new TaskStateMachine();
        walk(machine, path);
        machine.transition(terminal, 'stop');
        expect(machine.getStatus()).toBe(terminal);
      }
    }
  });

  it('never leaves a terminal phase', () => {
    const machine = new TaskStateMachine();
    walk(machine, ['selecting', 'dispatching', 'validating', 'evaluating', 'completed']);

    expect(machine.isTerminal()).toBe(true);
    for (const phase of ['pending', 'selecting', 'dispatching', 'failed', 'aborted'] as const) {
      expect(machine.canTransition(phase)).toBe(false);
    }
    expect(() => machine.transition('aborted')).toThrow('Invalid state transition: completed -> aborted');
  });

  it('allows failing straight from pending', () => {
    const machine = new TaskStateMachine();
    machine.transition('failed');

    expect(machine.getStatus()).toBe('failed');
    expect(machine.isTerminal()).toBe(true);
  });

  it('maps phases to user-visible statuses', () => {
    expect(statusOfPhase('pending')).toBe('pending');
    expect(statusOfPhase('validating')).toBe('in_progress');
    expect(statusOfPhase('aborted')).toBe('aborted');
  });

  it('tracks time spent per phase', () => {
    const machine = new TaskStateMachine();
    machine.transition('selecting');
    const durations = machine.getPhaseDurationsMs();

    expect(durations.pending).toBeGreaterThanOrEqual(0);
    expect(durations.selecting).toBeGreaterThanOrEqual(0);
    expect(durations.completed).toBeUndefined();
  });
});

function record(recordId: string, toolName: string, success: boolean): ToolExecutionRecord {
  const base = {
    recordId,
    taskId: 't',
    invocationId: recordId,
    toolName,
    agentId: 'a',
    iteration: 1,
    attempt: 1,
    parameters: { filename: 'alu.v' },
    repaired: false,
    durationMs: 0,
    timestamp: '2026-01-01T00:00:00.000Z',
  };
  return success
    ? { ...base, success: true, result: { path: 'alu.v' } }
    : { ...base, success: false, error: { kind: 'timeout', message: 'slow', retryable: true } };
}

describe('TaskLedger', () => {
  it('appends records and hands out copies', () => {
    const ledger = new TaskLedger();
    ledger.appendRecords([record('r1', 'write_file', true)]);
    const first = ledger.getRecords();
    ledger.appendRecords([record('r2', 'run_simulation', false)]);

    expect(first).toHaveLength(1);
    expect(ledger.getRecords()).toHaveLength(2);
    expect(ledger.getRecords().map((r) => r.recordId)).toEqual(['r1', 'r2']);
  });

  it('freezes stored records', () => {
    const ledger = new TaskLedger();
    ledger.appendRecords([record('r1', 'write_file', true)]);
    const [stored] = ledger.getRecords();

    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.parameters)).toBe(true);
  });

  it('refuses to append a record id twice', () => {
    const ledger = new TaskLedger();
    ledger.appendRecords([record('r1', 'write_file', true)]);

    expect(() => ledger.appendRecords([record('r2', 'lint', true), record('r1', 'write_file', true)])).toThrow(
      'Execution record r1 already exists',
    );
    expect(ledger.getRecords()).toHaveLength(1);
  });

  it('keeps invocation history and answers in order', () => {
    const ledger = new TaskLedger();
    const span = { start: 0, end: 0, text: '' };
    ledger.recordInvocations([{ invocationId: 'call_1', toolName: 'write_file', parameters: {}, rawSourceSpan: span }]);
    ledger.recordInvocations([{ invocationId: 'call_1', toolName: 'lint', parameters: {}, rawSourceSpan: span }]);
    ledger.recordAnswer('done');

    expect(ledger.getInvocationHistory().map((inv) => inv.toolName)).toEqual(['write_file', 'lint']);
    expect(ledger.getAnswers()).toEqual(['done']);
  });
});
