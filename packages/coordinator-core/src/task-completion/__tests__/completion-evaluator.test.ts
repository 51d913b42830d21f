import { describe, it, expect } from 'vitest';
import type { CompletionCriterion, ToolExecutionRecord } from '@taskloom/coordinator-contracts';
import { CompletionEvaluator, HARDWARE_DESIGN_CRITERIA, NO_EVIDENCE_MESSAGE } from '../index.js';

let seq = 0;

function record(toolName: string, success = true, result: unknown = 'ok'): ToolExecutionRecord {
  seq++;
  const base = {
    recordId: `task-1/1/call_${seq}/1`,
    taskId: 'task-1',
    invocationId: `call_${seq}`,
    toolName,
    agentId: 'designer',
    iteration: 1,
    attempt: 1,
    parameters: {},
    repaired: false,
    durationMs: 1,
    timestamp: '2026-01-01T00:00:00.000Z',
  };
  return success
    ? { ...base, success: true, result }
    : { ...base, success: false, error: { kind: 'handler_error', message: 'boom', retryable: true } };
}

const hardware = new CompletionEvaluator({ criteria: HARDWARE_DESIGN_CRITERIA });

describe('CompletionEvaluator', () => {
  it('reports the absence of any result', () => {
    const evaluation = hardware.evaluate({ request: 'Design an ALU', executions: [] });

    expect(evaluation).toMatchObject({
      score: 0,
      isCompleted: false,
      qualityAssessment: 'poor',
      missingRequirements: [
        NO_EVIDENCE_MESSAGE,
        'No hardware design has been produced (expected a written Verilog module)',
      ],
      missingCapabilities: ['code_generation'],
    });
  });

  it('completes a design-only request once the design is written', () => {
    const evaluation = hardware.evaluate({ request: 'Design an ALU', executions: [record('write_file')] });

    expect(evaluation.score).toBe(100);
    expect(evaluation.isCompleted).toBe(true);
    expect(evaluation.qualityAssessment).toBe('excellent');
    expect(evaluation.criteria.map((c) => [c.id, c.applicable, c.satisfied])).toEqual([
      ['design', true, true],
      ['testbench', false, false],
      ['simulation', false, false],
    ]);
  });

  it('requires verification results when the request mentions them', () => {
    const request = 'Design an ALU and verify it with a testbench';
    const executions = [record('write_file')];

    const designOnly = hardware.evaluate({ request, executions });
    expect(designOnly).toMatchObject({
      score: 50,
      isCompleted: false,
      qualityAssessment: 'fair',
      missingRequirements: ['No testbench has been produced', 'No passing simulation has been recorded'],
      missingCapabilities: ['test_generation', 'verification'],
    });

    executions.push(record('generate_testbench'));
    const withTestbench = hardware.evaluate({ request, executions });
    expect(withTestbench.score).toBe(75);
    expect(withTestbench.qualityAssessment).toBe('good');

    executions.push(record('run_simulation'));
    const verified = hardware.evaluate({ request, executions });
    expect(verified.score).toBe(100);
    expect(verified.isCompleted).toBe(true);
  });

  it('never lowers the score when a missing category is satisfied', () => {
    const request = 'Design a FIFO, then simulate it';
    const executions: ToolExecutionRecord[] = [];
    let previous = hardware.evaluate({ request, executions }).score;

    for (const tool of ['generate_testbench', 'run_simulation', 'write_file']) {
      executions.push(record(tool));
      const next = hardware.evaluate({ request, executions }).score;
      expect(next).toBeGreaterThanOrEqual(previous);
      previous = next;
    }
    expect(previous).toBe(100);
  });

  it('accepts keyword evidence from results and answers', () => {
    const fromAnswer = hardware.evaluate({
      request: 'Design an ALU',
      executions: [],
      answers: ['module alu(input a); endmodule'],
    });
    expect(fromAnswer.isCompleted).toBe(true);
    expect(fromAnswer.criteria[0]?.evidence).toBe('keyword "endmodule" in final answer');

    const fromResult = hardware.evaluate({
      request: 'Design an ALU and simulate it',
      executions: [record('write_file'), record('generate_testbench'), record('custom_sim', true, { log: 'All tests PASSED' })],
    });
    expect(fromResult.criteria[2]?.evidence).toBe('keyword "all tests passed" in result of custom_sim');
    expect(fromResult.isCompleted).toBe(true);
  });

  it('ignores failed executions', () => {
    const evaluation = hardware.evaluate({ request: 'Design an ALU', executions: [record('write_file', false)] });

    expect(evaluation.score).toBe(0);
    expect(evaluation.missingRequirements[0]).toBe(NO_EVIDENCE_MESSAGE);
  });

  it('blocks completion on a missing zero-weight requirement', () => {
    const criteria: CompletionCriterion[] = [
      { id: 'design', label: 'Design', weight: 100, required: 'always', satisfiedBy: { tools: ['write_file'] } },
      { id: 'report', label: 'Report', weight: 0, required: 'always', satisfiedBy: { tools: ['write_report'] } },
    ];

    const evaluation = new CompletionEvaluator({ criteria }).evaluate({
      request: 'Design',
      executions: [record('write_file')],
    });

    expect(evaluation.score).toBe(100);
    expect(evaluation.missingRequirements).toEqual(['Missing required result: Report']);
    expect(evaluation.isCompleted).toBe(false);
    expect(evaluation.qualityAssessment).toBe('good');
  });

  it('counts optional criteria only when satisfied', () => {
    const criteria: CompletionCriterion[] = [
      { id: 'design', label: 'Design', weight: 60, required: 'always', satisfiedBy: { tools: ['write_file'] } },
      { id: 'lint', label: 'Lint', weight: 40, required: 'never', satisfiedBy: { tools: ['run_lint'] } },
    ];
    const evaluator = new CompletionEvaluator({ criteria });

    expect(evaluator.evaluate({ request: 'x', executions: [record('write_file')] }).score).toBe(100);

    const lintOnly = evaluator.evaluate({ request: 'x', executions: [record('run_lint')] });
    expect(lintOnly.score).toBe(40);
    expect(lintOnly.missingRequirements).toEqual(['Missing required result: Design']);
  });

  it('treats any result as complete without criteria', () => {
    const evaluator = new CompletionEvaluator();

    expect(evaluator.evaluate({ request: 'hello', executions: [], answers: ['Hi!'] })).toMatchObject({
      score: 100,
      isCompleted: true,
      missingRequirements: [],
    });
    expect(evaluator.evaluate({ request: 'hello', executions: [], answers: ['  '] })).toMatchObject({
      score: 0,
      isCompleted: false,
      missingRequirements: [NO_EVIDENCE_MESSAGE],
    });
  });

  it('applies the completion threshold', () => {
    const criteria: CompletionCriterion[] = [
      { id: 'design', label: 'Design', weight: 70, required: 'always', satisfiedBy: { tools: ['write_file'] } },
      { id: 'docs', label: 'Docs', weight: 30, required: 'never', satisfiedBy: { tools: ['write_docs'] } },
    ];
    const strict = new CompletionEvaluator({ criteria, threshold: 100 });

    expect(strict.evaluate({ request: 'x', executions: [record('write_file')] }).isCompleted).toBe(true);
    expect(strict.evaluate({ request: 'x', executions: [record('write_docs')] }).score).toBe(30);
  });
});
