import type { ToolExecutionRecord, ToolInvocation } from '@taskloom/coordinator-contracts';
import { deepFreeze } from '@taskloom/coordinator-tools';

/**
 * Append-only run state of one task: execution records, the invocation
 * history the loop guard looks at, and the agents' final answers.
 */
export class TaskLedger {
  private readonly records: ToolExecutionRecord[] = [];
  private readonly recordIds = new Set<string>();
  private readonly invocations: ToolInvocation[] = [];
  private readonly answers: string[] = [];

  /**
   * @throws Error when a record id was already appended
   */
  appendRecords(records: readonly ToolExecutionRecord[]): void {
    for (const record of records) {
      if (this.recordIds.has(record.recordId)) {
        throw new Error(`Execution record ${record.recordId} already exists`);
      }
    }
    for (const record of records) {
      this.recordIds.add(record.recordId);
      this.records.push(deepFreeze(record));
    }
  }

  recordInvocations(invocations: readonly ToolInvocation[]): void {
    this.invocations.push(...invocations);
  }

  recordAnswer(answer: string): void {
    this.answers.push(answer);
  }

  getRecords(): ToolExecutionRecord[] {
    return [...this.records];
  }

  getInvocationHistory(): ToolInvocation[] {
    return [...this.invocations];
  }

  getAnswers(): string[] {
    return [...this.answers];
  }
}
