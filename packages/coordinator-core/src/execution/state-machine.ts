import type { EnginePhase, TaskStatus } from '@taskloom/coordinator-contracts';
import { isTerminalPhase } from '@taskloom/coordinator-contracts';

const ALLOWED_TRANSITIONS: Record<EnginePhase, EnginePhase[]> = {
  pending: ['selecting', 'failed', 'aborted'],
  selecting: ['dispatching', 'failed', 'aborted'],
  dispatching: ['validating', 'failed', 'aborted'],
  validating: ['evaluating', 'failed', 'aborted'],
  evaluating: ['selecting', 'dispatching', 'completed', 'failed', 'aborted'],
  completed: [],
  failed: [],
  aborted: [],
};

export function statusOfPhase(phase: EnginePhase): TaskStatus {
  switch (phase) {
    case 'pending':
    case 'completed':
    case 'failed':
    case 'aborted':
      return phase;
    default:
      return 'in_progress';
  }
}

export class TaskStateMachine {
  private current: EnginePhase = 'pending';
  private enteredAt = new Map<EnginePhase, number>([['pending', Date.now()]]);
  private durationsMs = new Map<EnginePhase, number>();

  getCurrent(): EnginePhase {
    return this.current;
  }

  getStatus(): TaskStatus {
    return statusOfPhase(this.current);
  }

  isTerminal(): boolean {
    return isTerminalPhase(this.current);
  }

  canTransition(to: EnginePhase): boolean {
    return ALLOWED_TRANSITIONS[this.current].includes(to);
  }

  /**
   * @throws Error when `to` is not reachable from the current phase
   */
  transition(to: EnginePhase): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this.current} -> ${to}`);
    }

    const now = Date.now();
    const entered = this.enteredAt.get(this.current);
    if (entered != null) {
      this.durationsMs.set(this.current, (this.durationsMs.get(this.current) ?? 0) + (now - entered));
    }

    this.current = to;
    this.enteredAt.set(to, now);
  }

  getPhaseDurationsMs(now = Date.now()): Partial<Record<EnginePhase, number>> {
    const out: Partial<Record<EnginePhase, number>> = {};
    for (const [phase, ms] of this.durationsMs) {
      out[phase] = ms;
    }
    const entered = this.enteredAt.get(this.current);
    if (entered != null && !this.isTerminal()) {
      out[this.current] = (out[this.current] ?? 0) + (now - entered);
    }
    return out;
  }
}
