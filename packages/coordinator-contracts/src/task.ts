/**
 * Task lifecycle types
 */

import type { QualityAssessment } from './completion.js';
import type { ToolExecutionRecord } from './tool-types.js';

/**
 * User-visible task status. Transitions are monotone:
 * pending → in_progress → completed | failed | aborted
 */
export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed' | 'aborted';

/**
 * Coordination engine state machine phase.
 */
export type EnginePhase =
  | 'pending'
  | 'selecting'
  | 'dispatching'
  | 'validating'
  | 'evaluating'
  | 'completed'
  | 'failed'
  | 'aborted';

export const TERMINAL_PHASES: readonly EnginePhase[] = ['completed', 'failed', 'aborted'];

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'aborted'];

/**
 * Why a task ended without completing.
 *
 * - `loop_detected`: the loop guard flagged a degenerate invocation pattern
 * - `iteration_budget_exhausted`: max iterations reached while incomplete
 * - `agent_unavailable`: no enabled agent matched the sub-task
 * - `cancelled`: external cancellation
 * - `internal_error`: unexpected exception inside the engine
 */
export type TaskFailureKind =
  | 'loop_detected'
  | 'iteration_budget_exhausted'
  | 'agent_unavailable'
  | 'cancelled'
  | 'internal_error';

export interface TaskFailure {
  kind: TaskFailureKind;
  reason: string;
  /** Detected invocation pattern, for `loop_detected` */
  pattern?: string;
}

/**
 * How an agent's turn ended.
 *
 * - `answer`: no envelope; the text is a final natural-language answer
 * - `tool_calls`: at least one invocation was dispatched
 * - `declined`: envelope with an empty tool_calls array
 * - `malformed`: envelope present but not decodable
 * - `validation_rejected`: every invocation failed validation
 * - `backend_error`: the model backend failed after retries
 */
export type AgentResultOutcome =
  | 'answer'
  | 'tool_calls'
  | 'declined'
  | 'malformed'
  | 'validation_rejected'
  | 'backend_error';

/**
 * Latest result an agent produced for a task.
 */
export interface AgentResult {
  agentId: string;
  iteration: number;
  outcome: AgentResultOutcome;
  /** Raw model output (truncated) */
  response: string;
  toolsSucceeded: string[];
  toolsFailed: string[];
  timestamp: string;
}

/**
 * The unit of work requested by a user.
 */
export interface Task {
  taskId: string;
  originalRequest: string;
  status: TaskStatus;
  phase: EnginePhase;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  /** 0-100 */
  completionScore: number;
  missingRequirements: string[];
  qualityAssessment: QualityAssessment;
  agentResults: Record<string, AgentResult>;
  /** Append-only */
  toolExecutions: ToolExecutionRecord[];
  iterationCount: number;
  maxIterations: number;
  currentAgentId: string | null;
  /** Last free-text answer, if any agent gave one */
  finalAnswer: string | null;
  /** Human-readable explanation of the terminal state */
  reason: string | null;
  failure: TaskFailure | null;
  /** Wall time spent in each phase visited so far */
  phaseDurationsMs: Partial<Record<EnginePhase, number>>;
}

export interface TaskSummary {
  taskId: string;
  status: TaskStatus;
  phase: EnginePhase;
  completionScore: number;
  iterationCount: number;
  createdAt: string;
  completedAt: string | null;
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isTerminalPhase(phase: EnginePhase): boolean {
  return TERMINAL_PHASES.includes(phase);
}

export function toTaskSummary(task: Task): TaskSummary {
  return {
    taskId: task.taskId,
    status: task.status,
    phase: task.phase,
    completionScore: task.completionScore,
    iterationCount: task.iterationCount,
    createdAt: task.createdAt,
    completedAt: task.completedAt,
  };
}
