/**
 * Coordinator events — emitted by the engine for observers (UI, audit, tests).
 *
 * Observers never affect execution flow.
 */

import type { EnginePhase, TaskFailure, TaskStatus } from './task.js';
import type { ToolExecutionRecord } from './tool-types.js';
import type { ValidationIssue } from './validation.js';

interface BaseEvent<T extends string, D> {
  type: T;
  taskId: string;
  timestamp: string;
  data: D;
}

export type TaskSubmittedEvent = BaseEvent<'task:submitted', { request: string; maxIterations: number }>;

export type TaskPhaseEvent = BaseEvent<'task:phase', { from: EnginePhase; to: EnginePhase; reason?: string }>;

export type IterationStartEvent = BaseEvent<'iteration:start', { iteration: number; maxIterations: number }>;

export type AgentSelectedEvent = BaseEvent<
  'agent:selected',
  { agentId: string; score: number; matchedCapabilities: string[]; reasoning: string }
>;

export type BackendResponseEvent = BaseEvent<
  'backend:response',
  { agentId: string; iteration: number; chars: number; outcome: string; invocations: number }
>;

export type ToolExecutedEvent = BaseEvent<'tool:executed', { record: ToolExecutionRecord }>;

export type ValidationFailedEvent = BaseEvent<
  'validation:failed',
  { toolName: string; invocationId: string; errors: ValidationIssue[]; repairConfidence: number }
>;

export type LoopDetectedEvent = BaseEvent<'loop:detected', { pattern: string; reason: string }>;

export type TaskEvaluatedEvent = BaseEvent<
  'task:evaluated',
  { iteration: number; score: number; missingRequirements: string[]; isCompleted: boolean }
>;

export type TaskTerminalEvent = BaseEvent<
  'task:terminal',
  { status: TaskStatus; failure: TaskFailure | null; completionScore: number; iterations: number }
>;

export type CoordinatorEvent =
  | TaskSubmittedEvent
  | TaskPhaseEvent
  | IterationStartEvent
  | AgentSelectedEvent
  | BackendResponseEvent
  | ToolExecutedEvent
  | ValidationFailedEvent
  | LoopDetectedEvent
  | TaskEvaluatedEvent
  | TaskTerminalEvent;

export type CoordinatorEventType = CoordinatorEvent['type'];

export type CoordinatorEventCallback = (event: CoordinatorEvent) => void;
