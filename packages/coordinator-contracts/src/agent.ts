/**
 * Agent registry types
 */

/**
 * A registered worker. Long-lived for the whole process; only ever disabled,
 * never removed.
 */
export interface AgentRecord {
  readonly agentId: string;
  readonly capabilities: readonly string[];
  readonly specialty: string;
  readonly successCount: number;
  readonly failureCount: number;
  /** Failures since the last success, reset on new task or explicit reset */
  readonly consecutiveFailures: number;
  readonly disabled: boolean;
  /** Position in registration order, used to break selection ties */
  readonly registrationIndex: number;
  readonly registeredAt: string;
}

export interface AgentSelection {
  agentId: string;
  score: number;
  matchedCapabilities: string[];
  successRatio: number;
  reasoning: string;
}

export type AgentSelectionResult =
  | { selected: true; selection: AgentSelection }
  | { selected: false; reason: string };
