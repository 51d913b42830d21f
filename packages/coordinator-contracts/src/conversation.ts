/**
 * Conversation history types
 */

export type TurnRole = 'user' | 'agent' | 'system' | 'tool_result';

/**
 * One message in a session's history. Insertion order is the only order.
 */
export interface ConversationTurn {
  /** Monotonic insertion sequence within the session */
  readonly seq: number;
  readonly role: TurnRole;
  readonly content: string;
  readonly agentId: string | null;
  readonly timestamp: string;
}

export interface SnapshotBudget {
  maxTurns?: number;
  maxChars?: number;
}
