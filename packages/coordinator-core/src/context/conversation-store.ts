/**
 * ConversationStore - ordered turn history per session
 *
 * Features:
 * - Append-only insertion order (the only order that matters)
 * - Budgeted snapshots for the next model prompt
 * - Compaction drops the oldest non-system turns first and never reorders
 */

import type { ContextConfig, ConversationTurn, SnapshotBudget, TurnRole } from '@taskloom/coordinator-contracts';
import { ContextConfigSchema } from '@taskloom/coordinator-contracts';

export interface AppendTurnInput {
  role: TurnRole;
  content: string;
  agentId?: string | null;
}

export interface CompactionPolicy extends SnapshotBudget {
  /** Most recent turns that are never dropped */
  keepRecent: number;
}

/**
 * Drop turns oldest-first until the budget is met.
 *
 * System turns and the last `keepRecent` turns are protected, so the result
 * may still exceed the budget when only protected turns remain.
 */
export function compactTurns(turns: readonly ConversationTurn[], policy: CompactionPolicy): ConversationTurn[] {
  const keep = turns.map(() => true);
  let count = turns.length;
  let chars = turns.reduce((sum, turn) => sum + turn.content.length, 0);

  const overBudget = (): boolean =>
    (policy.maxTurns !== undefined && count > policy.maxTurns) ||
    (policy.maxChars !== undefined && chars > policy.maxChars);

  const recentFrom = Math.max(0, turns.length - policy.keepRecent);
  for (let i = 0; i < recentFrom && overBudget(); i++) {
    const turn = turns[i];
    if (!turn || turn.role === 'system') {
      continue;
    }
    keep[i] = false;
    count--;
    chars -= turn.content.length;
  }

  return turns.filter((_, i) => keep[i]);
}

export class ConversationStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly sequences = new Map<string, number>();
  private readonly config: ContextConfig;

  constructor(config: Partial<ContextConfig> = {}) {
    this.config = ContextConfigSchema.parse(config);
  }

  /**
   * Append a turn. Appends are synchronous, so turns of one session are
   * serialized even when several dispatches settle together.
   */
  append(sessionId: string, input: AppendTurnInput): ConversationTurn {
    const seq = (this.sequences.get(sessionId) ?? 0) + 1;
    this.sequences.set(sessionId, seq);

    const turn: ConversationTurn = Object.freeze({
      seq,
      role: input.role,
      content: input.content,
      agentId: input.agentId ?? null,
      timestamp: new Date().toISOString(),
    });

    const turns = this.sessions.get(sessionId) ?? [];
    turns.push(turn);

    if (turns.length > this.config.maxStoredTurns) {
      this.sessions.set(
        sessionId,
        compactTurns(turns, { maxTurns: this.config.maxStoredTurns, keepRecent: this.config.keepRecent }),
      );
    } else {
      this.sessions.set(sessionId, turns);
    }
    return turn;
  }

  /**
   * Compacted view used to build the next prompt. Budget fields not given
   * fall back to the configured `maxTurns`/`maxChars`.
   */
  snapshot(sessionId: string, budget: SnapshotBudget = {}): ConversationTurn[] {
    return compactTurns(this.sessions.get(sessionId) ?? [], {
      maxTurns: budget.maxTurns ?? this.config.maxTurns,
      maxChars: budget.maxChars ?? this.config.maxChars,
      keepRecent: this.config.keepRecent,
    });
  }

  /** Full stored history (after the storage cap), oldest first */
  history(sessionId: string): ConversationTurn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  size(sessionId: string): number {
    return this.sessions.get(sessionId)?.length ?? 0;
  }

  clear(sessionId: string): boolean {
    this.sequences.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }
}
