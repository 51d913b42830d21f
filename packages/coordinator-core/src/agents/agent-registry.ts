/**
 * AgentRegistry — capability-tagged workers and best-fit selection.
 *
 * Agents are long-lived for the whole process: they are disabled, never
 * removed. Counter updates are synchronous, so concurrent tasks never
 * interleave inside one update.
 */

import type { AgentRecord, AgentSelectionResult } from '@taskloom/coordinator-contracts';
import { DEFAULT_CAPABILITY_KEYWORDS } from '@taskloom/coordinator-contracts';
import { RegistrationError, type CoordinatorLogger } from '@taskloom/coordinator-sdk';
import { inferCapabilities, normalizeCapabilities } from './capability-inference.js';

// ═══════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════

export interface RegisterAgentInput {
  agentId: string;
  capabilities: readonly string[];
  specialty?: string;
}

export interface AgentRegistryOptions {
  /** Consecutive failures tolerated before the agent is disabled */
  consecutiveFailureThreshold?: number;
  /** Capability tag → keywords, used when a selection names no capabilities */
  capabilityKeywords?: Readonly<Record<string, readonly string[]>>;
  logger?: CoordinatorLogger;
}

export interface FailureOutcome {
  record: AgentRecord;
  /** This failure crossed the threshold */
  disabledNow: boolean;
}

interface AgentState {
  agentId: string;
  capabilities: string[];
  specialty: string;
  successCount: number;
  failureCount: number;
  consecutiveFailures: number;
  disabled: boolean;
  registrationIndex: number;
  registeredAt: string;
}

/** Success ratio of an agent without history */
const NEUTRAL_SUCCESS_RATIO = 0.5;

// ═══════════════════════════════════════════════════════════════════════
// AgentRegistry
// ═══════════════════════════════════════════════════════════════════════

export class AgentRegistry {
  private readonly agents = new Map<string, AgentState>();
  private readonly threshold: number;
  private readonly capabilityKeywords: Readonly<Record<string, readonly string[]>>;
  private readonly logger?: CoordinatorLogger;

  constructor(options: AgentRegistryOptions = {}) {
    this.threshold = options.consecutiveFailureThreshold ?? 3;
    this.capabilityKeywords = options.capabilityKeywords ?? DEFAULT_CAPABILITY_KEYWORDS;
    this.logger = options.logger?.child({ component: 'agent-registry' });
  }

  /**
   * @throws RegistrationError on an empty or duplicate id
   */
  register(input: RegisterAgentInput): AgentRecord {
    const agentId = input.agentId.trim();
    if (!agentId) {
      throw new RegistrationError('Agent id must be non-empty');
    }
    if (this.agents.has(agentId)) {
      throw new RegistrationError(`Agent "${agentId}" is already registered`, 'Agent ids must be unique');
    }

    const state: AgentState = {
      agentId,
      capabilities: normalizeCapabilities(input.capabilities),
      specialty: input.specialty?.trim() ?? '',
      successCount: 0,
      failureCount: 0,
      consecutiveFailures: 0,
      disabled: false,
      registrationIndex: this.agents.size,
      registeredAt: new Date().toISOString(),
    };
    this.agents.set(agentId, state);
    this.logger?.debug('Agent registered', { agentId, capabilities: state.capabilities });
    return toRecord(state);
  }

  get(agentId: string): AgentRecord | undefined {
    const state = this.agents.get(agentId);
    return state ? toRecord(state) : undefined;
  }

  has(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  /** Frozen copies, in registration order */
  list(): AgentRecord[] {
    return Array.from(this.agents.values(), toRecord);
  }

  get size(): number {
    return this.agents.size;
  }

  // ─── Counters ────────────────────────────────────────────────────────────

  recordSuccess(agentId: string): AgentRecord {
    const state = this.require(agentId);
    state.successCount++;
    state.consecutiveFailures = 0;
    return toRecord(state);
  }

  recordFailure(agentId: string): FailureOutcome {
    const state = this.require(agentId);
    state.failureCount++;
    state.consecutiveFailures++;

    const disabledNow = !state.disabled && state.consecutiveFailures > this.threshold;
    if (disabledNow) {
      state.disabled = true;
      this.logger?.warn('Agent disabled after consecutive failures', {
        agentId,
        consecutiveFailures: state.consecutiveFailures,
        threshold: this.threshold,
      });
    }
    return { record: toRecord(state), disabledNow };
  }

  disable(agentId: string): AgentRecord {
    const state = this.require(agentId);
    state.disabled = true;
    return toRecord(state);
  }

  /**
   * Re-enable an agent and clear its consecutive failures. Lifetime counters
   * are kept; they feed the success ratio.
   */
  reset(agentId: string): AgentRecord {
    const state = this.require(agentId);
    state.disabled = false;
    state.consecutiveFailures = 0;
    return toRecord(state);
  }

  resetAll(): void {
    for (const state of this.agents.values()) {
      state.disabled = false;
      state.consecutiveFailures = 0;
    }
  }

  // ─── Selection ───────────────────────────────────────────────────────────

  /**
   * Best-fit enabled agent: capability overlap × success ratio. When no
   * candidate capabilities are given they are inferred from the description.
   * Ties go to the earliest registered agent.
   */
  select(description: string, candidateCapabilities: readonly string[] = []): AgentSelectionResult {
    if (this.agents.size === 0) {
      return { selected: false, reason: 'No agents are registered' };
    }

    const enabled = [...this.agents.values()].filter((state) => !state.disabled);
    if (enabled.length === 0) {
      return { selected: false, reason: 'All registered agents are disabled' };
    }

    const required =
      candidateCapabilities.length > 0
        ? normalizeCapabilities(candidateCapabilities)
        : inferCapabilities(description, this.capabilityKeywords);

    let best: { state: AgentState; score: number; matched: string[]; ratio: number } | null = null;
    for (const state of enabled) {
      const matched = required.filter((capability) => state.capabilities.includes(capability));
      const overlap = required.length === 0 ? 1 : matched.length / required.length;
      if (overlap === 0) {
        continue;
      }
      const ratio = successRatio(state);
      const score = overlap * ratio;
      if (!best || score > best.score) {
        best = { state, score, matched, ratio };
      }
    }

    if (!best) {
      return {
        selected: false,
        reason: `No enabled agent matches the required capabilities: ${required.join(', ')}`,
      };
    }

    const reasoning =
      required.length === 0
        ? `No specific capabilities required; success ratio ${best.ratio.toFixed(2)}`
        : `Matched ${best.matched.length}/${required.length} capabilities (${best.matched.join(', ')}) with success ratio ${best.ratio.toFixed(2)}`;

    return {
      selected: true,
      selection: {
        agentId: best.state.agentId,
        score: best.score,
        matchedCapabilities: best.matched,
        successRatio: best.ratio,
        reasoning,
      },
    };
  }

  /**
   * Roster for the system prompt.
   */
  describeAgents(): string {
    return [...this.agents.values()]
      .map((state) => {
        const caps = state.capabilities.length > 0 ? ` [${state.capabilities.join(', ')}]` : '';
        const specialty = state.specialty ? `: ${state.specialty}` : '';
        return `- ${state.agentId}${specialty}${caps}${state.disabled ? ' (disabled)' : ''}`;
      })
      .join('\n');
  }

  private require(agentId: string): AgentState {
    const state = this.agents.get(agentId);
    if (!state) {
      throw new RegistrationError(`Agent "${agentId}" is not registered`);
    }
    return state;
  }
}

function successRatio(state: AgentState): number {
  const total = state.successCount + state.failureCount;
  return total === 0 ? NEUTRAL_SUCCESS_RATIO : state.successCount / total;
}

function toRecord(state: AgentState): AgentRecord {
  return Object.freeze({
    ...state,
    capabilities: Object.freeze([...state.capabilities]),
  });
}
