/**
 * Loop Guard
 *
 * Detects degenerate invocation patterns before they consume another
 * iteration. Works over a sliding window of the most recent invocation keys:
 *
 * 1. Exact repeat: the last M keys are identical
 * 2. Alternating: the last 2K keys are two copies of one K-length unit
 *
 * A key is the tool name, or the tool name plus a parameter signature when
 * `keyBy` is `signature`.
 */

import type { LoopGuardConfig, ToolInvocation } from '@taskloom/coordinator-contracts';
import { LoopGuardConfigSchema } from '@taskloom/coordinator-contracts';
import { fingerprint } from '@taskloom/coordinator-tools';

export type LoopPatternKind = 'exact_repeat' | 'alternating';

export type LoopCheckResult =
  | { detected: false }
  | {
      detected: true;
      kind: LoopPatternKind;
      /** Repeating unit, e.g. "write_file → run_simulation" */
      pattern: string;
      reason: string;
      /** Window keys that formed the pattern, oldest first */
      keys: string[];
    };

type GuardedInvocation = Pick<ToolInvocation, 'toolName' | 'parameters'>;

const SIGNATURE_LENGTH = 8;

export class LoopGuard {
  private readonly config: LoopGuardConfig;

  constructor(config: Partial<LoopGuardConfig> = {}) {
    this.config = LoopGuardConfigSchema.parse(config);
  }

  keyOf(invocation: GuardedInvocation): string {
    if (this.config.keyBy === 'name') {
      return invocation.toolName;
    }
    const params = Object.fromEntries(
      Object.entries(invocation.parameters).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
    const signature = fingerprint(params) ?? 'unhashable';
    return `${invocation.toolName}#${signature.slice(0, SIGNATURE_LENGTH)}`;
  }

  /**
   * Check the invocation history extended by a proposed batch.
   */
  check(history: readonly GuardedInvocation[], proposed: readonly GuardedInvocation[] = []): LoopCheckResult {
    return this.checkKeys([...history, ...proposed].map((invocation) => this.keyOf(invocation)));
  }

  checkKeys(keys: readonly string[]): LoopCheckResult {
    const window = keys.slice(-this.config.window);

    const exact = this.checkExactRepeat(window);
    if (exact.detected) {
      return exact;
    }
    return this.checkAlternating(window);
  }

  private checkExactRepeat(window: readonly string[]): LoopCheckResult {
    const m = this.config.exactRepeat;
    if (window.length < m) {
      return { detected: false };
    }
    const tail = window.slice(-m);
    const first = tail[0];
    if (first === undefined || !tail.every((key) => key === first)) {
      return { detected: false };
    }
    const name = toolNameOf(first);
    return {
      detected: true,
      kind: 'exact_repeat',
      pattern: first,
      reason: `Tool "${name}" was invoked ${m} times in a row (exact repeat: ${tail.join(' → ')})`,
      keys: tail,
    };
  }

  private checkAlternating(window: readonly string[]): LoopCheckResult {
    const maxUnit = Math.floor(this.config.window / 2);
    for (let k = this.config.minPatternLength; k <= maxUnit; k++) {
      if (window.length < 2 * k) {
        break;
      }
      const tail = window.slice(-2 * k);
      const unit = tail.slice(0, k);
      const repeat = tail.slice(k);
      const same = unit.every((key, i) => key === repeat[i]);
      if (!same || new Set(unit).size < 2) {
        continue;
      }
      const pattern = unit.join(' → ');
      return {
        detected: true,
        kind: 'alternating',
        pattern,
        reason: `Invocation pattern [${pattern}] repeated twice in a row (alternating loop over ${[
          ...new Set(unit.map(toolNameOf)),
        ].join(', ')})`,
        keys: tail,
      };
    }
    return { detected: false };
  }
}

function toolNameOf(key: string): string {
  const hash = key.lastIndexOf('#');
  return hash === -1 ? key : key.slice(0, hash);
}
