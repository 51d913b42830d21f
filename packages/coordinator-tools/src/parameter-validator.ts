/**
 * ParameterValidator — Validate(schema, parameters) → ValidationResult.
 *
 * Failed checks go to the repairer; a repair is applied only when its
 * confidence reaches the configured floor. Results are cached by
 * (schema hash, parameter hash, tier); the cache hands out clones so it
 * cannot change what callers observe.
 */

import type {
  SecurityTier,
  ToolParameters,
  ToolSchema,
  ValidationIssue,
  ValidationResult,
} from '@taskloom/coordinator-contracts';
import type { CoordinatorLogger } from '@taskloom/coordinator-sdk';
import { checkParameters } from './parameter-checks.js';
import { repairParameters, type RepairOptions } from './parameter-repairer.js';
import { PARAMETER_ALIASES, REPAIR_CONFIG, VALIDATION_CONFIG } from './config.js';
import { fingerprint } from './utils.js';

export interface ParameterValidatorOptions {
  /** Max cached results; 0 disables caching */
  cacheSize?: number;
  sandboxRoot?: string;
  repair?: {
    enabled?: boolean;
    confidenceFloor?: number;
    /** Extra spellings per parameter, tried before the built-in ones */
    aliases?: Readonly<Record<string, readonly string[]>>;
  };
  logger?: CoordinatorLogger;
}

export interface ValidateOptions {
  tier?: SecurityTier;
}

export class ParameterValidator {
  private readonly cacheSize: number;
  private readonly sandboxRoot: string;
  private readonly repairEnabled: boolean;
  private readonly confidenceFloor: number;
  private readonly aliases: Readonly<Record<string, readonly string[]>>;
  private readonly logger?: CoordinatorLogger;
  private readonly cache = new Map<string, ValidationResult>();
  private hits = 0;
  private misses = 0;

  constructor(options: ParameterValidatorOptions = {}) {
    this.cacheSize = options.cacheSize ?? VALIDATION_CONFIG.defaultCacheSize;
    this.sandboxRoot = options.sandboxRoot ?? VALIDATION_CONFIG.defaultSandboxRoot;
    this.repairEnabled = options.repair?.enabled ?? true;
    this.confidenceFloor = options.repair?.confidenceFloor ?? REPAIR_CONFIG.defaultConfidenceFloor;
    this.aliases = mergeAliases(PARAMETER_ALIASES, options.repair?.aliases ?? {});
    this.logger = options.logger?.child({ component: 'parameter-validator' });
  }

  validate(schema: ToolSchema, parameters: ToolParameters, options: ValidateOptions = {}): ValidationResult {
    const tier = options.tier ?? 'normal';
    const key = this.cacheKey(schema, parameters, tier);
    if (key !== null) {
      const cached = this.cache.get(key);
      if (cached) {
        this.hits++;
        // Refresh recency
        this.cache.delete(key);
        this.cache.set(key, cached);
        return structuredClone(cached);
      }
      this.misses++;
    }

    const result = this.compute(schema, parameters, { tier, sandboxRoot: this.sandboxRoot, aliases: this.aliases });

    if (key !== null) {
      this.cache.set(key, structuredClone(result));
      if (this.cache.size > this.cacheSize) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
          this.cache.delete(oldest.value);
        }
      }
    }
    return result;
  }

  /** Schema and security issues only, no repair. */
  check(schema: ToolSchema, parameters: unknown, options: ValidateOptions = {}): ValidationIssue[] {
    return checkParameters(schema, parameters, { tier: options.tier ?? 'normal', sandboxRoot: this.sandboxRoot });
  }

  getCacheStats(): { size: number; hits: number; misses: number } {
    return { size: this.cache.size, hits: this.hits, misses: this.misses };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private compute(schema: ToolSchema, parameters: ToolParameters, options: RepairOptions): ValidationResult {
    const errors = checkParameters(schema, parameters, options);
    if (errors.length === 0) {
      return { isValid: true, errors: [], repairedParameters: null, repairConfidence: 1 };
    }
    if (!this.repairEnabled) {
      return { isValid: false, errors, repairedParameters: null, repairConfidence: 0 };
    }

    const repair = repairParameters(schema, parameters, errors, options);
    if (repair.repairedParameters === null) {
      return { isValid: false, errors, repairedParameters: null, repairConfidence: 0 };
    }
    if (repair.confidence < this.confidenceFloor) {
      this.logger?.debug('Repair below confidence floor', {
        confidence: repair.confidence,
        floor: this.confidenceFloor,
        techniques: repair.techniques,
      });
      return { isValid: false, errors, repairedParameters: null, repairConfidence: repair.confidence };
    }
    return {
      isValid: false,
      errors,
      repairedParameters: repair.repairedParameters,
      repairConfidence: repair.confidence,
    };
  }

  private cacheKey(schema: ToolSchema, parameters: ToolParameters, tier: SecurityTier): string | null {
    if (this.cacheSize <= 0) {
      return null;
    }
    const schemaHash = fingerprint(schema);
    const paramsHash = fingerprint(parameters);
    if (schemaHash === null || paramsHash === null) {
      return null;
    }
    return `${schemaHash}:${paramsHash}:${tier}`;
  }
}

function mergeAliases(
  builtIn: Readonly<Record<string, readonly string[]>>,
  extra: Readonly<Record<string, readonly string[]>>,
): Record<string, readonly string[]> {
  const merged: Record<string, readonly string[]> = { ...builtIn };
  for (const [name, spellings] of Object.entries(extra)) {
    merged[name] = [...spellings, ...(builtIn[name] ?? [])];
  }
  return merged;
}

/**
 * Corrective feedback for the next conversation turn.
 */
export function formatValidationFeedback(toolName: string, errors: readonly ValidationIssue[]): string {
  const lines = [`Tool call "${toolName}" was not executed: its parameters are invalid.`];
  for (const error of errors) {
    let line = `- ${error.field || '(parameters)'}: ${error.message}`;
    if (error.expected) {
      line += ` (expected ${error.expected})`;
    }
    if (error.suggestion) {
      line += `. ${error.suggestion}`;
    }
    lines.push(line);
  }
  lines.push('Correct the parameters and call the tool again.');
  return lines.join('\n');
}
