/**
 * Centralized constants for validation, repair and dispatch.
 */

import type { RepairTechnique } from '@taskloom/coordinator-contracts';

// ═══════════════════════════════════════════════════════════════════════════
// Repair config
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Confidence factor per repair technique. A repair's confidence is the
 * product of the factors of the distinct techniques it used.
 */
export const REPAIR_CONFIDENCE: Readonly<Record<RepairTechnique, number>> = {
  coercion: 0.9,
  default_fill: 0.95,
  truncation: 0.85,
  range_clamp: 0.85,
  closest_enum: 0.7,
  extra_property_removal: 0.9,
  alias_mapping: 0.8,
  content_stripping: 0.7,
};

export const REPAIR_CONFIG = {
  /** Repair/re-validate rounds before giving up */
  maxRounds: 3,
  /** Minimum confidence for a repair to be applied automatically */
  defaultConfidenceFloor: 0.6,
  /** Truthy/falsy spellings accepted when coercing to boolean */
  trueWords: ['true', 'yes', 'on', '1'] as readonly string[],
  falseWords: ['false', 'no', 'off', '0'] as readonly string[],
} as const;

/**
 * Spellings models commonly use for a declared parameter. A missing
 * parameter is filled from an undeclared key listed here for it; keys that
 * differ only by case, `_` or `-` match without an entry.
 */
export const PARAMETER_ALIASES: Readonly<Record<string, readonly string[]>> = {
  filename: ['file', 'file_name', 'filepath', 'file_path', 'path', 'name'],
  filepath: ['file_path', 'path', 'file', 'filename'],
  path: ['file_path', 'filepath', 'file', 'filename', 'dir', 'directory'],
  content: ['text', 'body', 'code', 'source', 'contents', 'data'],
  module_name: ['module', 'name', 'top', 'top_module'],
  testbench: ['tb', 'test_bench', 'testbench_file'],
};

// ═══════════════════════════════════════════════════════════════════════════
// Validation config
// ═══════════════════════════════════════════════════════════════════════════

export const VALIDATION_CONFIG = {
  /** Cached validation results (0 disables the cache) */
  defaultCacheSize: 256,
  /** Nesting depth the security scan descends to */
  maxScanDepth: 8,
  defaultSandboxRoot: 'workspace',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Dispatch config
// ═══════════════════════════════════════════════════════════════════════════

export const DISPATCH_CONFIG = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  backoffFactor: 2,
  attemptTimeoutMs: 30_000,
  maxParallel: 4,
} as const;
