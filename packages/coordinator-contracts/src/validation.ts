/**
 * Parameter validation and repair results.
 */

import type { ToolParameters } from './tool-types.js';

export type ValidationErrorKind =
  | 'missing_required'
  | 'type_mismatch'
  | 'pattern_mismatch'
  | 'length_violation'
  | 'range_violation'
  | 'enum_violation'
  | 'extra_property'
  | 'security_violation'
  | 'unknown_tool';

export interface ValidationIssue {
  /** Dotted path of the offending field ("" for the root) */
  field: string;
  message: string;
  kind: ValidationErrorKind;
  expected?: string;
  actual?: string;
  suggestion?: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
  /** Present when auto-repair succeeded and was applied */
  repairedParameters: ToolParameters | null;
  /** 1 for valid input, 0 when no repair applies, product of technique factors otherwise */
  repairConfidence: number;
}

export type RepairTechnique =
  | 'coercion'
  | 'default_fill'
  | 'truncation'
  | 'range_clamp'
  | 'closest_enum'
  | 'extra_property_removal'
  | 'alias_mapping'
  | 'content_stripping';

export interface RepairOutcome {
  /** Repaired map, or null when repair was declined */
  repairedParameters: ToolParameters | null;
  confidence: number;
  techniques: RepairTechnique[];
  /** Issues the repairer could not fix */
  unresolved: ValidationIssue[];
}
