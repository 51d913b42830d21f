/**
 * @module task-completion
 *
 * Deterministic completion judgment and criteria presets.
 */
export { CompletionEvaluator, assessQuality, NO_EVIDENCE_MESSAGE } from './completion-evaluator.js';
export type { EvaluationInput, CompletionEvaluatorOptions } from './completion-evaluator.js';
export { HARDWARE_DESIGN_CRITERIA } from './completion-criteria.js';
