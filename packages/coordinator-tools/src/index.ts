/**
 * @taskloom/coordinator-tools
 *
 * Capability registry, parameter validation and repair, tool dispatch.
 */

// Registry
export { CapabilityRegistry, describeTools } from './capability-registry.js';
export type { RegisteredTool, RegisterToolInput, ResolveResult } from './capability-registry.js';

// Validation & repair
export { ParameterValidator, formatValidationFeedback } from './parameter-validator.js';
export type { ParameterValidatorOptions, ValidateOptions } from './parameter-validator.js';
export { checkParameters, closestOption } from './parameter-checks.js';
export type { CheckOptions } from './parameter-checks.js';
export { repairParameters, repairConfidence, coerceValue } from './parameter-repairer.js';
export type { RepairOptions } from './parameter-repairer.js';
export { toZodSchema, assertValidToolSchema } from './schema-converter.js';
export {
  SECURITY_PATTERNS,
  TIER_FAMILIES,
  PATH_FIELD_NAMES,
  isPathField,
  activeFamilies,
  matchFamilies,
  sandboxViolation,
  toSandboxedName,
  stripDisallowed,
} from './security-rules.js';
export type { SecurityFamily } from './security-rules.js';

// Dispatch
export { ToolDispatcher, classifyToolError } from './tool-dispatcher.js';
export type { DispatchRequest, DispatchOutcome, ToolDispatcherOptions } from './tool-dispatcher.js';

// Config & helpers
export { REPAIR_CONFIDENCE, REPAIR_CONFIG, PARAMETER_ALIASES, VALIDATION_CONFIG, DISPATCH_CONFIG } from './config.js';
export { deepFreeze, fingerprint, snapshotValue, isPlainObject } from './utils.js';
