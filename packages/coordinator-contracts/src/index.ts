// ============================================
// Task Coordinator - Type Contracts
// ============================================

// Tool Types
export type {
  SecurityTier,
  ParameterType,
  ParameterSchema,
  ToolSchema,
  ToolDeclaration,
  ToolParameters,
  SourceSpan,
  ToolInvocation,
  ToolErrorKind,
  ToolExecutionError,
  ToolHandlerResult,
  ToolExecutionSuccess,
  ToolExecutionFailure,
  ToolExecutionRecord,
} from './tool-types.js';

// Validation Types
export type {
  ValidationErrorKind,
  ValidationIssue,
  ValidationResult,
  RepairTechnique,
  RepairOutcome,
} from './validation.js';

// Conversation Types
export type { TurnRole, ConversationTurn, SnapshotBudget } from './conversation.js';

// Agent Types
export type { AgentRecord, AgentSelection, AgentSelectionResult } from './agent.js';

// Completion Types
export type {
  CriterionRequirement,
  CompletionCriterion,
  QualityAssessment,
  CriterionOutcome,
  CompletionEvaluation,
} from './completion.js';

// Task Types
export type {
  TaskStatus,
  EnginePhase,
  TaskFailureKind,
  TaskFailure,
  AgentResultOutcome,
  AgentResult,
  Task,
  TaskSummary,
} from './task.js';
export { TERMINAL_PHASES, TERMINAL_STATUSES, isTerminalStatus, isTerminalPhase, toTaskSummary } from './task.js';

// Event Types
export type {
  TaskSubmittedEvent,
  TaskPhaseEvent,
  IterationStartEvent,
  AgentSelectedEvent,
  BackendResponseEvent,
  ToolExecutedEvent,
  ValidationFailedEvent,
  LoopDetectedEvent,
  TaskEvaluatedEvent,
  TaskTerminalEvent,
  CoordinatorEvent,
  CoordinatorEventType,
  CoordinatorEventCallback,
} from './events.js';

// Wire Envelope Schemas
export { ToolCallEntrySchema, ToolCallEnvelopeSchema, toEnvelope } from './envelope-schemas.js';
export type { ToolCallEntry, ToolCallEnvelope } from './envelope-schemas.js';

// Tool Declaration Schemas
export {
  SecurityTierSchema,
  ParameterTypeSchema,
  ParameterSchemaSchema,
  ToolSchemaSchema,
  ToolDeclarationSchema,
} from './tool-schemas.js';

// Configuration Schemas
export {
  CompletionCriterionSchema,
  DispatcherConfigSchema,
  BackendConfigSchema,
  AgentPolicyConfigSchema,
  LoopGuardConfigSchema,
  ContextConfigSchema,
  RepairConfigSchema,
  ValidationConfigSchema,
  RetentionConfigSchema,
  CoordinatorConfigSchema,
  DEFAULT_CAPABILITY_KEYWORDS,
} from './config-schemas.js';
export type {
  CoordinatorConfig,
  CoordinatorConfigInput,
  DispatcherConfig,
  BackendConfig,
  AgentPolicyConfig,
  LoopGuardConfig,
  ContextConfig,
  RepairConfig,
  ValidationConfig,
} from './config-schemas.js';
