/**
 * Tool System Types
 *
 * Declarations a tool registers with, the invocations parsed from model output,
 * and the immutable execution records the dispatcher produces.
 */

/**
 * Security tier of a registered capability.
 *
 * Higher tiers switch on more of the validator's disallow-list rules.
 */
export type SecurityTier = 'normal' | 'high' | 'critical';

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object' | 'null';

/**
 * JSON-shaped schema for one parameter.
 *
 * This is the subset of JSON Schema the validator understands.
 */
export interface ParameterSchema {
  type: ParameterType;
  description?: string;
  /** Allowed string values */
  enum?: string[];
  /** Value used by the repairer when the field is missing */
  default?: unknown;
  pattern?: string;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  items?: ParameterSchema;
  minItems?: number;
  maxItems?: number;
  properties?: Record<string, ParameterSchema>;
  required?: string[];
  additionalProperties?: boolean;
  /**
   * Semantic hint. `path` marks a filesystem path, which the critical tier
   * confines to the sandbox root.
   */
  format?: 'path' | 'identifier' | 'email' | 'url';
}

/**
 * Input schema of a tool (what the model sees in the tool catalog).
 */
export interface ToolSchema {
  type: 'object';
  properties: Record<string, ParameterSchema>;
  required?: string[];
  additionalProperties?: boolean;
}

/**
 * Tool declaration as stored in the capability registry.
 */
export interface ToolDeclaration {
  /** Unique tool name (e.g. "write_file") */
  name: string;
  /** Human-readable description for the tool catalog */
  description: string;
  schema: ToolSchema;
  tier: SecurityTier;
}

export type ToolParameters = Record<string, unknown>;

/**
 * Location of an invocation inside the raw model output.
 */
export interface SourceSpan {
  start: number;
  end: number;
  text: string;
}

/**
 * One tool call extracted from model output.
 */
export interface ToolInvocation {
  /** `call_id` from the envelope, or `call_<n>` */
  invocationId: string;
  toolName: string;
  /** Keys unique, kept in first-appearance order */
  parameters: ToolParameters;
  rawSourceSpan: SourceSpan;
}

/**
 * Classified dispatch error kind.
 *
 * - `handler_error`: handler threw or reported a failure
 * - `timeout`: attempt exceeded its time limit
 * - `not_found`: tool name is not registered
 * - `validation`: handler rejected its input
 * - `permission`: handler or guard denied the operation
 * - `cancelled`: task was cancelled while the attempt was in flight
 */
export type ToolErrorKind =
  | 'handler_error'
  | 'timeout'
  | 'not_found'
  | 'validation'
  | 'permission'
  | 'cancelled';

export interface ToolExecutionError {
  kind: ToolErrorKind;
  message: string;
  retryable: boolean;
  /** Handler-specific error code (e.g. "FS_ERROR") */
  code?: string;
  hint?: string;
}

/**
 * What a tool handler returns.
 */
export type ToolHandlerResult =
  | { success: true; result: unknown }
  | {
      success: false;
      error: {
        kind?: ToolErrorKind;
        message: string;
        retryable?: boolean;
        code?: string;
        hint?: string;
      };
    };

interface ToolExecutionRecordBase {
  readonly recordId: string;
  readonly taskId: string;
  readonly invocationId: string;
  readonly toolName: string;
  readonly agentId: string;
  readonly iteration: number;
  /** 1-based attempt number within the dispatch */
  readonly attempt: number;
  readonly parameters: Readonly<ToolParameters>;
  /** Parameters were rewritten by the repairer before dispatch */
  readonly repaired: boolean;
  readonly durationMs: number;
  readonly timestamp: string;
}

export interface ToolExecutionSuccess extends ToolExecutionRecordBase {
  readonly success: true;
  readonly result: unknown;
}

export interface ToolExecutionFailure extends ToolExecutionRecordBase {
  readonly success: false;
  readonly error: Readonly<ToolExecutionError>;
}

/**
 * Outcome of one dispatch attempt. Immutable once created.
 */
export type ToolExecutionRecord = ToolExecutionSuccess | ToolExecutionFailure;
