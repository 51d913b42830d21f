/**
 * Error classes shared by every coordinator package.
 *
 * Everything the coordinator throws on purpose is a `CoordinationError` with a
 * `kind`. Dispatch code maps kinds onto `ToolExecutionError`s; the engine maps
 * whatever escapes onto a Task failure, so nothing crosses the Task boundary.
 */

import type { ToolErrorKind } from '@taskloom/coordinator-contracts';

export type CoordinationErrorKind = ToolErrorKind | 'registration' | 'config' | 'unknown_task' | 'storage';

const NON_RETRYABLE_KINDS: ReadonlySet<CoordinationErrorKind> = new Set([
  'validation',
  'permission',
  'not_found',
  'cancelled',
  'registration',
  'config',
  'unknown_task',
]);

export function isRetryableKind(kind: CoordinationErrorKind): boolean {
  return !NON_RETRYABLE_KINDS.has(kind);
}

export class CoordinationError extends Error {
  readonly kind: CoordinationErrorKind;
  readonly retryable: boolean;
  readonly code?: string;
  readonly hint?: string;

  constructor(
    kind: CoordinationErrorKind,
    message: string,
    options: { retryable?: boolean; code?: string; hint?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CoordinationError';
    this.kind = kind;
    this.retryable = options.retryable ?? isRetryableKind(kind);
    this.code = options.code;
    this.hint = options.hint;
  }
}

export class TimeoutError extends CoordinationError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('timeout', `${label} timed out after ${timeoutMs}ms`, { retryable: true, code: 'TIMEOUT' });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends CoordinationError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', message, { retryable: false, code: 'CANCELLED' });
    this.name = 'CancelledError';
  }
}

/** Duplicate tool/agent registration or an invalid tool schema. */
export class RegistrationError extends CoordinationError {
  constructor(message: string, hint?: string) {
    super('registration', message, { code: 'REGISTRATION_FAILED', hint });
    this.name = 'RegistrationError';
  }
}

export class ConfigError extends CoordinationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('config', issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, {
      code: 'INVALID_CONFIG',
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class UnknownTaskError extends CoordinationError {
  readonly taskId: string;

  constructor(taskId: string) {
    super('unknown_task', `Unknown task: ${taskId}`, { code: 'UNKNOWN_TASK' });
    this.name = 'UnknownTaskError';
    this.taskId = taskId;
  }
}

export class StorageError extends CoordinationError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('storage', message, { code: 'STORAGE_ERROR', cause });
    this.name = 'StorageError';
    this.path = path;
  }
}

/**
 * Thrown by tool handlers that want to control how a failure is classified.
 */
export class ToolHandlerError extends CoordinationError {
  constructor(
    message: string,
    options: { kind?: ToolErrorKind; retryable?: boolean; code?: string; hint?: string } = {},
  ) {
    super(options.kind ?? 'handler_error', message, options);
    this.name = 'ToolHandlerError';
  }
}

export function isCoordinationError(error: unknown): error is CoordinationError {
  return error instanceof CoordinationError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error) ?? String(error);
}
