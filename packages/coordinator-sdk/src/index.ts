/**
 * @taskloom/coordinator-sdk
 *
 * Collaborator interfaces and shared runtime primitives. Testing helpers
 * live in the `/testing` sub-path.
 */

// ─── Collaborators ────────────────────────────────────────────────────────────
export type { GenerateRequest, LLMBackend } from './backend.js';
export type { ToolHandler, ToolHandlerContext } from './tool-handler.js';
export { toolError, toolSuccess } from './tool-handler.js';
export type { FileStore } from './file-store.js';
export { loadText } from './file-store.js';
export type { TaskArchiver } from './archiver.js';
export type { CoordinatorEventBus, CoordinatorEventOf, Unsubscribe } from './event-bus.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  CoordinationError,
  TimeoutError,
  CancelledError,
  RegistrationError,
  ConfigError,
  UnknownTaskError,
  StorageError,
  ToolHandlerError,
  isCoordinationError,
  isRetryableKind,
  errorMessage,
} from './errors.js';
export type { CoordinationErrorKind } from './errors.js';

// ─── Retry & timeouts ─────────────────────────────────────────────────────────
export { retryOperation, computeBackoffDelay, defaultIsRetryable } from './retry.js';
export type { BackoffPolicy, RetryOptions, RetryOutcome } from './retry.js';
export { sleep, withTimeout, throwIfAborted } from './async.js';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { createLogger, createSilentLogger, createPinoLogger, wrapPino } from './logger.js';
export type { CoordinatorLogger, LoggerConfig, LogLevel, PinoLogger } from './logger.js';
