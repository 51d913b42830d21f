/**
 * ToolDispatcher — executes validated invocations with bounded retry.
 *
 * Every attempt produces exactly one immutable ToolExecutionRecord.
 * Attempts run under a per-attempt timeout and the task's AbortSignal;
 * `validation`, `permission`, `not_found` and `cancelled` failures are not
 * retried.
 */

import type {
  DispatcherConfig,
  ToolErrorKind,
  ToolExecutionError,
  ToolExecutionRecord,
  ToolHandlerResult,
  ToolInvocation,
  ToolParameters,
} from '@taskloom/coordinator-contracts';
import {
  CancelledError,
  CoordinationError,
  TimeoutError,
  errorMessage,
  retryOperation,
  withTimeout,
  type CoordinatorLogger,
} from '@taskloom/coordinator-sdk';
import type { CapabilityRegistry, RegisteredTool } from './capability-registry.js';
import { DISPATCH_CONFIG } from './config.js';
import { deepFreeze, isPlainObject, snapshotValue } from './utils.js';

export interface DispatchRequest {
  taskId: string;
  agentId: string;
  iteration: number;
  invocation: ToolInvocation;
  /** Validated (possibly repaired) parameters; defaults to the invocation's */
  parameters?: ToolParameters;
  repaired?: boolean;
  signal?: AbortSignal;
}

export interface DispatchOutcome {
  invocation: ToolInvocation;
  /** One per attempt, in attempt order */
  records: ToolExecutionRecord[];
  succeeded: boolean;
  /** Error of the last failed attempt, when the invocation failed */
  error: ToolExecutionError | null;
}

export interface ToolDispatcherOptions {
  policy?: Partial<DispatcherConfig>;
  logger?: CoordinatorLogger;
  /** Called synchronously for every record as soon as it is created */
  onRecord?: (record: ToolExecutionRecord) => void;
}

const TOOL_ERROR_KINDS: ReadonlySet<string> = new Set<ToolErrorKind>([
  'handler_error',
  'timeout',
  'not_found',
  'validation',
  'permission',
  'cancelled',
]);

const NON_RETRYABLE: ReadonlySet<ToolErrorKind> = new Set<ToolErrorKind>([
  'validation',
  'permission',
  'not_found',
  'cancelled',
]);

function isToolErrorKind(kind: string): kind is ToolErrorKind {
  return TOOL_ERROR_KINDS.has(kind);
}

/**
 * Failure of one attempt, thrown inside the retry loop so the wrapper can
 * decide whether to try again.
 */
class AttemptFailure extends CoordinationError {
  readonly detail: ToolExecutionError;

  constructor(detail: ToolExecutionError) {
    super(detail.kind, detail.message, { retryable: detail.retryable, code: detail.code, hint: detail.hint });
    this.name = 'AttemptFailure';
    this.detail = detail;
  }
}

/**
 * Classify anything a handler threw (or an attempt rejected with).
 */
export function classifyToolError(error: unknown): ToolExecutionError {
  if (error instanceof AttemptFailure) {
    return error.detail;
  }
  if (error instanceof TimeoutError) {
    return { kind: 'timeout', message: error.message, retryable: true, code: error.code };
  }
  if (error instanceof CancelledError) {
    return { kind: 'cancelled', message: error.message, retryable: false, code: error.code };
  }
  if (error instanceof CoordinationError && isToolErrorKind(error.kind)) {
    return { kind: error.kind, message: error.message, retryable: error.retryable, code: error.code, hint: error.hint };
  }
  return { kind: 'handler_error', message: errorMessage(error), retryable: true };
}

function fromHandlerFailure(error: Extract<ToolHandlerResult, { success: false }>['error']): ToolExecutionError {
  const kind = error.kind ?? 'handler_error';
  return {
    kind,
    message: error.message,
    retryable: error.retryable ?? !NON_RETRYABLE.has(kind),
    code: error.code,
    hint: error.hint,
  };
}

export class ToolDispatcher {
  private readonly policy: DispatcherConfig;
  private readonly logger?: CoordinatorLogger;
  private readonly onRecord?: (record: ToolExecutionRecord) => void;

  constructor(
    private readonly registry: CapabilityRegistry,
    options: ToolDispatcherOptions = {},
  ) {
    this.policy = { ...DISPATCH_CONFIG, ...options.policy };
    this.logger = options.logger?.child({ component: 'tool-dispatcher' });
    this.onRecord = options.onRecord;
  }

  /**
   * Dispatch one invocation. Never throws.
   */
  async dispatch(request: DispatchRequest): Promise<DispatchOutcome> {
    const { invocation } = request;
    const resolved = this.registry.resolve(invocation.toolName);

    if (!resolved.found) {
      const error: ToolExecutionError = {
        kind: 'not_found',
        message: `Tool "${invocation.toolName}" is not registered`,
        retryable: false,
        code: 'TOOL_NOT_FOUND',
      };
      const record = this.createRecord(request, 1, 0, { success: false, error });
      return { invocation, records: [record], succeeded: false, error };
    }

    const records: ToolExecutionRecord[] = [];
    const outcome = await retryOperation(
      async (attempt) => {
        const record = await this.runAttempt(resolved.tool, request, attempt);
        records.push(record);
        if (!record.success) {
          throw new AttemptFailure(record.error);
        }
        return record;
      },
      {
        maxAttempts: this.policy.maxAttempts,
        baseDelayMs: this.policy.baseDelayMs,
        maxDelayMs: this.policy.maxDelayMs,
        backoffFactor: this.policy.backoffFactor,
        signal: request.signal,
        isRetryable: (error) => classifyToolError(error).retryable,
        onAttemptFailed: (error, attempt, nextDelayMs) => {
          this.logger?.warn('Tool attempt failed', {
            taskId: request.taskId,
            tool: invocation.toolName,
            invocationId: invocation.invocationId,
            attempt,
            retryInMs: nextDelayMs,
            error: errorMessage(error),
          });
        },
      },
    );

    if (outcome.ok) {
      return { invocation, records, succeeded: true, error: null };
    }
    return { invocation, records, succeeded: false, error: classifyToolError(outcome.error) };
  }

  /**
   * Dispatch a batch with at most `maxParallel` invocations in flight.
   * Outcomes are returned in request order.
   */
  async dispatchBatch(requests: readonly DispatchRequest[], maxParallel = this.policy.maxParallel): Promise<DispatchOutcome[]> {
    const outcomes = new Array<DispatchOutcome | undefined>(requests.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < requests.length) {
        const index = cursor++;
        const request = requests[index];
        if (request) {
          outcomes[index] = await this.dispatch(request);
        }
      }
    };

    const workers = Array.from({ length: Math.max(1, Math.min(maxParallel, requests.length)) }, () => worker());
    await Promise.all(workers);
    return outcomes.filter((outcome): outcome is DispatchOutcome => outcome !== undefined);
  }

  private async runAttempt(tool: RegisteredTool, request: DispatchRequest, attempt: number): Promise<ToolExecutionRecord> {
    const { invocation } = request;
    const parameters = request.parameters ?? invocation.parameters;
    const startedAt = Date.now();

    try {
      const result = await withTimeout(
        async (signal) =>
          tool.handler.handle(parameters, {
            taskId: request.taskId,
            agentId: request.agentId,
            invocationId: invocation.invocationId,
            attempt,
            signal,
          }),
        {
          timeoutMs: this.policy.attemptTimeoutMs,
          label: `Tool "${invocation.toolName}"`,
          signal: request.signal,
        },
      );
      const elapsed = Date.now() - startedAt;
      if (result.success) {
        return this.createRecord(request, attempt, elapsed, { success: true, result: result.result });
      }
      return this.createRecord(request, attempt, elapsed, { success: false, error: fromHandlerFailure(result.error) });
    } catch (error) {
      return this.createRecord(request, attempt, Date.now() - startedAt, {
        success: false,
        error: classifyToolError(error),
      });
    }
  }

  private createRecord(
    request: DispatchRequest,
    attempt: number,
    durationMs: number,
    outcome: { success: true; result: unknown } | { success: false; error: ToolExecutionError },
  ): ToolExecutionRecord {
    const { invocation } = request;
    const base = {
      recordId: `${request.taskId}/${request.iteration}/${invocation.invocationId}/${attempt}`,
      taskId: request.taskId,
      invocationId: invocation.invocationId,
      toolName: invocation.toolName,
      agentId: request.agentId,
      iteration: request.iteration,
      attempt,
      parameters: toParameters(snapshotValue(request.parameters ?? invocation.parameters)),
      repaired: request.repaired ?? false,
      durationMs,
      timestamp: new Date().toISOString(),
    };
    const record: ToolExecutionRecord = outcome.success
      ? { ...base, success: true, result: snapshotValue(outcome.result) }
      : { ...base, success: false, error: stripUndefined(outcome.error) };

    deepFreeze(record);
    this.onRecord?.(record);
    return record;
  }
}

function toParameters(value: unknown): ToolParameters {
  return isPlainObject(value) ? value : {};
}

function stripUndefined(error: ToolExecutionError): ToolExecutionError {
  const cleaned: ToolExecutionError = { kind: error.kind, message: error.message, retryable: error.retryable };
  if (error.code !== undefined) {
    cleaned.code = error.code;
  }
  if (error.hint !== undefined) {
    cleaned.hint = error.hint;
  }
  return cleaned;
}
