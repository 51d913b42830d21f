/**
 * ToolHandler — one registered capability.
 *
 * Handlers either return a `ToolHandlerResult` or throw. A thrown
 * `ToolHandlerError` keeps its kind and retryable flag; anything else is
 * classified as a retryable `handler_error`.
 */

import type { ToolHandlerResult, ToolParameters } from '@taskloom/coordinator-contracts';

export interface ToolHandlerContext {
  taskId: string;
  agentId: string;
  invocationId: string;
  /** 1-based */
  attempt: number;
  /** Aborted on attempt timeout or task cancellation */
  signal: AbortSignal;
}

export interface ToolHandler {
  handle(parameters: Readonly<ToolParameters>, context: ToolHandlerContext): Promise<ToolHandlerResult> | ToolHandlerResult;
}

/**
 * Build a failed handler result with a code, hint and retry flag.
 */
export function toolError(input: {
  code: string;
  message: string;
  kind?: 'handler_error' | 'validation' | 'permission' | 'not_found';
  retryable?: boolean;
  hint?: string;
}): ToolHandlerResult {
  return {
    success: false,
    error: {
      kind: input.kind ?? 'handler_error',
      message: `${input.code}: ${input.message}`,
      code: input.code,
      retryable: input.retryable ?? false,
      hint: input.hint,
    },
  };
}

export function toolSuccess(result: unknown): ToolHandlerResult {
  return { success: true, result };
}
