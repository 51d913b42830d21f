/**
 * @taskloom/coordinator-sdk/testing
 *
 * Test doubles for the coordinator's collaborators. Import from this
 * sub-path, never from the main index.
 *
 * @example
 *   import { createScriptedBackend, envelope, makeHandler } from '@taskloom/coordinator-sdk/testing';
 *
 * Helpers use vitest's `vi.fn()`, so vitest must be available.
 */

import { vi, type Mock } from 'vitest';
import { toEnvelope } from '@taskloom/coordinator-contracts';
import type { ToolHandlerResult, ToolParameters, ToolSchema } from '@taskloom/coordinator-contracts';
import type { GenerateRequest, LLMBackend } from './backend.js';
import type { ToolHandler, ToolHandlerContext } from './tool-handler.js';

export { createSilentLogger } from './logger.js';

// ─── Wire envelopes ───────────────────────────────────────────────────────────

export type EnvelopeCall = string | { tool: string; params?: ToolParameters; callId?: string };

/**
 * Build a `tool_calls` envelope. A bare string is a call without parameters.
 */
export function envelope(...calls: EnvelopeCall[]): string {
  return toEnvelope(
    calls.map((call) =>
      typeof call === 'string'
        ? { toolName: call }
        : { toolName: call.tool, parameters: call.params, callId: call.callId },
    ),
  );
}

// ─── Scripted backend ─────────────────────────────────────────────────────────

export type ScriptedResponse = string | Error | ((request: GenerateRequest) => string | Promise<string>);

export interface ScriptedBackend extends LLMBackend {
  /** Every request received, in order */
  readonly requests: GenerateRequest[];
  /** Responses not yet consumed */
  remaining(): number;
}

/**
 * Backend that replays `responses` in order. An `Error` entry is thrown.
 * Once the script runs out, `fallback` is returned on every call.
 */
export function createScriptedBackend(
  responses: ScriptedResponse[],
  options: { fallback?: string } = {},
): ScriptedBackend {
  const queue = [...responses];
  const requests: GenerateRequest[] = [];
  const fallback = options.fallback ?? 'No further actions.';

  return {
    requests,
    remaining: () => queue.length,
    async generate(request) {
      requests.push(request);
      const next = queue.shift();
      if (next === undefined) {
        return fallback;
      }
      if (next instanceof Error) {
        throw next;
      }
      return typeof next === 'function' ? next(request) : next;
    },
  };
}

/**
 * Backend whose `generate` never settles until its signal aborts.
 */
export function createHangingBackend(): LLMBackend & { calls: number } {
  const backend = {
    calls: 0,
    generate(request: GenerateRequest): Promise<string> {
      backend.calls += 1;
      return new Promise<string>((_, reject) => {
        request.signal.addEventListener('abort', () => reject(request.signal.reason), { once: true });
      });
    },
  };
  return backend;
}

// ─── Tool handlers ────────────────────────────────────────────────────────────

export type HandlerImpl = (
  parameters: Readonly<ToolParameters>,
  context: ToolHandlerContext,
) => ToolHandlerResult | Promise<ToolHandlerResult>;

/**
 * Handler backed by a `vi.fn()` so tests can assert on calls.
 */
export type MockHandler = ToolHandler & { handle: Mock<HandlerImpl> };

export function makeHandler(impl?: HandlerImpl): MockHandler {
  const handle = vi.fn<HandlerImpl>(impl ?? (() => ({ success: true, result: 'ok' })));
  return { handle };
}

/**
 * Handler that throws `failures` times, then succeeds with `result`.
 */
export function makeFlakyHandler(failures: number, result: unknown = 'ok'): MockHandler {
  let calls = 0;
  return makeHandler(() => {
    calls += 1;
    if (calls <= failures) {
      throw new Error(`transient failure ${calls}`);
    }
    return { success: true, result };
  });
}

/**
 * Object schema with every listed property a plain string.
 */
export function stringSchema(properties: string[], required: string[] = properties): ToolSchema {
  return {
    type: 'object',
    properties: Object.fromEntries(properties.map((name) => [name, { type: 'string' as const }])),
    required,
  };
}
