/**
 * Zod schemas for the tool-call wire envelope.
 *
 * The model is instructed to emit exactly this shape:
 *
 * ```json
 * { "tool_calls": [ { "tool_name": "write_file", "parameters": { "filename": "alu.v" } } ] }
 * ```
 */

import { z } from 'zod';

/**
 * One entry of the `tool_calls` array. `parameters` may arrive stringified.
 */
export const ToolCallEntrySchema = z
  .object({
    tool_name: z.string().trim().min(1),
    parameters: z.union([z.record(z.unknown()), z.string()]).optional(),
    call_id: z.string().optional(),
  })
  .passthrough();

/**
 * The envelope object. Entries are validated one by one so a single bad
 * entry does not discard the rest.
 */
export const ToolCallEnvelopeSchema = z
  .object({
    tool_calls: z.array(z.unknown()),
  })
  .passthrough();

export type ToolCallEntry = z.infer<typeof ToolCallEntrySchema>;
export type ToolCallEnvelope = z.infer<typeof ToolCallEnvelopeSchema>;

/**
 * Serialize invocations into the wire envelope (used by prompts and tests).
 */
export function toEnvelope(
  calls: ReadonlyArray<{ toolName: string; parameters?: Record<string, unknown>; callId?: string }>,
): string {
  return JSON.stringify({
    tool_calls: calls.map((call) => ({
      tool_name: call.toolName,
      parameters: call.parameters ?? {},
      ...(call.callId ? { call_id: call.callId } : {}),
    })),
  });
}
