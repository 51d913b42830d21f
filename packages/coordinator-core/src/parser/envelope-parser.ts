/**
 * Tool-call envelope parser.
 *
 * Extracts `ToolInvocation`s from raw model output. The envelope
 * (`{"tool_calls": [...]}`) may sit at top level, inside a fenced code block,
 * or anywhere in prose. The first closed envelope that decodes to at least
 * one usable entry counts; earlier candidates that fail (a format template
 * echoed back, say) are recorded as diagnostics and skipped.
 *
 * Absence of a call is data, not an error: the outcome says whether the
 * model called tools, declined explicitly, gave a plain answer, or produced
 * an envelope that could not be decoded.
 */

import type { SourceSpan, ToolInvocation, ToolParameters } from '@taskloom/coordinator-contracts';
import { ToolCallEntrySchema, ToolCallEnvelopeSchema } from '@taskloom/coordinator-contracts';
import { isPlainObject } from '@taskloom/coordinator-tools';
import type { ZodIssue } from 'zod';
import { decodeJson, findEnclosingObject } from './json-scan.js';

/**
 * - `invocations`: at least one usable tool call
 * - `declined`: envelope with an empty `tool_calls` array
 * - `absent`: no envelope; the text is a final answer
 * - `malformed`: an envelope was started but is unclosed or undecodable
 */
export type ParseOutcome = 'invocations' | 'declined' | 'absent' | 'malformed';

export interface ParseResult {
  outcome: ParseOutcome;
  /** true for `invocations` and `declined` */
  parseOk: boolean;
  invocations: ToolInvocation[];
  /** Problems found while decoding (skipped entries, bad parameters) */
  diagnostics: string[];
  envelopeSpan: SourceSpan | null;
}

const ENVELOPE_KEY = '"tool_calls"';
const ENTRY_KEY = '"tool_name"';

export function parseToolCalls(text: string): ParseResult {
  const diagnostics: string[] = [];
  let sawUnclosed = false;
  let firstRejected: SourceSpan | null = null;

  let at = text.indexOf(ENVELOPE_KEY);
  while (at !== -1) {
    const container = findEnclosingObject(text, at);
    if (container.kind !== 'closed') {
      sawUnclosed = sawUnclosed || container.kind === 'unclosed';
      at = text.indexOf(ENVELOPE_KEY, at + ENVELOPE_KEY.length);
      continue;
    }

    const span: SourceSpan = {
      start: container.start,
      end: container.end + 1,
      text: text.slice(container.start, container.end + 1),
    };
    const decoded = decodeEnvelope(span, diagnostics);
    if (decoded.outcome !== 'malformed') {
      return decoded;
    }
    firstRejected = firstRejected ?? span;
    // Resume after the rejected object; occurrences inside it belong to it.
    at = text.indexOf(ENVELOPE_KEY, Math.max(container.end + 1, at + ENVELOPE_KEY.length));
  }

  if (firstRejected) {
    return result('malformed', [], diagnostics, firstRejected);
  }
  if (sawUnclosed) {
    diagnostics.push('Tool call envelope is not closed (unbalanced braces)');
    return result('malformed', [], diagnostics, null);
  }
  return result('absent', [], diagnostics, null);
}

function decodeEnvelope(span: SourceSpan, diagnostics: string[]): ParseResult {
  const decoded = decodeJson(span.text);
  if (!decoded.ok) {
    diagnostics.push(`Tool call envelope is not valid JSON: ${decoded.error}`);
    return result('malformed', [], diagnostics, span);
  }

  const envelope = ToolCallEnvelopeSchema.safeParse(decoded.value);
  if (!envelope.success) {
    diagnostics.push('"tool_calls" must be an array');
    return result('malformed', [], diagnostics, span);
  }

  const entries = envelope.data.tool_calls;
  if (entries.length === 0) {
    return result('declined', [], diagnostics, span);
  }

  const invocations: ToolInvocation[] = [];
  const usedIds = new Set<string>();
  let cursor = 0;

  entries.forEach((raw, index) => {
    const entry = ToolCallEntrySchema.safeParse(raw);
    if (!entry.success) {
      diagnostics.push(`Entry ${index}: ${describeEntryIssue(entry.error.issues[0])}; skipped`);
      return;
    }
    const parameters = normalizeParameters(entry.data.parameters, index, diagnostics);
    const located = locateEntry(span, entry.data.tool_name, cursor);
    if (located) {
      cursor = located.next;
    }
    const invocationId = uniqueId(entry.data.call_id ?? `call_${invocations.length + 1}`, usedIds);
    usedIds.add(invocationId);
    invocations.push({
      invocationId,
      toolName: entry.data.tool_name,
      parameters,
      rawSourceSpan: located?.span ?? span,
    });
  });

  if (invocations.length === 0) {
    return result('malformed', [], diagnostics, span);
  }
  return result('invocations', invocations, diagnostics, span);
}

function describeEntryIssue(issue: ZodIssue | undefined): string {
  const field = issue?.path[0];
  switch (field) {
    case 'tool_name':
      return 'missing or empty "tool_name"';
    case 'parameters':
      return '"parameters" must be an object or a JSON string';
    case undefined:
      return `entry is not an object${issue ? ` (${issue.message})` : ''}`;
    default:
      return `invalid "${String(field)}" (${issue?.message ?? 'unknown issue'})`;
  }
}

/**
 * Invocation ids must be unique within an envelope; repeats get a suffix.
 */
function uniqueId(candidate: string, used: ReadonlySet<string>): string {
  if (!used.has(candidate)) {
    return candidate;
  }
  let suffix = 2;
  while (used.has(`${candidate}_${suffix}`)) {
    suffix++;
  }
  return `${candidate}_${suffix}`;
}

/**
 * Accept a parameter map or its stringified form, then decode one level of
 * stringified object/array values.
 */
function normalizeParameters(raw: ToolParameters | string | undefined, index: number, diagnostics: string[]): ToolParameters {
  let parameters: ToolParameters = {};
  if (typeof raw === 'string') {
    const decoded = decodeJson(raw);
    if (decoded.ok && isPlainObject(decoded.value)) {
      parameters = decoded.value;
    } else {
      diagnostics.push(`Entry ${index}: "parameters" is a string that does not decode to an object`);
    }
  } else if (raw) {
    parameters = raw;
  }

  const normalized: ToolParameters = {};
  for (const [key, value] of Object.entries(parameters)) {
    normalized[key] = decodeNested(value);
  }
  return normalized;
}

function decodeNested(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  const looksStructured =
    (trimmed.startsWith('{') && trimmed.endsWith('}')) || (trimmed.startsWith('[') && trimmed.endsWith(']'));
  if (!looksStructured) {
    return value;
  }
  const decoded = decodeJson(trimmed);
  return decoded.ok && (isPlainObject(decoded.value) || Array.isArray(decoded.value)) ? decoded.value : value;
}

/**
 * Span of the next object after `from` whose `tool_name` is `toolName`.
 */
function locateEntry(envelope: SourceSpan, toolName: string, from: number): { span: SourceSpan; next: number } | null {
  const { text } = envelope;
  for (let at = text.indexOf(ENTRY_KEY, from); at !== -1; at = text.indexOf(ENTRY_KEY, at + ENTRY_KEY.length)) {
    const entry = findEnclosingObject(text, at);
    if (entry.kind !== 'closed' || entry.start === 0) {
      continue;
    }
    const slice = text.slice(entry.start, entry.end + 1);
    const decoded = decodeJson(slice);
    if (decoded.ok && isPlainObject(decoded.value) && decoded.value['tool_name'] === toolName) {
      return {
        span: { start: envelope.start + entry.start, end: envelope.start + entry.end + 1, text: slice },
        next: entry.end + 1,
      };
    }
  }
  return null;
}

function result(
  outcome: ParseOutcome,
  invocations: ToolInvocation[],
  diagnostics: string[],
  envelopeSpan: SourceSpan | null,
): ParseResult {
  return {
    outcome,
    parseOk: outcome === 'invocations' || outcome === 'declined',
    invocations,
    diagnostics,
    envelopeSpan,
  };
}
