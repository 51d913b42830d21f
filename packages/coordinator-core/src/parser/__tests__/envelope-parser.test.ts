import { describe, it, expect } from 'vitest';
import { parseToolCalls } from '../envelope-parser.js';
import { decodeJson, findClosingBrace, findEnclosingObject } from '../json-scan.js';

const WRITE_ENTRY = '{"tool_name":"write_file","parameters":{"filename":"alu.v"}}';
const WRITE_ENVELOPE = `{"tool_calls":[${WRITE_ENTRY}]}`;

describe('parseToolCalls', () => {
  it('parses a top-level envelope', () => {
    const result = parseToolCalls(WRITE_ENVELOPE);

    expect(result.outcome).toBe('invocations');
    expect(result.parseOk).toBe(true);
    expect(result.diagnostics).toEqual([]);
    expect(result.invocations).toEqual([
      {
        invocationId: 'call_1',
        toolName: 'write_file',
        parameters: { filename: 'alu.v' },
        rawSourceSpan: { start: 15, end: 15 + WRITE_ENTRY.length, text: WRITE_ENTRY },
      },
    ]);
    expect(result.envelopeSpan).toEqual({ start: 0, end: WRITE_ENVELOPE.length, text: WRITE_ENVELOPE });
  });

  it('finds an envelope inside a fenced code block surrounded by prose', () => {
    const prefix = "I'll write the design file now.\n```json\n";
    const text = `${prefix}${WRITE_ENVELOPE}\n\`\`\`\nLet me know if the ports need renaming.`;

    const result = parseToolCalls(text);

    expect(result.outcome).toBe('invocations');
    expect(result.envelopeSpan?.start).toBe(prefix.length);
    expect(result.envelopeSpan?.text).toBe(WRITE_ENVELOPE);
    expect(result.invocations[0]?.rawSourceSpan.start).toBe(prefix.length + 15);
  });

  it('uses only the first closed envelope', () => {
    const second = '{"tool_calls":[{"tool_name":"run_simulation","parameters":{}}]}';
    const result = parseToolCalls(`${WRITE_ENVELOPE}\nand afterwards\n${second}`);

    expect(result.invocations.map((inv) => inv.toolName)).toEqual(['write_file']);
  });

  it('skips an unclosed envelope in favour of a later closed one', () => {
    const result = parseToolCalls(`{"tool_calls": [ oops\n${WRITE_ENVELOPE}`);

    expect(result.outcome).toBe('invocations');
    expect(result.invocations[0]?.toolName).toBe('write_file');
  });

  it('skips an echoed format template that does not decode', () => {
    const text = `I will reply in the form {"tool_calls": [...]} as asked.\n\`\`\`json\n${WRITE_ENVELOPE}\n\`\`\``;

    const result = parseToolCalls(text);

    expect(result.outcome).toBe('invocations');
    expect(result.invocations.map((inv) => inv.toolName)).toEqual(['write_file']);
    expect(result.envelopeSpan?.text).toBe(WRITE_ENVELOPE);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.startsWith('Tool call envelope is not valid JSON')).toBe(true);
  });

  it('moves past an envelope whose entries are all unusable', () => {
    const result = parseToolCalls(`{"tool_calls":[{"name":"lint"}]}\n${WRITE_ENVELOPE}`);

    expect(result.outcome).toBe('invocations');
    expect(result.invocations.map((inv) => inv.toolName)).toEqual(['write_file']);
    expect(result.diagnostics).toEqual(['Entry 0: missing or empty "tool_name"; skipped']);
  });

  it('reports the first rejected envelope when no candidate decodes', () => {
    const result = parseToolCalls('{"tool_calls": [oops]} then {"tool_calls": "lint"}');

    expect(result.outcome).toBe('malformed');
    expect(result.envelopeSpan?.text).toBe('{"tool_calls": [oops]}');
    expect(result.diagnostics).toHaveLength(2);
    expect(result.diagnostics[0]?.startsWith('Tool call envelope is not valid JSON')).toBe(true);
    expect(result.diagnostics[1]).toBe('"tool_calls" must be an array');
  });

  it('treats text without an envelope as a final answer', () => {
    const result = parseToolCalls('The ALU is complete: module alu { } handles add and sub.');

    expect(result.outcome).toBe('absent');
    expect(result.parseOk).toBe(false);
    expect(result.invocations).toEqual([]);
    expect(result.envelopeSpan).toBeNull();
  });

  it('distinguishes an explicit decline from an absent envelope', () => {
    const result = parseToolCalls('Nothing left to do. {"tool_calls": []}');

    expect(result.outcome).toBe('declined');
    expect(result.parseOk).toBe(true);
    expect(result.invocations).toEqual([]);
  });

  it('reports a truncated envelope as malformed instead of throwing', () => {
    const result = parseToolCalls('{"tool_calls": [{"tool_name": "write_file", "parameters": {"filename": "a.v"}}');

    expect(result.outcome).toBe('malformed');
    expect(result.parseOk).toBe(false);
    expect(result.diagnostics).toEqual(['Tool call envelope is not closed (unbalanced braces)']);
  });

  it('reports a closed but undecodable envelope as malformed', () => {
    const result = parseToolCalls('{"tool_calls": [oops]}');

    expect(result.outcome).toBe('malformed');
    expect(result.diagnostics[0]?.startsWith('Tool call envelope is not valid JSON')).toBe(true);
  });

  it('rejects a tool_calls value that is not an array', () => {
    const result = parseToolCalls('{"tool_calls": "write_file"}');

    expect(result.outcome).toBe('malformed');
    expect(result.diagnostics).toEqual(['"tool_calls" must be an array']);
  });

  it('skips entries without a tool name and keeps the rest', () => {
    const text = '{"tool_calls":[{"parameters":{}},{"tool_name":"run_simulation"}]}';
    const result = parseToolCalls(text);

    expect(result.outcome).toBe('invocations');
    expect(result.diagnostics).toEqual(['Entry 0: missing or empty "tool_name"; skipped']);
    expect(result.invocations).toHaveLength(1);
    expect(result.invocations[0]).toMatchObject({
      invocationId: 'call_1',
      toolName: 'run_simulation',
      parameters: {},
      rawSourceSpan: { text: '{"tool_name":"run_simulation"}' },
    });
  });

  it('is malformed when every entry is invalid', () => {
    const result = parseToolCalls('{"tool_calls":[{"name":"write_file"}]}');

    expect(result.outcome).toBe('malformed');
    expect(result.invocations).toEqual([]);
  });

  it('names the offending field of a skipped entry', () => {
    const text =
      '{"tool_calls":[{"tool_name":"write_file","parameters":[1,2]},{"tool_name":"lint","parameters":7},' +
      '"lint",{"tool_name":"lint","call_id":5}]}';

    const result = parseToolCalls(text);

    expect(result.outcome).toBe('malformed');
    expect(result.diagnostics).toEqual([
      'Entry 0: "parameters" must be an object or a JSON string; skipped',
      'Entry 1: "parameters" must be an object or a JSON string; skipped',
      'Entry 2: entry is not an object (Expected object, received string); skipped',
      'Entry 3: invalid "call_id" (Expected string, received number); skipped',
    ]);
  });

  it('keeps call ids from the envelope and numbers the rest', () => {
    const text = JSON.stringify({
      tool_calls: [
        { tool_name: 'write_file', parameters: { filename: 'a.v' }, call_id: 'abc' },
        { tool_name: 'run_simulation', parameters: {} },
      ],
    });

    const ids = parseToolCalls(text).invocations.map((inv) => inv.invocationId);

    expect(ids).toEqual(['abc', 'call_2']);
  });

  it('keeps invocation ids unique within an envelope', () => {
    const text = JSON.stringify({
      tool_calls: [
        { tool_name: 'write_file', call_id: 'w' },
        { tool_name: 'write_file', call_id: 'w' },
        { tool_name: 'lint', call_id: 'call_3' },
        { tool_name: 'lint' },
      ],
    });

    const ids = parseToolCalls(text).invocations.map((inv) => inv.invocationId);

    expect(ids).toEqual(['w', 'w_2', 'call_3', 'call_4']);
  });

  it('decodes stringified parameters', () => {
    const text = JSON.stringify({
      tool_calls: [{ tool_name: 'write_file', parameters: JSON.stringify({ filename: 'a.v' }) }],
    });

    expect(parseToolCalls(text).invocations[0]?.parameters).toEqual({ filename: 'a.v' });
  });

  it('falls back to empty parameters when the string does not decode', () => {
    const text = JSON.stringify({ tool_calls: [{ tool_name: 'write_file', parameters: 'not json' }] });
    const result = parseToolCalls(text);

    expect(result.invocations[0]?.parameters).toEqual({});
    expect(result.diagnostics).toEqual(['Entry 0: "parameters" is a string that does not decode to an object']);
  });

  it('decodes stringified values exactly one level deep', () => {
    const text = JSON.stringify({
      tool_calls: [
        {
          tool_name: 'configure',
          parameters: {
            options: JSON.stringify({ width: 8, inner: JSON.stringify({ depth: 2 }) }),
            ports: '[1, 2]',
            label: 'plain text',
            broken: '{ not json }',
          },
        },
      ],
    });

    expect(parseToolCalls(text).invocations[0]?.parameters).toEqual({
      options: { width: 8, inner: '{"depth":2}' },
      ports: [1, 2],
      label: 'plain text',
      broken: '{ not json }',
    });
  });

  it('tolerates raw newlines inside string values', () => {
    const text = '{"tool_calls":[{"tool_name":"write_file","parameters":{"content":"module a;\nendmodule"}}]}';

    expect(parseToolCalls(text).invocations[0]?.parameters).toEqual({ content: 'module a;\nendmodule' });
  });

  it('ignores braces inside string values when matching', () => {
    const text = JSON.stringify({ tool_calls: [{ tool_name: 'write_file', parameters: { content: 'a } b {' } }] });

    expect(parseToolCalls(`${text} trailing`).invocations[0]?.parameters).toEqual({ content: 'a } b {' });
  });
});

describe('json-scan', () => {
  it('finds the matching brace past nested arrays and strings', () => {
    const text = '{"a":[{"b":"}"}]} tail';
    expect(findClosingBrace(text, 0)).toBe(16);
  });

  it('returns null for an unbalanced object', () => {
    expect(findClosingBrace('{"a": [1, 2', 0)).toBeNull();
  });

  it('reports the innermost enclosing object', () => {
    const text = 'x {"outer": {"inner": 1}}';
    expect(findEnclosingObject(text, text.indexOf('"inner"'))).toEqual({ kind: 'closed', start: 12, end: 23 });
    expect(findEnclosingObject('no braces here', 5)).toEqual({ kind: 'none' });
    expect(findEnclosingObject('{"open": ', 3)).toEqual({ kind: 'unclosed', start: 0 });
  });

  it('retries decoding with control characters escaped', () => {
    expect(decodeJson('{"a":"line1\tline2"}')).toEqual({ ok: true, value: { a: 'line1\tline2' } });
    expect(decodeJson('{').ok).toBe(false);
  });
});
