import { describe, it, expect } from 'vitest';
import {
  CoordinatorConfigSchema,
  ToolCallEntrySchema,
  ToolCallEnvelopeSchema,
  ToolDeclarationSchema,
  toEnvelope,
} from '../index.js';

describe('ToolCallEnvelopeSchema', () => {
  it('accepts an object with a tool_calls array', () => {
    const result = ToolCallEnvelopeSchema.safeParse({ tool_calls: [], note: 'extra' });
    expect(result.success).toBe(true);
  });

  it('rejects an object without tool_calls', () => {
    expect(ToolCallEnvelopeSchema.safeParse({ calls: [] }).success).toBe(false);
  });

  it('rejects a non-array tool_calls', () => {
    expect(ToolCallEnvelopeSchema.safeParse({ tool_calls: 'write_file' }).success).toBe(false);
  });
});

describe('ToolCallEntrySchema', () => {
  it('accepts stringified parameters', () => {
    const result = ToolCallEntrySchema.safeParse({ tool_name: 'write_file', parameters: '{"a":1}' });
    expect(result.success).toBe(true);
  });

  it('rejects a blank tool_name', () => {
    expect(ToolCallEntrySchema.safeParse({ tool_name: '   ' }).success).toBe(false);
  });
});

describe('toEnvelope', () => {
  it('serializes calls into the wire format', () => {
    expect(toEnvelope([{ toolName: 'read_file', parameters: { path: 'a.v' } }])).toBe(
      '{"tool_calls":[{"tool_name":"read_file","parameters":{"path":"a.v"}}]}',
    );
  });

  it('includes call_id only when given', () => {
    expect(toEnvelope([{ toolName: 'noop', callId: 'c1' }])).toBe(
      '{"tool_calls":[{"tool_name":"noop","parameters":{},"call_id":"c1"}]}',
    );
  });
});

describe('ToolDeclarationSchema', () => {
  it('accepts a nested parameter schema', () => {
    const result = ToolDeclarationSchema.safeParse({
      name: 'write_file',
      description: 'Write a file',
      tier: 'critical',
      schema: {
        type: 'object',
        properties: {
          filename: { type: 'string', format: 'path', maxLength: 128 },
          ports: { type: 'array', items: { type: 'object', properties: { name: { type: 'string' } } } },
        },
        required: ['filename'],
      },
    });
    expect(result.success).toBe(true);
  });

  it('rejects names starting with a digit', () => {
    const result = ToolDeclarationSchema.safeParse({
      name: '1tool',
      description: '',
      tier: 'normal',
      schema: { type: 'object', properties: {} },
    });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown parameter type', () => {
    const result = ToolDeclarationSchema.safeParse({
      name: 'tool',
      description: '',
      tier: 'normal',
      schema: { type: 'object', properties: { x: { type: 'date' } } },
    });
    expect(result.success).toBe(false);
  });
});

describe('CoordinatorConfigSchema', () => {
  it('fills every default from an empty object', () => {
    const config = CoordinatorConfigSchema.parse({});
    expect(config.maxIterations).toBe(10);
    expect(config.completionThreshold).toBe(80);
    expect(config.dispatcher.maxAttempts).toBe(3);
    expect(config.loopGuard).toEqual({ window: 8, exactRepeat: 4, minPatternLength: 2, keyBy: 'name' });
    expect(config.repair.confidenceFloor).toBe(0.6);
    expect(config.criteria).toEqual([]);
  });

  it('rejects a loop guard window outside 4-8', () => {
    expect(CoordinatorConfigSchema.safeParse({ loopGuard: { window: 12 } }).success).toBe(false);
  });

  it('rejects exactRepeat larger than the window', () => {
    expect(CoordinatorConfigSchema.safeParse({ loopGuard: { window: 4, exactRepeat: 5 } }).success).toBe(false);
  });
});
