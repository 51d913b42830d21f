import { describe, it, expect } from 'vitest';
import type { ToolSchema } from '@taskloom/coordinator-contracts';
import { ParameterValidator, formatValidationFeedback } from '../parameter-validator.js';

const writeFileSchema: ToolSchema = {
  type: 'object',
  properties: {
    filename: { type: 'string', format: 'path', maxLength: 64 },
    content: { type: 'string' },
    overwrite: { type: 'boolean', default: false },
  },
  required: ['filename', 'content'],
  additionalProperties: false,
};

const moduleSchema: ToolSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', pattern: '^[a-zA-Z][a-zA-Z0-9_]*$' },
    width: { type: 'integer', minimum: 1, maximum: 64 },
    mode: { type: 'string', enum: ['sync', 'async'] },
    level: { type: 'integer', default: 3 },
  },
  required: ['name', 'level'],
};

describe('ParameterValidator', () => {
  it('accepts valid parameters with full confidence', () => {
    const validator = new ParameterValidator();
    const result = validator.validate(writeFileSchema, { filename: 'alu.v', content: 'module alu; endmodule' });
    expect(result).toEqual({ isValid: true, errors: [], repairedParameters: null, repairConfidence: 1 });
  });

  describe('path traversal', () => {
    it('flags a traversal and rewrites it to a sandboxed name', () => {
      const validator = new ParameterValidator();
      const result = validator.validate(writeFileSchema, { filename: '../../etc/passwd', content: 'x' });

      expect(result.isValid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.kind).toBe('security_violation');
      expect(result.errors[0]?.field).toBe('filename');
      expect(result.repairedParameters).toEqual({ filename: 'passwd', content: 'x' });
      expect(result.repairConfidence).toBeCloseTo(0.7);
      expect(result.repairConfidence).toBeLessThan(1);
    });

    it('declines the rewrite when the confidence floor is higher', () => {
      const validator = new ParameterValidator({ repair: { confidenceFloor: 0.8 } });
      const result = validator.validate(writeFileSchema, { filename: '../../etc/passwd', content: 'x' });

      expect(result.isValid).toBe(false);
      expect(result.repairedParameters).toBeNull();
      expect(result.repairConfidence).toBeCloseTo(0.7);
    });

    it('passes file content that includes a relative path unchanged', () => {
      const validator = new ParameterValidator();
      const params = { filename: 'alu.v', content: '`include "../rtl/defs.vh"\nmodule alu; endmodule' };

      for (const tier of ['normal', 'high'] as const) {
        expect(validator.validate(writeFileSchema, params, { tier })).toEqual({
          isValid: true,
          errors: [],
          repairedParameters: null,
          repairConfidence: 1,
        });
      }
    });

    it('reports zero confidence when repair is disabled', () => {
      const validator = new ParameterValidator({ repair: { enabled: false } });
      const result = validator.validate(writeFileSchema, { filename: '../../etc/passwd', content: 'x' });
      expect(result.repairedParameters).toBeNull();
      expect(result.repairConfidence).toBe(0);
    });
  });

  describe('critical tier', () => {
    it('confines absolute paths to the sandbox root', () => {
      const validator = new ParameterValidator({ sandboxRoot: 'project' });
      const params = { filename: '/tmp/out.v', content: 'x' };

      expect(validator.validate(writeFileSchema, params, { tier: 'normal' }).isValid).toBe(true);

      const result = validator.validate(writeFileSchema, params, { tier: 'critical' });
      expect(result.isValid).toBe(false);
      expect(result.errors[0]?.message).toBe('"filename" must stay inside the sandbox root "project" (absolute path)');
      expect(result.repairedParameters).toEqual({ filename: 'out.v', content: 'x' });
    });

    it('enables code injection rules above the normal tier', () => {
      const validator = new ParameterValidator({ repair: { enabled: false } });
      const params = { filename: 'a.py', content: 'eval(input())' };

      expect(validator.validate(writeFileSchema, params, { tier: 'normal' }).isValid).toBe(true);
      const result = validator.validate(writeFileSchema, params, { tier: 'high' });
      expect(result.errors.map((error) => error.actual)).toEqual(['potential code_injection']);
    });
  });

  describe('repair techniques', () => {
    it('coerces a numeric string', () => {
      const result = new ParameterValidator().validate(moduleSchema, { name: 'alu', width: '8', level: 1 });
      expect(result.errors[0]?.kind).toBe('type_mismatch');
      expect(result.repairedParameters).toEqual({ name: 'alu', width: 8, level: 1 });
      expect(result.repairConfidence).toBeCloseTo(0.9);
    });

    it('clamps out-of-range numbers', () => {
      const result = new ParameterValidator().validate(moduleSchema, { name: 'alu', width: 128, level: 1 });
      expect(result.errors[0]).toMatchObject({ field: 'width', kind: 'range_violation', expected: '<= 64' });
      expect(result.repairedParameters).toEqual({ name: 'alu', width: 64, level: 1 });
      expect(result.repairConfidence).toBeCloseTo(0.85);
    });

    it('multiplies factors when several techniques are needed', () => {
      const result = new ParameterValidator().validate(moduleSchema, { name: 'alu', width: '128', level: 1 });
      expect(result.repairedParameters).toEqual({ name: 'alu', width: 64, level: 1 });
      expect(result.repairConfidence).toBeCloseTo(0.9 * 0.85);
    });

    it('picks the closest enum value', () => {
      const result = new ParameterValidator().validate(moduleSchema, { name: 'alu', mode: 'Sync', level: 1 });
      expect(result.errors[0]?.suggestion).toBe('Did you mean "sync"?');
      expect(result.repairedParameters).toEqual({ name: 'alu', mode: 'sync', level: 1 });
      expect(result.repairConfidence).toBeCloseTo(0.7);
    });

    it('declines when no enum value is close', () => {
      const result = new ParameterValidator().validate(moduleSchema, { name: 'alu', mode: 'banana', level: 1 });
      expect(result.errors[0]?.kind).toBe('enum_violation');
      expect(result.repairedParameters).toBeNull();
      expect(result.repairConfidence).toBe(0);
    });

    it('fills a missing field from its default', () => {
      const result = new ParameterValidator().validate(moduleSchema, { name: 'alu' });
      expect(result.repairedParameters).toEqual({ name: 'alu', level: 3 });
      expect(result.repairConfidence).toBeCloseTo(0.95);
    });

    it('cannot invent a missing field without a default', () => {
      const result = new ParameterValidator().validate(moduleSchema, { level: 3 });
      expect(result.errors).toEqual([
        {
          field: 'name',
          kind: 'missing_required',
          message: 'Missing required parameter "name"',
          expected: 'string',
          actual: 'undefined',
          suggestion: 'Provide "name"',
        },
      ]);
      expect(result.repairedParameters).toBeNull();
    });

    it('truncates strings over maxLength', () => {
      const result = new ParameterValidator().validate(writeFileSchema, { filename: 'a'.repeat(70), content: '' });
      expect(result.errors[0]?.kind).toBe('length_violation');
      expect(result.repairedParameters).toEqual({ filename: 'a'.repeat(64), content: '' });
    });

    it('removes unexpected properties', () => {
      const result = new ParameterValidator().validate(writeFileSchema, {
        filename: 'alu.v',
        content: '',
        color: 'red',
      });
      expect(result.errors[0]).toMatchObject({ field: 'color', kind: 'extra_property' });
      expect(result.repairedParameters).toEqual({ filename: 'alu.v', content: '' });
      expect(result.repairConfidence).toBeCloseTo(0.9);
    });

    it('moves a commonly used alias onto the missing parameter', () => {
      const schema: ToolSchema = {
        type: 'object',
        properties: { filename: { type: 'string' }, content: { type: 'string' } },
        required: ['filename', 'content'],
      };

      const result = new ParameterValidator().validate(schema, { file: 'alu.v', content: 'module alu; endmodule' });

      expect(result.errors.map((error) => [error.field, error.kind])).toEqual([['filename', 'missing_required']]);
      expect(result.repairedParameters).toEqual({ filename: 'alu.v', content: 'module alu; endmodule' });
      expect(result.repairConfidence).toBeCloseTo(0.8);
    });

    it('matches keys that differ only by case or separators without counting them as extra', () => {
      const result = new ParameterValidator().validate(writeFileSchema, {
        fileName: 'alu.v',
        text: 'module alu; endmodule',
      });

      expect(result.repairedParameters).toEqual({ filename: 'alu.v', content: 'module alu; endmodule' });
      expect(result.repairConfidence).toBeCloseTo(0.8);
    });

    it('uses configured aliases', () => {
      const params = { title: 'alu', level: 3 };

      expect(new ParameterValidator().validate(moduleSchema, params).repairedParameters).toBeNull();

      const validator = new ParameterValidator({ repair: { aliases: { name: ['title'] } } });
      const result = validator.validate(moduleSchema, params);
      expect(result.repairedParameters).toEqual({ name: 'alu', level: 3 });
      expect(result.repairConfidence).toBeCloseTo(0.8);
    });

    it('replaces whitespace to satisfy an identifier pattern', () => {
      const result = new ParameterValidator().validate(moduleSchema, { name: 'my counter', level: 1 });
      expect(result.errors[0]?.kind).toBe('pattern_mismatch');
      expect(result.repairedParameters).toEqual({ name: 'my_counter', level: 1 });
    });

    it('strips script content from free text', () => {
      const result = new ParameterValidator().validate(writeFileSchema, {
        filename: 'index.html',
        content: '<script>alert(1)</script>',
      });
      expect(result.repairedParameters).toEqual({ filename: 'index.html', content: '>alert(1)</script>' });
    });
  });

  describe('properties', () => {
    const inputs = [
      { name: 'alu', width: '8', level: 1 },
      { name: 'alu', width: 'wide', level: 1 },
      { name: 'my counter', mode: 'ASYNC' },
      { level: 'three' },
      { name: 7, level: 1 },
    ];

    it('validation is idempotent and unaffected by caller mutation', () => {
      const validator = new ParameterValidator();
      const params = { name: 'alu', width: '8', level: 1 };

      const first = validator.validate(moduleSchema, params);
      if (first.repairedParameters) {
        first.repairedParameters.width = 999;
      }
      const second = validator.validate(moduleSchema, params);

      expect(second).toEqual(validator.validate(moduleSchema, params));
      expect(second.repairedParameters).toEqual({ name: 'alu', width: 8, level: 1 });
      expect(params).toEqual({ name: 'alu', width: '8', level: 1 });
      expect(validator.getCacheStats().hits).toBe(2);
    });

    it('starts over after the cache is cleared', () => {
      const validator = new ParameterValidator();
      const params = { name: 'alu', level: 1 };

      validator.validate(moduleSchema, params);
      validator.validate(moduleSchema, params);
      expect(validator.getCacheStats()).toEqual({ size: 1, hits: 1, misses: 1 });

      validator.clearCache();
      expect(validator.getCacheStats().size).toBe(0);

      validator.validate(moduleSchema, params);
      expect(validator.getCacheStats()).toEqual({ size: 1, hits: 1, misses: 2 });
    });

    it('cached and uncached validators agree', () => {
      const cached = new ParameterValidator();
      const uncached = new ParameterValidator({ cacheSize: 0 });
      for (const params of inputs) {
        expect(cached.validate(moduleSchema, params)).toEqual(uncached.validate(moduleSchema, params));
        expect(cached.validate(moduleSchema, params)).toEqual(uncached.validate(moduleSchema, params));
      }
      expect(uncached.getCacheStats().size).toBe(0);
    });

    it('every applied repair passes validation', () => {
      const validator = new ParameterValidator({ repair: { confidenceFloor: 0 } });
      for (const params of inputs) {
        const result = validator.validate(moduleSchema, params);
        if (result.repairedParameters) {
          expect(validator.check(moduleSchema, result.repairedParameters)).toEqual([]);
        }
      }
    });
  });
});

describe('formatValidationFeedback', () => {
  it('renders one line per issue', () => {
    const feedback = formatValidationFeedback('write_file', [
      {
        field: 'name',
        kind: 'missing_required',
        message: 'Missing required parameter "name"',
        expected: 'string',
        suggestion: 'Provide "name"',
      },
    ]);

    expect(feedback).toBe(
      [
        'Tool call "write_file" was not executed: its parameters are invalid.',
        '- name: Missing required parameter "name" (expected string). Provide "name"',
        'Correct the parameters and call the tool again.',
      ].join('\n'),
    );
  });
});
