/**
 * Parameter Schema to Zod Schema Converter
 *
 * Converts the JSON-shaped parameter schemas tools declare into Zod schemas
 * for runtime validation. Object schemas reject unknown keys only when
 * `additionalProperties: false`.
 */

import { z } from 'zod';
import type { ParameterSchema, ToolSchema } from '@taskloom/coordinator-contracts';
import { ToolSchemaSchema } from '@taskloom/coordinator-contracts';
import { RegistrationError } from '@taskloom/coordinator-sdk';

/**
 * Convert a parameter or tool schema to a Zod schema.
 */
export function toZodSchema(schema: ParameterSchema | ToolSchema): z.ZodTypeAny {
  switch (schema.type) {
    case 'object':
      return convertObject(schema);
    case 'array':
      return convertArray(schema);
    case 'string':
      return convertString(schema);
    case 'number':
    case 'integer':
      return convertNumber(schema);
    case 'boolean':
      return z.boolean();
    case 'null':
      return z.null();
  }
}

function convertObject(schema: ParameterSchema | ToolSchema): z.ZodTypeAny {
  const properties = schema.properties ?? {};
  const required = new Set(schema.required ?? []);
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [key, propSchema] of Object.entries(properties)) {
    let zodType = toZodSchema(propSchema);
    if (!required.has(key)) {
      zodType = zodType.optional();
    }
    if (propSchema.description) {
      zodType = zodType.describe(propSchema.description);
    }
    shape[key] = zodType;
  }

  // Required keys without a property schema still have to be present
  for (const key of required) {
    if (!(key in shape)) {
      shape[key] = z.unknown().refine((value) => value !== undefined, {
        message: 'Required',
        params: { kind: 'missing_required' },
      });
    }
  }

  const object = z.object(shape);
  return schema.additionalProperties === false ? object.strict() : object.passthrough();
}

function convertArray(schema: ParameterSchema): z.ZodTypeAny {
  let result = z.array(schema.items ? toZodSchema(schema.items) : z.unknown());
  if (schema.minItems !== undefined) {
    result = result.min(schema.minItems);
  }
  if (schema.maxItems !== undefined) {
    result = result.max(schema.maxItems);
  }
  return result;
}

function convertString(schema: ParameterSchema): z.ZodTypeAny {
  const [first, ...rest] = schema.enum ?? [];
  if (first !== undefined) {
    return z.enum([first, ...rest]);
  }

  let result = z.string();
  if (schema.minLength !== undefined) {
    result = result.min(schema.minLength);
  }
  if (schema.maxLength !== undefined) {
    result = result.max(schema.maxLength);
  }
  if (schema.pattern) {
    result = result.regex(new RegExp(schema.pattern));
  }
  switch (schema.format) {
    case 'email':
      result = result.email();
      break;
    case 'url':
      result = result.url();
      break;
    default:
      break;
  }
  return result;
}

function convertNumber(schema: ParameterSchema): z.ZodTypeAny {
  let result = schema.type === 'integer' ? z.number().int() : z.number();
  if (schema.minimum !== undefined) {
    result = result.min(schema.minimum);
  }
  if (schema.maximum !== undefined) {
    result = result.max(schema.maximum);
  }
  return result;
}

/**
 * Check that a tool schema is well-formed and convertible.
 *
 * @throws RegistrationError listing the first problem found
 */
export function assertValidToolSchema(toolName: string, schema: unknown): ToolSchema {
  const parsed = ToolSchemaSchema.safeParse(schema);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new RegistrationError(
      `Tool "${toolName}": invalid parameter schema${where}: ${issue?.message ?? 'unknown error'}`,
      'Parameter schemas must be objects of typed properties',
    );
  }

  for (const [field, pattern] of collectPatterns(parsed.data)) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new RegistrationError(
        `Tool "${toolName}": invalid pattern for "${field}": ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return parsed.data;
}

function collectPatterns(schema: ParameterSchema | ToolSchema, prefix = ''): Array<[string, string]> {
  const found: Array<[string, string]> = [];
  if ('pattern' in schema && schema.pattern !== undefined) {
    found.push([prefix || '(root)', schema.pattern]);
  }
  for (const [key, child] of Object.entries(schema.properties ?? {})) {
    found.push(...collectPatterns(child, prefix ? `${prefix}.${key}` : key));
  }
  if ('items' in schema && schema.items) {
    found.push(...collectPatterns(schema.items, `${prefix}[]`));
  }
  return found;
}
