/**
 * Zod schemas for tool declarations.
 *
 * Used at registration time to reject malformed parameter schemas before any
 * invocation is validated against them.
 */

import { z } from 'zod';
import type { ParameterSchema, ToolSchema } from './tool-types.js';

export const SecurityTierSchema = z.enum(['normal', 'high', 'critical']);

export const ParameterTypeSchema = z.enum(['string', 'number', 'integer', 'boolean', 'array', 'object', 'null']);

export const ParameterSchemaSchema: z.ZodType<ParameterSchema> = z.lazy(() =>
  z.object({
    type: ParameterTypeSchema,
    description: z.string().optional(),
    enum: z.array(z.string()).min(1).optional(),
    default: z.unknown().optional(),
    pattern: z.string().optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    items: ParameterSchemaSchema.optional(),
    minItems: z.number().int().nonnegative().optional(),
    maxItems: z.number().int().nonnegative().optional(),
    properties: z.record(ParameterSchemaSchema).optional(),
    required: z.array(z.string()).optional(),
    additionalProperties: z.boolean().optional(),
    format: z.enum(['path', 'identifier', 'email', 'url']).optional(),
  }),
);

export const ToolSchemaSchema: z.ZodType<ToolSchema> = z.object({
  type: z.literal('object'),
  properties: z.record(ParameterSchemaSchema),
  required: z.array(z.string()).optional(),
  additionalProperties: z.boolean().optional(),
});

export const ToolDeclarationSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[A-Za-z][A-Za-z0-9_:.-]*$/, 'Tool name must start with a letter and contain only letters, digits, _ : . -'),
  description: z.string(),
  schema: ToolSchemaSchema,
  tier: SecurityTierSchema,
});
