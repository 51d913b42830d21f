/**
 * Zod schemas for archived task files.
 *
 * Archive files are read back from disk, so they are validated rather than
 * trusted.
 */

import { z } from 'zod';

const StatusSchema = z.enum(['pending', 'in_progress', 'completed', 'failed', 'aborted']);

const PhaseSchema = z.enum([
  'pending',
  'selecting',
  'dispatching',
  'validating',
  'evaluating',
  'completed',
  'failed',
  'aborted',
]);

const AgentResultSchema = z.object({
  agentId: z.string(),
  iteration: z.number().int(),
  outcome: z.enum(['answer', 'tool_calls', 'declined', 'malformed', 'validation_rejected', 'backend_error']),
  response: z.string(),
  toolsSucceeded: z.array(z.string()),
  toolsFailed: z.array(z.string()),
  timestamp: z.string(),
});

export const ArchivedTaskSchema = z.object({
  taskId: z.string().min(1),
  originalRequest: z.string(),
  status: StatusSchema,
  phase: PhaseSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  completionScore: z.number().min(0).max(100),
  missingRequirements: z.array(z.string()),
  qualityAssessment: z.enum(['excellent', 'good', 'fair', 'poor']),
  agentResults: z.record(AgentResultSchema),
  iterationCount: z.number().int().nonnegative(),
  maxIterations: z.number().int().positive(),
  currentAgentId: z.string().nullable(),
  finalAnswer: z.string().nullable(),
  reason: z.string().nullable(),
  failure: z
    .object({
      kind: z.enum(['loop_detected', 'iteration_budget_exhausted', 'agent_unavailable', 'cancelled', 'internal_error']),
      reason: z.string(),
      pattern: z.string().optional(),
    })
    .nullable(),
  phaseDurationsMs: z.record(PhaseSchema, z.number().nonnegative()).default({}),
});

export const ArchivedExecutionSchema = z.object({
  recordId: z.string(),
  taskId: z.string(),
  invocationId: z.string(),
  toolName: z.string(),
  agentId: z.string(),
  iteration: z.number().int(),
  attempt: z.number().int().positive(),
  parameters: z.record(z.unknown()),
  repaired: z.boolean(),
  durationMs: z.number().nonnegative(),
  timestamp: z.string(),
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z
    .object({
      kind: z.enum(['handler_error', 'timeout', 'not_found', 'validation', 'permission', 'cancelled']),
      message: z.string(),
      retryable: z.boolean(),
      code: z.string().optional(),
      hint: z.string().optional(),
    })
    .optional(),
});

export const ArchiveIndexEntrySchema = z.object({
  taskId: z.string().min(1),
  status: StatusSchema,
  completionScore: z.number(),
  createdAt: z.string(),
  completedAt: z.string().nullable(),
});

export const ArchiveIndexSchema = z.object({
  version: z.literal(1),
  tasks: z.array(ArchiveIndexEntrySchema),
});

export type ArchivedTask = z.infer<typeof ArchivedTaskSchema>;
export type ArchivedExecution = z.infer<typeof ArchivedExecutionSchema>;
export type ArchiveIndexEntry = z.infer<typeof ArchiveIndexEntrySchema>;
export type ArchiveIndex = z.infer<typeof ArchiveIndexSchema>;
