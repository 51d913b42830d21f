/**
 * Zod Schemas for Coordinator Configuration
 *
 * Every field has a default, so `CoordinatorConfigSchema.parse({})` yields a
 * complete configuration.
 */

import { z } from 'zod';

export const CompletionCriterionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  weight: z.number().nonnegative(),
  required: z.enum(['always', 'when_mentioned', 'never']),
  triggers: z.array(z.string()).optional(),
  satisfiedBy: z.object({
    tools: z.array(z.string()).optional(),
    keywords: z.array(z.string()).optional(),
  }),
  capabilities: z.array(z.string()).optional(),
  missingMessage: z.string().optional(),
});

export const DispatcherConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().nonnegative().default(200),
  maxDelayMs: z.number().nonnegative().default(5_000),
  backoffFactor: z.number().min(1).default(2),
  attemptTimeoutMs: z.number().int().positive().default(30_000),
  maxParallel: z.number().int().min(1).default(4),
});

export const BackendConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(60_000),
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().nonnegative().default(500),
  maxDelayMs: z.number().nonnegative().default(8_000),
});

export const AgentPolicyConfigSchema = z.object({
  consecutiveFailureThreshold: z.number().int().min(0).default(3),
  reenableOnNewTask: z.boolean().default(true),
  reselectEachIteration: z.boolean().default(true),
});

export const LoopGuardConfigSchema = z
  .object({
    window: z.number().int().min(4).max(8).default(8),
    exactRepeat: z.number().int().min(2).default(4),
    minPatternLength: z.number().int().min(2).default(2),
    keyBy: z.enum(['name', 'signature']).default('name'),
  })
  .refine((cfg) => cfg.exactRepeat <= cfg.window, {
    message: 'exactRepeat must not exceed window',
    path: ['exactRepeat'],
  });

export const ContextConfigSchema = z.object({
  maxTurns: z.number().int().min(1).default(40),
  maxChars: z.number().int().min(1).default(48_000),
  keepRecent: z.number().int().min(1).default(6),
  maxStoredTurns: z.number().int().min(1).default(200),
});

export const RepairConfigSchema = z.object({
  enabled: z.boolean().default(true),
  confidenceFloor: z.number().min(0).max(1).default(0.6),
  /** Extra spellings per declared parameter name, merged over the built-in table */
  aliases: z.record(z.array(z.string())).default({}),
});

export const ValidationConfigSchema = z.object({
  cacheSize: z.number().int().min(0).default(256),
  sandboxRoot: z.string().min(1).default('workspace'),
});

export const RetentionConfigSchema = z.object({
  maxRetainedTasks: z.number().int().min(1).default(100),
});

export const DEFAULT_CAPABILITY_KEYWORDS: Record<string, string[]> = {
  code_generation: ['design', 'implement', 'generate', 'module', 'write'],
  test_generation: ['test', 'testbench', 'coverage'],
  verification: ['verify', 'simulate', 'simulation', 'check'],
  code_review: ['review', 'analyze', 'quality', 'lint'],
  specification_analysis: ['requirement', 'specification', 'spec'],
};

export const CoordinatorConfigSchema = z.object({
  maxIterations: z.number().int().min(1).default(10),
  completionThreshold: z.number().min(0).max(100).default(80),
  dispatcher: DispatcherConfigSchema.default({}),
  backend: BackendConfigSchema.default({}),
  agents: AgentPolicyConfigSchema.default({}),
  loopGuard: LoopGuardConfigSchema.default({}),
  context: ContextConfigSchema.default({}),
  repair: RepairConfigSchema.default({}),
  validation: ValidationConfigSchema.default({}),
  retention: RetentionConfigSchema.default({}),
  capabilityKeywords: z.record(z.array(z.string())).default(DEFAULT_CAPABILITY_KEYWORDS),
  criteria: z.array(CompletionCriterionSchema).default([]),
});

export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;
export type DispatcherConfig = z.infer<typeof DispatcherConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type AgentPolicyConfig = z.infer<typeof AgentPolicyConfigSchema>;
export type LoopGuardConfig = z.infer<typeof LoopGuardConfigSchema>;
export type ContextConfig = z.infer<typeof ContextConfigSchema>;
export type RepairConfig = z.infer<typeof RepairConfigSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
