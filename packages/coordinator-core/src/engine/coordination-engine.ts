/**
 * CoordinationEngine — the host-facing surface.
 *
 * Owns the process-wide registries (agents, tools) and the runs of every
 * submitted task. Hosts (CLI, service, tests) call `submitTask`, poll with
 * `getTaskStatus` or await `waitForTask`, and may `cancelTask`.
 *
 * @example
 * ```typescript
 * const engine = new CoordinationEngine({ backend, config: { maxIterations: 5 } });
 * engine.registerTool({ name: 'write_file', schema, handler });
 * engine.registerAgent({ agentId: 'designer', capabilities: ['code_generation'] });
 *
 * const taskId = engine.submitTask('Design a 4-bit counter');
 * const task = await engine.waitForTask(taskId);
 * ```
 */

import { randomUUID } from 'node:crypto';
import type {
  AgentRecord,
  CompletionCriterion,
  CoordinatorConfig,
  CoordinatorConfigInput,
  Task,
  TaskSummary,
  ToolDeclaration,
} from '@taskloom/coordinator-contracts';
import { toTaskSummary } from '@taskloom/coordinator-contracts';
import {
  CoordinationError,
  UnknownTaskError,
  createLogger,
  type CoordinatorEventBus,
  type CoordinatorLogger,
  type LLMBackend,
  type TaskArchiver,
} from '@taskloom/coordinator-sdk';
import {
  CapabilityRegistry,
  ParameterValidator,
  ToolDispatcher,
  type RegisterToolInput,
} from '@taskloom/coordinator-tools';
import { AgentRegistry, type RegisterAgentInput } from '../agents/agent-registry.js';
import { resolveCoordinatorConfig } from '../config/config-loader.js';
import { createEventEmitter, stampEvent } from '../events/event-emitter.js';
import { LoopGuard } from '../executor/loop-guard.js';
import { SystemPromptBuilder } from '../prompt/system-prompt.js';
import { CompletionEvaluator } from '../task-completion/completion-evaluator.js';
import { TaskRun, type TaskRunDeps } from './task-run.js';

export interface CoordinationEngineOptions {
  backend: LLMBackend;
  /** Programmatic config; defaults fill every missing field */
  config?: CoordinatorConfigInput;
  logger?: CoordinatorLogger;
  /** Receives every task that reaches a terminal phase */
  archiver?: TaskArchiver;
  events?: CoordinatorEventBus;
  /** Default criteria for tasks submitted without their own (else `config.criteria`) */
  criteria?: readonly CompletionCriterion[];
  generateTaskId?: () => string;
}

export interface SubmitTaskOptions {
  criteria?: readonly CompletionCriterion[];
  maxIterations?: number;
}

interface TaskEntry {
  run: TaskRun;
  done: Promise<Task>;
}

export class CoordinationEngine {
  readonly config: CoordinatorConfig;
  readonly events: CoordinatorEventBus;

  private readonly agents: AgentRegistry;
  private readonly tools = new CapabilityRegistry();
  private readonly deps: TaskRunDeps;
  private readonly defaultCriteria: readonly CompletionCriterion[];
  private readonly archiver?: TaskArchiver;
  private readonly logger: CoordinatorLogger;
  private readonly generateTaskId: () => string;

  private readonly tasks = new Map<string, TaskEntry>();
  /** Terminal task ids, oldest first, for retention */
  private readonly finished: string[] = [];

  constructor(options: CoordinationEngineOptions) {
    this.config = resolveCoordinatorConfig(options.config);
    const rootLogger = options.logger ?? createLogger();
    this.logger = rootLogger.child({ component: 'coordination-engine' });
    this.events = options.events ?? createEventEmitter(rootLogger);
    this.archiver = options.archiver;
    this.defaultCriteria = options.criteria ?? this.config.criteria;
    this.generateTaskId = options.generateTaskId ?? randomUUID;

    this.agents = new AgentRegistry({
      consecutiveFailureThreshold: this.config.agents.consecutiveFailureThreshold,
      capabilityKeywords: this.config.capabilityKeywords,
      logger: rootLogger,
    });

    this.deps = {
      config: this.config,
      backend: options.backend,
      agents: this.agents,
      tools: this.tools,
      validator: new ParameterValidator({
        cacheSize: this.config.validation.cacheSize,
        sandboxRoot: this.config.validation.sandboxRoot,
        repair: this.config.repair,
        logger: rootLogger,
      }),
      dispatcher: new ToolDispatcher(this.tools, { policy: this.config.dispatcher, logger: rootLogger }),
      loopGuard: new LoopGuard(this.config.loopGuard),
      evaluator: new CompletionEvaluator({ threshold: this.config.completionThreshold }),
      promptBuilder: new SystemPromptBuilder(),
      events: this.events,
      logger: rootLogger.child({ component: 'task-run' }),
    };
  }

  // ─── Registration ──────────────────────────────────────────────────────

  /**
   * @throws RegistrationError on a duplicate name or malformed schema
   */
  registerTool(input: RegisterToolInput): Readonly<ToolDeclaration> {
    const tool = this.tools.register(input);
    this.logger.debug('Tool registered', { tool: input.name, tier: tool.declaration.tier });
    return tool.declaration;
  }

  /**
   * @throws RegistrationError on a duplicate or empty id
   */
  registerAgent(input: RegisterAgentInput): AgentRecord {
    return this.agents.register(input);
  }

  listAgents(): AgentRecord[] {
    return this.agents.list();
  }

  listTools(): ReadonlyArray<Readonly<ToolDeclaration>> {
    return this.tools.list();
  }

  /** Re-enable an agent and clear its consecutive failures */
  resetAgent(agentId: string): AgentRecord {
    return this.agents.reset(agentId);
  }

  // ─── Tasks ─────────────────────────────────────────────────────────────

  /**
   * Create a task and start coordinating it in the background.
   *
   * @returns the new task id
   * @throws CoordinationError when the request is blank or maxIterations is not a positive integer
   */
  submitTask(request: string, options: SubmitTaskOptions = {}): string {
    if (request.trim().length === 0) {
      throw new CoordinationError('validation', 'Task request must be non-empty');
    }
    const maxIterations = options.maxIterations ?? this.config.maxIterations;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new CoordinationError('validation', `maxIterations must be a positive integer, got ${maxIterations}`);
    }

    if (this.config.agents.reenableOnNewTask) {
      this.agents.resetAll();
    }

    const taskId = this.generateTaskId();
    if (this.tasks.has(taskId)) {
      throw new CoordinationError('validation', `Task id "${taskId}" is already in use`);
    }

    const run = new TaskRun(
      { taskId, request, maxIterations, criteria: options.criteria ?? this.defaultCriteria },
      this.deps,
    );

    this.logger.info('Task submitted', { taskId, maxIterations });
    this.events.emit(stampEvent({ type: 'task:submitted', taskId, data: { request, maxIterations } }));

    // Start on the next microtask so the task is listed before its first event.
    const done = Promise.resolve()
      .then(() => run.execute())
      .then(() => this.settle(run));
    this.tasks.set(taskId, { run, done });
    return taskId;
  }

  /**
   * @throws UnknownTaskError
   */
  getTaskStatus(taskId: string): Task {
    return this.entry(taskId).run.snapshot();
  }

  /**
   * @returns false when the task had already reached a terminal phase
   * @throws UnknownTaskError
   */
  cancelTask(taskId: string): boolean {
    const cancelled = this.entry(taskId).run.cancel();
    if (cancelled) {
      this.logger.info('Task cancelled', { taskId });
    }
    return cancelled;
  }

  /**
   * Resolves with the terminal snapshot once the run has stopped.
   */
  async waitForTask(taskId: string): Promise<Task> {
    return this.entry(taskId).done;
  }

  listTasks(): TaskSummary[] {
    return [...this.tasks.values()].map((entry) => toTaskSummary(entry.run.snapshot()));
  }

  /**
   * Cancel every running task and wait for all runs to stop.
   */
  async shutdown(): Promise<void> {
    const pending = [...this.tasks.values()];
    for (const entry of pending) {
      entry.run.cancel('Engine shutting down');
    }
    await Promise.all(pending.map((entry) => entry.done));
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private entry(taskId: string): TaskEntry {
    const entry = this.tasks.get(taskId);
    if (!entry) {
      throw new UnknownTaskError(taskId);
    }
    return entry;
  }

  /**
   * Archive a finished run, then evict the oldest terminal tasks beyond
   * the retention limit.
   */
  private async settle(run: TaskRun): Promise<Task> {
    const snapshot = run.snapshot();

    if (this.archiver) {
      try {
        await this.archiver.archive(snapshot);
      } catch (error) {
        this.logger.error('Failed to archive task', error, { taskId: run.taskId });
      }
    }

    this.finished.push(run.taskId);
    while (this.finished.length > this.config.retention.maxRetainedTasks) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) {
        this.tasks.delete(evicted);
        this.logger.debug('Task evicted', { taskId: evicted });
      }
    }
    return snapshot;
  }
}
