/**
 * TaskRun — drives one Task through its state machine.
 *
 * One run per submitted task. Runs share the agent and capability registries
 * through `TaskRunDeps`; everything else (conversation, ledger, phase) is
 * owned by the run.
 */

import type {
  AgentResult,
  AgentResultOutcome,
  CompletionCriterion,
  CompletionEvaluation,
  CoordinatorConfig,
  EnginePhase,
  Task,
  TaskFailure,
  ToolExecutionRecord,
  ToolInvocation,
} from '@taskloom/coordinator-contracts';
import {
  CancelledError,
  errorMessage,
  retryOperation,
  withTimeout,
  type CoordinatorEventBus,
  type CoordinatorLogger,
  type LLMBackend,
} from '@taskloom/coordinator-sdk';
import {
  formatValidationFeedback,
  type CapabilityRegistry,
  type DispatchOutcome,
  type DispatchRequest,
  type ParameterValidator,
  type ToolDispatcher,
} from '@taskloom/coordinator-tools';
import type { AgentRegistry } from '../agents/agent-registry.js';
import { ConversationStore } from '../context/conversation-store.js';
import { stampEvent, type UnstampedEvent } from '../events/event-emitter.js';
import { statusOfPhase, TaskStateMachine } from '../execution/state-machine.js';
import { TaskLedger } from '../execution/task-ledger.js';
import type { LoopGuard } from '../executor/loop-guard.js';
import { parseToolCalls, type ParseResult } from '../parser/envelope-parser.js';
import type { SystemPromptBuilder } from '../prompt/system-prompt.js';
import type { CompletionEvaluator } from '../task-completion/completion-evaluator.js';

// ═══════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════

export interface TaskRunDeps {
  config: CoordinatorConfig;
  backend: LLMBackend;
  agents: AgentRegistry;
  tools: CapabilityRegistry;
  validator: ParameterValidator;
  dispatcher: ToolDispatcher;
  loopGuard: LoopGuard;
  evaluator: CompletionEvaluator;
  promptBuilder: SystemPromptBuilder;
  events: CoordinatorEventBus;
  logger: CoordinatorLogger;
}

export interface TaskRunInit {
  taskId: string;
  request: string;
  maxIterations: number;
  criteria: readonly CompletionCriterion[];
}

type TerminalPhase = Extract<EnginePhase, 'completed' | 'failed' | 'aborted'>;

/** Cap on text kept in agent results and tool result turns */
const MAX_EXCERPT_CHARS = 2_000;

// ═══════════════════════════════════════════════════════════════════════
// TaskRun
// ═══════════════════════════════════════════════════════════════════════

export class TaskRun {
  readonly taskId: string;

  private readonly deps: TaskRunDeps;
  private readonly criteria: readonly CompletionCriterion[];
  private readonly machine = new TaskStateMachine();
  private readonly ledger = new TaskLedger();
  private readonly conversation: ConversationStore;
  private readonly controller = new AbortController();
  private readonly logger: CoordinatorLogger;
  private readonly task: Task;
  /** Capabilities of criteria still missing after the last evaluation */
  private lastMissingCapabilities: string[] = [];

  constructor(init: TaskRunInit, deps: TaskRunDeps) {
    this.taskId = init.taskId;
    this.deps = deps;
    this.criteria = init.criteria;
    this.conversation = new ConversationStore(deps.config.context);
    this.logger = deps.logger.child({ taskId: init.taskId });

    const now = new Date().toISOString();
    this.task = {
      taskId: init.taskId,
      originalRequest: init.request,
      status: 'pending',
      phase: 'pending',
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      completionScore: 0,
      missingRequirements: [],
      qualityAssessment: 'poor',
      agentResults: {},
      toolExecutions: [],
      iterationCount: 0,
      maxIterations: init.maxIterations,
      currentAgentId: null,
      finalAnswer: null,
      reason: null,
      failure: null,
      phaseDurationsMs: {},
    };
  }

  get isTerminal(): boolean {
    return this.machine.isTerminal();
  }

  /**
   * Point-in-time copy of the Task record.
   */
  snapshot(): Task {
    return structuredClone({
      ...this.task,
      toolExecutions: this.ledger.getRecords(),
      phaseDurationsMs: this.machine.getPhaseDurationsMs(),
    });
  }

  /**
   * Run the coordination loop to a terminal phase. Never rejects; settles
   * once every outcome of the last iteration is recorded.
   */
  async execute(): Promise<void> {
    this.conversation.append(this.taskId, { role: 'user', content: this.task.originalRequest });

    try {
      let reuseAgent: string | null = null;
      while (!this.isTerminal) {
        reuseAgent = await this.iterate(reuseAgent);
      }
    } catch (error) {
      if (!this.isTerminal) {
        this.logger.error('Coordination loop crashed', error);
        this.finish('failed', `Internal error: ${errorMessage(error)}`, {
          kind: 'internal_error',
          reason: errorMessage(error),
        });
      }
    }
  }

  /**
   * Move to Aborted right away. In-flight calls observe the signal; their
   * outcomes are still recorded when they settle.
   *
   * @returns false when the task had already ended
   */
  cancel(reason = 'Task cancelled by request'): boolean {
    if (this.isTerminal) {
      return false;
    }
    this.finish('aborted', reason, { kind: 'cancelled', reason });
    this.controller.abort(new CancelledError(reason));
    return true;
  }

  // ─── One iteration ─────────────────────────────────────────────────────

  /**
   * @param reuseAgent - agent kept from the previous iteration, when
   *   reselection is off and that agent is still enabled
   * @returns the agent to keep for the next iteration, if any
   */
  private async iterate(reuseAgent: string | null): Promise<string | null> {
    const iteration = ++this.task.iterationCount;
    this.emit({
      type: 'iteration:start',
      taskId: this.taskId,
      data: { iteration, maxIterations: this.task.maxIterations },
    });

    let agentId: string;
    if (reuseAgent !== null) {
      agentId = reuseAgent;
    } else {
      this.transition('selecting');
      const selected = this.selectAgent();
      if (selected === null) {
        return null;
      }
      agentId = selected;
    }

    this.transition('dispatching');
    const response = await this.callBackend(agentId, iteration);
    if (this.isTerminal) {
      return null;
    }

    let outcomes: DispatchOutcome[] = [];
    let outcome: AgentResultOutcome;

    if (!response.ok) {
      outcome = 'backend_error';
    } else {
      this.conversation.append(this.taskId, { role: 'agent', content: response.text, agentId });
      const parsed = parseToolCalls(response.text);
      this.emit({
        type: 'backend:response',
        taskId: this.taskId,
        data: {
          agentId,
          iteration,
          chars: response.text.length,
          outcome: parsed.outcome,
          invocations: parsed.invocations.length,
        },
      });
      const dispatched = await this.handleParsed(parsed, response.text, agentId, iteration);
      if (dispatched === 'loop') {
        return null;
      }
      outcomes = dispatched.outcomes;
      outcome = dispatched.outcome;
    }

    // Outcomes of calls that were in flight at cancellation are kept for audit.
    this.recordOutcomes(outcomes);
    if (this.isTerminal) {
      return null;
    }

    this.transition('validating');
    this.updateAgent(agentId, iteration, outcome, response.ok ? response.text : response.error, outcomes);

    this.transition('evaluating');
    const evaluation = this.evaluate(iteration);
    if (evaluation.isCompleted) {
      this.finish('completed', `All requirements satisfied (score ${evaluation.score})`, null);
      return null;
    }
    if (iteration >= this.task.maxIterations) {
      const missing = evaluation.missingRequirements.join('; ');
      const reason =
        `Iteration budget of ${this.task.maxIterations} exhausted with score ${evaluation.score}` +
        (missing ? `; missing: ${missing}` : '');
      this.finish('failed', reason, { kind: 'iteration_budget_exhausted', reason });
      return null;
    }

    const keep = !this.deps.config.agents.reselectEachIteration && this.deps.agents.get(agentId)?.disabled === false;
    return keep ? agentId : null;
  }

  private selectAgent(): string | null {
    const result = this.deps.agents.select(this.task.originalRequest, this.lastMissingCapabilities);
    if (!result.selected) {
      const reason = `No eligible agent: ${result.reason}`;
      this.finish('failed', reason, { kind: 'agent_unavailable', reason });
      return null;
    }

    const { selection } = result;
    this.task.currentAgentId = selection.agentId;
    this.logger.info('Agent selected', {
      agentId: selection.agentId,
      score: selection.score,
      reasoning: selection.reasoning,
    });
    this.emit({
      type: 'agent:selected',
      taskId: this.taskId,
      data: {
        agentId: selection.agentId,
        score: selection.score,
        matchedCapabilities: selection.matchedCapabilities,
        reasoning: selection.reasoning,
      },
    });
    return selection.agentId;
  }

  // ─── Backend ───────────────────────────────────────────────────────────

  private async callBackend(
    agentId: string,
    iteration: number,
  ): Promise<{ ok: true; text: string } | { ok: false; error: string }> {
    const agent = this.deps.agents.get(agentId);
    const systemInstructions = this.deps.promptBuilder.build({
      agent: agent ?? { agentId, specialty: '', capabilities: [] },
      tools: this.deps.tools.list(),
      request: this.task.originalRequest,
      iteration,
      maxIterations: this.task.maxIterations,
      missingRequirements: this.task.missingRequirements,
    });
    const conversation = this.conversation.snapshot(this.taskId);
    const policy = this.deps.config.backend;

    const result = await retryOperation(
      (attempt) =>
        withTimeout(
          (signal) =>
            this.deps.backend.generate({ taskId: this.taskId, agentId, iteration, systemInstructions, conversation, signal }),
          {
            timeoutMs: policy.timeoutMs,
            label: `Backend call for agent "${agentId}" (attempt ${attempt})`,
            signal: this.controller.signal,
          },
        ),
      {
        maxAttempts: policy.maxAttempts,
        baseDelayMs: policy.baseDelayMs,
        maxDelayMs: policy.maxDelayMs,
        signal: this.controller.signal,
        onAttemptFailed: (error, attempt, nextDelayMs) => {
          this.logger.warn('Backend call failed', {
            agentId,
            iteration,
            attempt,
            retryInMs: nextDelayMs,
            error: errorMessage(error),
          });
        },
      },
    );

    if (result.ok) {
      return { ok: true, text: result.value };
    }
    return { ok: false, error: errorMessage(result.error) };
  }

  // ─── Validation, loop guard, dispatch ──────────────────────────────────

  private async handleParsed(
    parsed: ParseResult,
    text: string,
    agentId: string,
    iteration: number,
  ): Promise<{ outcome: AgentResultOutcome; outcomes: DispatchOutcome[] } | 'loop'> {
    switch (parsed.outcome) {
      case 'absent':
        this.ledger.recordAnswer(text);
        this.task.finalAnswer = text;
        return { outcome: 'answer', outcomes: [] };
      case 'declined':
        return { outcome: 'declined', outcomes: [] };
      case 'malformed':
        this.conversation.append(this.taskId, {
          role: 'user',
          content: `Your tool call envelope could not be read: ${parsed.diagnostics.join('; ')}. Reply with one valid envelope.`,
        });
        return { outcome: 'malformed', outcomes: [] };
      case 'invocations':
        break;
    }

    const requests = this.prepareRequests(parsed.invocations, agentId, iteration);

    const loop = this.deps.loopGuard.check(this.ledger.getInvocationHistory(), parsed.invocations);
    this.ledger.recordInvocations(parsed.invocations);
    if (loop.detected) {
      this.logger.warn('Loop detected', { kind: loop.kind, pattern: loop.pattern });
      this.emit({ type: 'loop:detected', taskId: this.taskId, data: { pattern: loop.pattern, reason: loop.reason } });
      this.finish('failed', loop.reason, { kind: 'loop_detected', reason: loop.reason, pattern: loop.pattern });
      return 'loop';
    }

    if (requests.length === 0) {
      return { outcome: 'validation_rejected', outcomes: [] };
    }

    const outcomes = await this.deps.dispatcher.dispatchBatch(requests, this.deps.config.dispatcher.maxParallel);
    return { outcome: 'tool_calls', outcomes };
  }

  /**
   * Validate (and possibly repair) each invocation. Rejected ones become
   * feedback turns and are not dispatched. Unknown tools are dispatched so
   * the dispatcher records the not_found failure.
   */
  private prepareRequests(invocations: readonly ToolInvocation[], agentId: string, iteration: number): DispatchRequest[] {
    const requests: DispatchRequest[] = [];
    const base = { taskId: this.taskId, agentId, iteration, signal: this.controller.signal };

    for (const invocation of invocations) {
      const resolved = this.deps.tools.resolve(invocation.toolName);
      if (!resolved.found) {
        requests.push({ ...base, invocation });
        continue;
      }

      const { declaration } = resolved.tool;
      const result = this.deps.validator.validate(declaration.schema, invocation.parameters, { tier: declaration.tier });
      if (result.isValid) {
        requests.push({ ...base, invocation });
      } else if (result.repairedParameters) {
        requests.push({ ...base, invocation, parameters: result.repairedParameters, repaired: true });
      } else {
        this.emit({
          type: 'validation:failed',
          taskId: this.taskId,
          data: {
            toolName: invocation.toolName,
            invocationId: invocation.invocationId,
            errors: result.errors,
            repairConfidence: result.repairConfidence,
          },
        });
        this.conversation.append(this.taskId, {
          role: 'tool_result',
          content: formatValidationFeedback(invocation.toolName, result.errors),
        });
      }
    }
    return requests;
  }

  // ─── Result intake ─────────────────────────────────────────────────────

  private recordOutcomes(outcomes: readonly DispatchOutcome[]): void {
    const records = outcomes.flatMap((outcome) => outcome.records);
    if (records.length === 0) {
      return;
    }
    this.ledger.appendRecords(records);
    for (const record of records) {
      this.emit({ type: 'tool:executed', taskId: this.taskId, data: { record } });
    }
    if (this.isTerminal) {
      return;
    }
    for (const outcome of outcomes) {
      this.conversation.append(this.taskId, { role: 'tool_result', content: describeOutcome(outcome) });
    }
  }

  private updateAgent(
    agentId: string,
    iteration: number,
    outcome: AgentResultOutcome,
    response: string,
    outcomes: readonly DispatchOutcome[],
  ): void {
    const { agents } = this.deps;
    if (!agents.has(agentId)) {
      return;
    }

    const succeeded = outcomes.filter((item) => item.succeeded).map((item) => item.invocation.toolName);
    const failed = outcomes.filter((item) => !item.succeeded).map((item) => item.invocation.toolName);

    if (outcome === 'answer' || outcome === 'declined') {
      agents.recordSuccess(agentId);
    } else if (outcome !== 'tool_calls') {
      this.noteFailure(agentId);
    }
    for (const item of outcomes) {
      if (item.succeeded) {
        agents.recordSuccess(agentId);
      } else {
        this.noteFailure(agentId);
      }
    }

    const result: AgentResult = {
      agentId,
      iteration,
      outcome,
      response: excerpt(response),
      toolsSucceeded: succeeded,
      toolsFailed: failed,
      timestamp: new Date().toISOString(),
    };
    this.task.agentResults[agentId] = result;
  }

  private noteFailure(agentId: string): void {
    const { record, disabledNow } = this.deps.agents.recordFailure(agentId);
    if (disabledNow) {
      this.logger.warn('Agent disabled after consecutive failures', {
        agentId,
        consecutiveFailures: record.consecutiveFailures,
      });
    }
  }

  // ─── Evaluation ────────────────────────────────────────────────────────

  private evaluate(iteration: number): CompletionEvaluation {
    const evaluation = this.deps.evaluator.evaluate(
      {
        request: this.task.originalRequest,
        executions: this.ledger.getRecords(),
        answers: this.ledger.getAnswers(),
      },
      this.criteria,
    );

    this.task.completionScore = evaluation.score;
    this.task.missingRequirements = evaluation.missingRequirements;
    this.task.qualityAssessment = evaluation.qualityAssessment;
    this.lastMissingCapabilities = evaluation.missingCapabilities;

    this.logger.info('Task evaluated', {
      iteration,
      score: evaluation.score,
      missing: evaluation.missingRequirements.length,
      completed: evaluation.isCompleted,
    });
    this.emit({
      type: 'task:evaluated',
      taskId: this.taskId,
      data: {
        iteration,
        score: evaluation.score,
        missingRequirements: evaluation.missingRequirements,
        isCompleted: evaluation.isCompleted,
      },
    });
    return evaluation;
  }

  // ─── Phase bookkeeping ─────────────────────────────────────────────────

  private transition(to: EnginePhase, reason?: string): void {
    const from = this.machine.getCurrent();
    this.machine.transition(to);
    this.task.phase = to;
    this.task.status = statusOfPhase(to);
    this.task.updatedAt = new Date().toISOString();
    this.logger.debug('Phase transition', { from, to });
    this.emit({
      type: 'task:phase',
      taskId: this.taskId,
      data: reason === undefined ? { from, to } : { from, to, reason },
    });
  }

  private finish(phase: TerminalPhase, reason: string, failure: TaskFailure | null): void {
    if (this.isTerminal) {
      return;
    }
    this.transition(phase, reason);
    this.task.reason = reason;
    this.task.failure = failure;
    this.task.completedAt = this.task.updatedAt;

    this.logger.info('Task finished', {
      status: this.task.status,
      failure: failure?.kind,
      score: this.task.completionScore,
      iterations: this.task.iterationCount,
    });
    this.emit({
      type: 'task:terminal',
      taskId: this.taskId,
      data: {
        status: this.task.status,
        failure,
        completionScore: this.task.completionScore,
        iterations: this.task.iterationCount,
      },
    });
  }

  private emit(event: UnstampedEvent): void {
    this.deps.events.emit(stampEvent(event));
  }
}

// ── helpers ──

function excerpt(text: string): string {
  return text.length > MAX_EXCERPT_CHARS ? `${text.slice(0, MAX_EXCERPT_CHARS)}…` : text;
}

function renderResult(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular or BigInt results
    return String(value);
  }
}

/**
 * Tool result turn for one dispatched invocation.
 */
export function describeOutcome(outcome: DispatchOutcome): string {
  const { invocation, records } = outcome;
  const label = `Tool "${invocation.toolName}" (${invocation.invocationId})`;
  const last: ToolExecutionRecord | undefined = records.at(-1);

  if (last?.success) {
    return `${label} succeeded: ${excerpt(renderResult(last.result))}`;
  }
  const error = outcome.error;
  const detail = error ? `${error.kind}: ${error.message}` : 'unknown error';
  const hint = error?.hint ? `\nHint: ${error.hint}` : '';
  return `${label} failed after ${records.length} attempt(s): ${detail}${hint}`;
}
