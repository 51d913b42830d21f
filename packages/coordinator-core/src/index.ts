/**
 * @taskloom/coordinator-core
 *
 * Task coordination engine and the pieces it drives
 */

// Engine
export { CoordinationEngine } from './engine/coordination-engine.js';
export type { CoordinationEngineOptions, SubmitTaskOptions } from './engine/coordination-engine.js';
export { TaskRun, describeOutcome } from './engine/task-run.js';
export type { TaskRunDeps, TaskRunInit } from './engine/task-run.js';

// Envelope parsing
export { parseToolCalls } from './parser/envelope-parser.js';
export type { ParseOutcome, ParseResult } from './parser/envelope-parser.js';
export { findClosingBrace, findEnclosingObject, escapeControlCharsInStrings, decodeJson } from './parser/json-scan.js';
export type { EnclosingObject } from './parser/json-scan.js';

// Conversation history
export { ConversationStore, compactTurns } from './context/conversation-store.js';
export type { AppendTurnInput, CompactionPolicy } from './context/conversation-store.js';

// Agents
export { AgentRegistry } from './agents/agent-registry.js';
export type { RegisterAgentInput, AgentRegistryOptions, FailureOutcome } from './agents/agent-registry.js';
export { inferCapabilities, normalizeCapabilities } from './agents/capability-inference.js';

// Loop guard
export { LoopGuard } from './executor/loop-guard.js';
export type { LoopCheckResult, LoopPatternKind } from './executor/loop-guard.js';

// Completion judgment
export * from './task-completion/index.js';

// Execution primitives - state machine and ledger
export { TaskStateMachine, statusOfPhase } from './execution/state-machine.js';
export { TaskLedger } from './execution/task-ledger.js';

// Prompt construction
export { SystemPromptBuilder, ENVELOPE_EXAMPLE } from './prompt/system-prompt.js';
export type { SystemPromptInput } from './prompt/system-prompt.js';

// Events
export { createEventEmitter, stampEvent, isEventOf } from './events/event-emitter.js';
export type { UnstampedEvent } from './events/event-emitter.js';

// Configuration
export { resolveCoordinatorConfig, parseCoordinatorConfig, loadCoordinatorConfig } from './config/config-loader.js';
