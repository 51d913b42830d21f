/**
 * LLMBackend — the model collaborator.
 *
 * One `generate` call per coordination iteration. The engine supplies the
 * system instructions (tool catalog + behavioral rules) and the compacted
 * conversation; the backend returns raw text.
 */

import type { ConversationTurn } from '@taskloom/coordinator-contracts';

export interface GenerateRequest {
  taskId: string;
  agentId: string;
  iteration: number;
  systemInstructions: string;
  conversation: readonly ConversationTurn[];
  /** Aborted on timeout or task cancellation */
  signal: AbortSignal;
}

export interface LLMBackend {
  generate(request: GenerateRequest): Promise<string>;
}
