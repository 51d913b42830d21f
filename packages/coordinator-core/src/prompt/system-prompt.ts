/**
 * Builds the system instructions for one backend call.
 *
 * Pure string assembly from provided data; no backend calls or registry access.
 */

import type { AgentRecord, ToolDeclaration } from '@taskloom/coordinator-contracts';
import { toEnvelope } from '@taskloom/coordinator-contracts';
import { describeTools } from '@taskloom/coordinator-tools';

export interface SystemPromptInput {
  agent: Pick<AgentRecord, 'agentId' | 'specialty' | 'capabilities'>;
  tools: ReadonlyArray<Readonly<ToolDeclaration>>;
  request: string;
  iteration: number;
  maxIterations: number;
  /** Requirements the completion evaluator still reports missing */
  missingRequirements?: readonly string[];
}

export const ENVELOPE_EXAMPLE = toEnvelope([{ toolName: 'tool_name', parameters: { param: 'value' } }]);

const TOOL_CALL_RULES = `# Calling tools
To call tools, reply with a JSON object of exactly this shape (a \`\`\`json block is fine):
${ENVELOPE_EXAMPLE}

Rules:
- Use only the tools listed above, with parameters that match their schemas.
- Entries in "tool_calls" may run in parallel. Do not make one entry depend on another's output.
- To finish without calling a tool, reply with your final answer in plain text, or with {"tool_calls": []}.
- Do not repeat a call that already succeeded. Repeating the same calls ends the task as failed.
- If a call is rejected, fix its parameters as the feedback describes and call it again.`;

export class SystemPromptBuilder {
  build(input: SystemPromptInput): string {
    const sections: string[] = [buildRoleSection(input.agent)];

    sections.push(`# Task\n${input.request}`);

    let progress = `# Progress\nIteration ${input.iteration} of ${input.maxIterations}.`;
    if (input.missingRequirements && input.missingRequirements.length > 0) {
      progress += `\nStill missing:\n${input.missingRequirements.map((item) => `- ${item}`).join('\n')}`;
    }
    sections.push(progress);

    sections.push(`# Available tools\n${describeTools(input.tools)}`);
    sections.push(TOOL_CALL_RULES);

    return sections.join('\n\n');
  }
}

// ── helpers ──────────────────────────────────────────────────────────

function buildRoleSection(agent: SystemPromptInput['agent']): string {
  const lines = [`You are ${agent.agentId}, a specialist agent working on one part of a larger task.`];
  if (agent.specialty) {
    lines.push(`Specialty: ${agent.specialty}`);
  }
  if (agent.capabilities.length > 0) {
    lines.push(`Capabilities: ${agent.capabilities.join(', ')}`);
  }
  return lines.join('\n');
}
