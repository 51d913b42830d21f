/**
 * Capability registry — process-wide tool name → { schema, tier, handler }.
 *
 * Registration never overwrites; the schema is checked and frozen when the
 * tool is registered.
 */

import type { SecurityTier, ToolDeclaration, ToolSchema } from '@taskloom/coordinator-contracts';
import { SecurityTierSchema, ToolDeclarationSchema } from '@taskloom/coordinator-contracts';
import { RegistrationError, type ToolHandler } from '@taskloom/coordinator-sdk';
import { assertValidToolSchema } from './schema-converter.js';
import { deepFreeze } from './utils.js';

export interface RegisteredTool {
  readonly declaration: Readonly<ToolDeclaration>;
  readonly handler: ToolHandler;
}

export type ResolveResult = { found: true; tool: RegisteredTool } | { found: false; name: string };

export interface RegisterToolInput {
  name: string;
  description?: string;
  schema: ToolSchema;
  handler: ToolHandler;
  tier?: SecurityTier;
}

export class CapabilityRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  /**
   * @throws RegistrationError when the name is taken or the schema is malformed
   */
  register(input: RegisterToolInput): RegisteredTool {
    if (this.tools.has(input.name)) {
      throw new RegistrationError(`Tool "${input.name}" is already registered`, 'Tool names must be unique');
    }

    const tier = SecurityTierSchema.safeParse(input.tier ?? 'normal');
    if (!tier.success) {
      throw new RegistrationError(`Tool "${input.name}": unknown security tier "${String(input.tier)}"`);
    }
    const schema = assertValidToolSchema(input.name, input.schema);
    const declaration = ToolDeclarationSchema.safeParse({
      name: input.name,
      description: input.description ?? '',
      schema,
      tier: tier.data,
    });
    if (!declaration.success) {
      throw new RegistrationError(
        `Tool "${input.name}": ${declaration.error.issues[0]?.message ?? 'invalid declaration'}`,
      );
    }

    const tool: RegisteredTool = Object.freeze({ declaration: deepFreeze(declaration.data), handler: input.handler });
    this.tools.set(input.name, tool);
    return tool;
  }

  resolve(name: string): ResolveResult {
    const tool = this.tools.get(name);
    return tool ? { found: true, tool } : { found: false, name };
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Declarations in registration order */
  list(): ReadonlyArray<Readonly<ToolDeclaration>> {
    return Array.from(this.tools.values(), (tool) => tool.declaration);
  }

  get size(): number {
    return this.tools.size;
  }
}

/**
 * Render the tool catalog section of a system prompt.
 */
export function describeTools(declarations: ReadonlyArray<Readonly<ToolDeclaration>>): string {
  if (declarations.length === 0) {
    return 'No tools are available.';
  }
  return declarations
    .map((tool) => {
      const required = new Set(tool.schema.required ?? []);
      const params = Object.entries(tool.schema.properties).map(([name, schema]) => {
        const flags = [schema.type, required.has(name) ? 'required' : 'optional'];
        if (schema.enum) {
          flags.push(`one of ${schema.enum.join('|')}`);
        }
        const description = schema.description ? `: ${schema.description}` : '';
        return `    - ${name} (${flags.join(', ')})${description}`;
      });
      const header = `- ${tool.name}${tool.description ? `: ${tool.description}` : ''}`;
      return params.length > 0 ? `${header}\n  parameters:\n${params.join('\n')}` : header;
    })
    .join('\n');
}
