/**
 * Tool Capability Table
 *
 * Tools are registered by name with a Zod schema for their arguments.
 * Execution never throws: argument errors, unknown names and exceptions
 * inside a tool come back as the failure variant of ToolResult.
 */

import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

export type ToolResult = { success: true; output: string } | { success: false; error: string };

export interface Tool<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  /** Shown to the model in the tools section of the prompt */
  description: string;
  parameters: TSchema;
  /** Domain failures are returned as text; throwing means the tool itself broke */
  execute(input: z.infer<TSchema>): string | Promise<string>;
}

/**
 * Identity helper that ties `execute`'s input type to the schema.
 *
 * @example
 * ```typescript
 * const echo = defineTool({
 *   name: 'echo',
 *   description: 'Repeat the text',
 *   parameters: z.object({ text: z.string() }),
 *   execute: ({ text }) => text,
 * });
 * ```
 */
export function defineTool<TSchema extends z.ZodTypeAny>(tool: Tool<TSchema>): Tool<TSchema> {
  return tool;
}

// ============================================================================
// Registry
// ============================================================================

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * @throws Error when a tool with the same name is already registered
   */
  register(tool: Tool): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /**
   * Validate arguments and run a tool.
   */
  async execute(name: string, rawArgs: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, error: `Tool ${name} not found.` };
    }

    const parsed = tool.parameters.safeParse(rawArgs ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      return { success: false, error: `Invalid arguments for ${name}: ${issues}` };
    }

    try {
      const output: string = await tool.execute(parsed.data);
      return { success: true, output };
    } catch (error) {
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Tools section for prompts.
   *
   * @example
   * Available Tools:
   * - search_code(query): Search the source files for a literal string...
   */
  describe(): string {
    const lines = ['Available Tools:'];
    for (const tool of this.tools.values()) {
      const params =
        tool.parameters instanceof z.ZodObject ? Object.keys(tool.parameters.shape).join(', ') : '';
      lines.push(`- ${tool.name}(${params}): ${tool.description}`);
    }
    return lines.join('\n');
  }
}
