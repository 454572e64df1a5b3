/**
 * @fileoverview Tool Registry - the fixed set of tools a task may use.
 *
 * The registry is filled once from configuration and is read-only afterwards,
 * so the set of tools the Decider can pick from never changes mid-task. It is
 * the only state shared between concurrent loop runs.
 *
 * @module querypilot/tools/tool-registry
 * @version 0.1.0
 */

import { UnknownToolError } from '../errors.js';
import type { ToolDescriptor, ToolImplementation } from '../types/tools.types.js';

/**
 * @example
 * ```typescript
 * const registry = new ToolRegistry(createDatabaseTools(collaborators));
 * registry.describe('execute_query').inputSchema.parse({ query: 'SELECT 1' });
 * ```
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolImplementation>;

  constructor(tools: ReadonlyArray<ToolImplementation>) {
    const entries = new Map<string, ToolImplementation>();

    for (const tool of tools) {
      const name = tool.descriptor.name;
      if (entries.has(name)) {
        throw new Error(`Tool '${name}' is already registered`);
      }
      entries.set(name, Object.freeze({
        descriptor: Object.freeze({ ...tool.descriptor }),
        execute: tool.execute.bind(tool),
      }));
    }

    this.tools = entries;
  }

  /**
   * Gets a tool's descriptor.
   *
   * @throws UnknownToolError if no tool has this name
   */
  describe(toolName: string): ToolDescriptor {
    return this.resolve(toolName).descriptor;
  }

  has(toolName: string): boolean {
    return this.tools.has(toolName);
  }

  list(): ReadonlyArray<ToolDescriptor> {
    return Array.from(this.tools.values(), tool => tool.descriptor);
  }

  /**
   * Gets a tool's implementation. Meant for the dispatcher.
   *
   * @throws UnknownToolError if no tool has this name
   */
  resolve(toolName: string): ToolImplementation {
    const tool = this.tools.get(toolName);
    if (!tool) {
      throw new UnknownToolError(toolName);
    }
    return tool;
  }
}
