/**
 * ToolRegistry - the tools an agent may call, keyed by name.
 */

import type { ITool, ToolDefinition } from "@ferryman/sdk";
import { createLogger, type Logger } from "@ferryman/shared";

export interface ToolRegistry {
  /** Returns false, leaving the existing tool in place, when the name is taken. */
  register(tool: ITool): boolean;
  get(name: string): ITool | undefined;
  list(): ITool[];
  toDefinitions(): ToolDefinition[];
}

export function createToolRegistry(logger: Logger = createLogger("ToolRegistry")): ToolRegistry {
  const tools = new Map<string, ITool>();

  return {
    register(tool: ITool): boolean {
      if (tools.has(tool.name)) {
        logger.debug(`Tool already registered: ${tool.name}`);
        return false;
      }
      logger.debug(`Registering tool: ${tool.name}`);
      tools.set(tool.name, tool);
      return true;
    },

    get(name: string): ITool | undefined {
      return tools.get(name);
    },

    list(): ITool[] {
      return [...tools.values()];
    },

    toDefinitions(): ToolDefinition[] {
      return [...tools.values()].map((tool) => ({
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      }));
    },
  };
}
