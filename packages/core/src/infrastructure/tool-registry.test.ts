import { describe, it, expect } from "vitest";
import type { ITool } from "@ferryman/sdk";
import { createMemoryLogger } from "@ferryman/shared";
import { createToolRegistry } from "./tool-registry.js";

function makeTool(name: string, description = `${name} tool`): ITool<Record<string, unknown>> {
  return {
    name,
    description,
    parameters: { type: "object", properties: {}, required: [] },
    parseArgs: (raw) => raw,
    execute: async () => name,
  };
}

describe("ToolRegistry", () => {
  it("registers and retrieves a tool by name", () => {
    const registry = createToolRegistry(createMemoryLogger());
    const tool = makeTool("lookup");

    expect(registry.register(tool)).toBe(true);
    expect(registry.get("lookup")).toBe(tool);
    expect(registry.get("missing")).toBeUndefined();
  });

  it("keeps the first tool when a name is registered twice", () => {
    const registry = createToolRegistry(createMemoryLogger());
    const first = makeTool("lookup", "first");

    registry.register(first);
    expect(registry.register(makeTool("lookup", "second"))).toBe(false);

    expect(registry.list()).toEqual([first]);
  });

  it("converts tools to definitions in registration order", () => {
    const registry = createToolRegistry(createMemoryLogger());
    registry.register(makeTool("b"));
    registry.register(makeTool("a"));

    expect(registry.toDefinitions()).toEqual([
      { name: "b", description: "b tool", parameters: { type: "object", properties: {}, required: [] } },
      { name: "a", description: "a tool", parameters: { type: "object", properties: {}, required: [] } },
    ]);
  });
});
