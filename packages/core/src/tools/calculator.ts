import { z } from "zod";
import type { ITool } from "@ferryman/sdk";
import { defineTool, type ToolArgs } from "./define-tool.js";

const CalculatorSchema = z.object({
  operation: z
    .enum(["add", "subtract", "multiply", "divide"])
    .describe("The arithmetic operation to perform"),
  a: z.number().describe("First number"),
  b: z.number().describe("Second number"),
});

export type CalculatorArgs = ToolArgs<typeof CalculatorSchema.shape>;

export function calculate({ operation, a, b }: CalculatorArgs): string {
  switch (operation) {
    case "add":
      return `Result: ${a + b}`;
    case "subtract":
      return `Result: ${a - b}`;
    case "multiply":
      return `Result: ${a * b}`;
    case "divide":
      if (b === 0) return "Error: Division by zero";
      return `Result: ${a / b}`;
  }
}

/** Basic arithmetic, mostly useful for exercising the tool-call path. */
export function createCalculatorTool(): ITool<CalculatorArgs> {
  return defineTool({
    name: "calculator",
    description: "Performs basic arithmetic operations",
    schema: CalculatorSchema,
    execute: calculate,
  });
}
