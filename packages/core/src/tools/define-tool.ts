/**
 * Build an ITool from a zod object schema.
 *
 * The JSON Schema sent to the model is derived from the zod schema, and
 * `parseArgs` validates decoded arguments through it. Tools that need user
 * confirmation advertise an extra optional `confirmed` flag.
 */

import { z } from "zod";
import { ToolExecutionError, type ITool, type ToolParameterSchema } from "@ferryman/sdk";
import { toParameterSchema, validateInput } from "@ferryman/shared";

export type ToolArgs<TShape extends z.ZodRawShape> = z.infer<z.ZodObject<TShape>>;

export type ConfirmationPolicy<TArgs> = boolean | ((args: TArgs) => boolean);

export interface ToolSpec<TShape extends z.ZodRawShape> {
  name: string;
  description: string;
  schema: z.ZodObject<TShape>;
  timeoutMs?: number;
  requiresConfirmation?: ConfirmationPolicy<ToolArgs<TShape>>;
  execute(args: ToolArgs<TShape>): Promise<string> | string;
}

const CONFIRMED_PROPERTY = {
  type: "boolean",
  description: "Set to true only after the user has explicitly confirmed this operation.",
};

function withConfirmedFlag(schema: ToolParameterSchema): ToolParameterSchema {
  return { ...schema, properties: { ...schema.properties, confirmed: CONFIRMED_PROPERTY } };
}

export function defineTool<TShape extends z.ZodRawShape>(spec: ToolSpec<TShape>): ITool<ToolArgs<TShape>> {
  const policy = spec.requiresConfirmation;
  const baseSchema = toParameterSchema(spec.schema);

  const tool: ITool<ToolArgs<TShape>> = {
    name: spec.name,
    description: spec.description,
    parameters: policy === undefined || policy === false ? baseSchema : withConfirmedFlag(baseSchema),

    parseArgs(raw: Record<string, unknown>): ToolArgs<TShape> {
      const result = validateInput(spec.schema, raw);
      if (!result.success) {
        throw new ToolExecutionError(spec.name, `invalid arguments: ${result.error}`);
      }
      return result.data;
    },

    async execute(args: ToolArgs<TShape>): Promise<string> {
      return spec.execute(args);
    },
  };

  if (spec.timeoutMs !== undefined) tool.timeoutMs = spec.timeoutMs;
  if (policy !== undefined) {
    tool.requiresConfirmation = (args) => (typeof policy === "function" ? policy(args) : policy);
  }
  return tool;
}
