/**
 * Tool contract and the definitions sent to providers.
 */

/** JSON Schema object describing a tool's parameters. */
export interface ToolParameterSchema {
  type: "object";
  properties: Record<string, unknown>;
  required: string[];
}

/** What a provider sees of a tool on every turn. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

/** A capability the agent can invoke. */
export interface ITool<TArgs = unknown> {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
  /** Per-call timeout in ms. Defaults to DEFAULT_TOOL_TIMEOUT_MS. */
  timeoutMs?: number;
  /**
   * Whether this call must be confirmed by the user first. Calls whose raw
   * arguments carry `confirmed: true` are executed regardless.
   */
  requiresConfirmation?(args: TArgs): boolean;
  /** Turn decoded JSON arguments into the tool's typed input. Throws on invalid input. */
  parseArgs(raw: Record<string, unknown>): TArgs;
  execute(args: TArgs): Promise<string>;
}
