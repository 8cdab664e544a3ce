/**
 * Canonical message types - the vendor-neutral shape every protocol adapter
 * translates to and from.
 */

export type MessageRole = "system" | "user" | "assistant" | "tool";

/**
 * A request from the model to invoke a tool.
 * `arguments` is the raw text the model produced and may not be valid JSON.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string | null;
  toolCalls?: ToolCall[];
}

export interface ToolResultMessage {
  role: "tool";
  content: string;
  toolCallId: string;
}

/** A single message in the conversation. */
export type ChatMessage =
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ToolResultMessage;

/** Token usage information from a provider response. */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Sum two usage records field by field. Either side may be absent. */
export function addUsage(
  a: TokenUsage | undefined,
  b: TokenUsage | undefined,
): TokenUsage | undefined {
  if (!a) return b;
  if (!b) return a;
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

/** Result of decoding the raw `arguments` text of a tool call. */
export type ToolArguments =
  | { kind: "parsed"; value: Record<string, unknown> }
  | { kind: "malformed"; raw: string; value: Record<string, unknown> };
