/**
 * LLM client interface - one contract, one implementation per wire protocol.
 */

import type { AssistantMessage, ChatMessage, TokenUsage, ToolCall } from "./message.js";
import type { ToolDefinition } from "./tool.js";
import type { CancellationToken } from "../cancellation.js";

/** Sampling parameters forwarded to the provider when set. */
export interface SamplingOptions {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stop?: string[];
}

/**
 * Overlay `overrides` on `defaults` field by field. Undefined when neither
 * side carries sampling.
 */
export function mergeSampling(
  defaults: SamplingOptions | undefined,
  overrides: SamplingOptions | undefined,
): SamplingOptions | undefined {
  if (!defaults) return overrides;
  if (!overrides) return defaults;
  return {
    temperature: overrides.temperature ?? defaults.temperature,
    maxTokens: overrides.maxTokens ?? defaults.maxTokens,
    topP: overrides.topP ?? defaults.topP,
    stop: overrides.stop ?? defaults.stop,
  };
}

/** A chat request in canonical form. */
export interface ChatRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  options?: SamplingOptions;
}

export interface ChatChoice {
  message: AssistantMessage;
  finishReason: string | null;
}

/** A complete (non-streamed) model turn. */
export interface ChatResponse {
  model?: string;
  choices: ChatChoice[];
  usage?: TokenUsage;
}

/**
 * A fragment of a streamed model turn. Adapters emit text as it arrives and
 * tool calls only once they are complete.
 */
export type ChatStreamChunk =
  | { type: "text_delta"; text: string }
  | {
      type: "tool_calls";
      toolCalls: ToolCall[];
      finishReason?: string | null;
      usage?: TokenUsage;
    }
  | { type: "finish"; finishReason: string | null; usage?: TokenUsage }
  | { type: "usage"; usage: TokenUsage };

export interface LlmClient {
  readonly provider: string;
  readonly model: string;
  send(request: ChatRequest, cancellation?: CancellationToken): Promise<ChatResponse>;
  sendStreaming(
    request: ChatRequest,
    cancellation?: CancellationToken,
  ): AsyncIterable<ChatStreamChunk>;
  /** Abort in-flight requests and reject further calls. */
  close(): void;
}
