import type { TokenUsage, ToolCall } from "./message.js";

/** The final outcome of one agent run. */
export interface FinalResponse {
  type: "final";
  text: string;
  /** Every tool call executed during the run, in order. */
  toolCalls: ToolCall[];
  usage?: TokenUsage;
  finishReason: string | null;
  iterations: number;
}

/** Fragments emitted by a streaming agent run; the last one is always `final`. */
export type AgentResponse =
  | { type: "text_delta"; text: string }
  | { type: "tool_calls"; toolCalls: ToolCall[]; iteration: number }
  | { type: "usage"; usage?: TokenUsage; finishReason: string | null }
  | FinalResponse;
