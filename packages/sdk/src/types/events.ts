/**
 * Event system types and constants.
 */

/** Handler function for events. */
export type EventHandler = (event: AgentEvent) => void | Promise<void>;

/** EventBus interface for pub/sub communication. */
export interface EventBus {
  on(type: string, handler: EventHandler): () => void;
  once(type: string, handler: EventHandler): () => void;
  onAny(handler: EventHandler): () => void;
  emit(event: AgentEvent): void;
}

/** A typed event emitted by the agent system. */
export interface AgentEvent {
  type: string;
  timestamp: number;
  payload?: unknown;
}

/** Core event type constants. */
export const AgentEventType = {
  // Execution loop
  LOOP_STARTED: "loop:started",
  LOOP_AWAITING_LLM: "loop:awaiting_llm",
  LOOP_FINISHED: "loop:finished",
  LOOP_ERROR: "loop:error",
  LOOP_CANCELLED: "loop:cancelled",

  // Streaming
  STREAM_TEXT_DELTA: "stream:text_delta",
  STREAM_FINISH: "stream:finish",

  // Tool execution
  TOOL_EXECUTING: "tool:executing",
  TOOL_RESULT: "tool:result",
  TOOL_ERROR: "tool:error",
  TOOL_CONFIRMATION_REQUIRED: "tool:confirmation_required",

  // Memory
  MEMORY_SUMMARIZED: "memory:summarized",

  // Coordinator
  COORDINATOR_TRANSFER_REQUESTED: "coordinator:transfer_requested",
  COORDINATOR_HANDOFF: "coordinator:handoff",

  // Run state
  STATE_CHANGED: "state:changed",
} as const;

export type AgentEventTypeValue = (typeof AgentEventType)[keyof typeof AgentEventType];
