// Types
export type {
  MessageRole,
  ToolCall,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolResultMessage,
  ChatMessage,
  TokenUsage,
  ToolArguments,
} from "./types/message.js";
export { addUsage } from "./types/message.js";

export type { ITool, ToolDefinition, ToolParameterSchema } from "./types/tool.js";
export { DEFAULT_TOOL_TIMEOUT_MS } from "./types/tool.js";

export type {
  LlmClient,
  ChatRequest,
  ChatResponse,
  ChatChoice,
  ChatStreamChunk,
  SamplingOptions,
} from "./types/llm-client.js";
export { mergeSampling } from "./types/llm-client.js";

export type { AgentResponse, FinalResponse } from "./types/response.js";
export type { AgentStateCheckpoint } from "./types/checkpoint.js";
export type { IPersistence, StoredMessage } from "./types/persistence.js";

export type {
  EventHandler,
  EventBus,
  AgentEvent,
  AgentEventTypeValue,
} from "./types/events.js";
export { AgentEventType } from "./types/events.js";

// Cancellation
export { CancellationToken } from "./cancellation.js";

// Errors
export {
  AgentError,
  ToolExecutionError,
  ProviderError,
  ApiError,
  RateLimitError,
  TransportError,
  CancelledError,
  IterationLimitError,
  PromptTooLongError,
  ConfigError,
  errorMessage,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
