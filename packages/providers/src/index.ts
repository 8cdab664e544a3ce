export { createLlmClient } from "./factory.js";

export { createOpenAICompatibleClient, toOpenAIMessage } from "./openai-compatible.js";
export type { OpenAICompatibleClientOptions } from "./openai-compatible.js";

export { createAnthropicClient, toAnthropicMessages, mapAnthropicStopReason } from "./anthropic.js";
export type { AnthropicClientOptions } from "./anthropic.js";

export { createGeminiClient, toGeminiContents, mapGeminiFinishReason } from "./gemini.js";
export type { GeminiClientOptions } from "./gemini.js";

export {
  createHttpTransport,
  defaultSleep,
  parseRetryAfter,
  statusBackoff,
  transportBackoff,
} from "./http/transport.js";
export type {
  ClientDeps,
  FetchLike,
  HttpRequestInit,
  HttpTransport,
  RetryListener,
  RetryPolicy,
  SleepFn,
} from "./http/transport.js";

export { readSseEvents } from "./http/sse.js";
export type { SseEvent } from "./http/sse.js";
