export { createLogger, DEFAULT_REDACT_KEYS, REDACTED } from "./logger/index.js";
export type { Logger, LogLevel, LogContext, LoggerOptions } from "./logger/index.js";
export { createMemoryLogger } from "./logger/memory-logger.js";
export type { LogEntry, MemoryLogger } from "./logger/memory-logger.js";

export { generateId } from "./utils/uuid.js";
export {
  validateInput,
  formatZodError,
  zodToJsonSchema,
  toParameterSchema,
} from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { decodeToolArguments, parseJsonObject, isPlainObject } from "./utils/json-args.js";
export { sanitizePrompt } from "./utils/text.js";

export {
  OpenAIProviderConfigSchema,
  AnthropicProviderConfigSchema,
  GeminiProviderConfigSchema,
  ProviderConfigSchema,
  AgentSettingsSchema,
  MemorySettingsSchema,
  RuntimeConfigSchema,
} from "./utils/config-schema.js";
export type {
  OpenAIProviderConfig,
  AnthropicProviderConfig,
  GeminiProviderConfig,
  ProviderConfig,
  ProviderConfigInput,
  AgentSettings,
  MemorySettings,
  RuntimeConfig,
  RuntimeConfigInput,
} from "./utils/config-schema.js";

export {
  ToolCallSchema,
  StoredMessageSchema,
  AgentStateCheckpointSchema,
} from "./utils/persistence-schema.js";
