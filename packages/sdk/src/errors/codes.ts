/**
 * Error code constants carried by AgentError.code.
 */
export const ErrorCode = {
  TOOL_EXECUTION_ERROR: "TOOL_EXECUTION_ERROR",
  TOOL_TIMEOUT: "TOOL_TIMEOUT",
  PROVIDER_ERROR: "PROVIDER_ERROR",
  API_ERROR: "API_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  TRANSPORT_CLOSED: "TRANSPORT_CLOSED",
  CANCELLED: "CANCELLED",
  ITERATION_LIMIT_EXCEEDED: "ITERATION_LIMIT_EXCEEDED",
  PROMPT_TOO_LONG: "PROMPT_TOO_LONG",
  CONFIG_ERROR: "CONFIG_ERROR",
  PERSISTENCE_ERROR: "PERSISTENCE_ERROR",
  AGENT_BUSY: "AGENT_BUSY",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
