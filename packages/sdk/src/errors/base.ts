/**
 * Error hierarchy for the agent runtime.
 */

import { ErrorCode } from "./codes.js";

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AgentError";
  }
}

/** A tool threw or timed out. Converted to a tool result, never raised to callers. */
export class ToolExecutionError extends AgentError {
  constructor(
    public readonly toolName: string,
    /** The failure without the tool-name prefix. */
    public readonly detail: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Tool "${toolName}" failed: ${detail}`, options?.code ?? ErrorCode.TOOL_EXECUTION_ERROR, options);
    this.name = "ToolExecutionError";
  }
}

export class ProviderError extends AgentError {
  constructor(
    public readonly providerId: string,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Provider "${providerId}" error: ${message}`, options?.code ?? ErrorCode.PROVIDER_ERROR, options);
    this.name = "ProviderError";
  }
}

const MAX_BODY_IN_MESSAGE = 500;

/** Non-2xx HTTP response from a provider. */
export class ApiError extends ProviderError {
  constructor(
    providerId: string,
    public readonly status: number,
    public readonly body: string,
    options?: { cause?: unknown; code?: string },
  ) {
    const excerpt = body.length > MAX_BODY_IN_MESSAGE ? `${body.slice(0, MAX_BODY_IN_MESSAGE)}…` : body;
    super(providerId, `HTTP ${status}: ${excerpt}`, status, {
      ...options,
      code: options?.code ?? ErrorCode.API_ERROR,
    });
    this.name = "ApiError";
  }
}

/** HTTP 429 that survived every retry. */
export class RateLimitError extends ApiError {
  constructor(
    providerId: string,
    body: string,
    public readonly retryAfterMs?: number,
  ) {
    super(providerId, 429, body, { code: ErrorCode.RATE_LIMITED });
    this.name = "RateLimitError";
  }
}

export class TransportError extends AgentError {
  constructor(
    public readonly transport: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(`Transport "${transport}" error: ${message}`, options?.code ?? ErrorCode.TRANSPORT_ERROR, options);
    this.name = "TransportError";
  }
}

export class CancelledError extends AgentError {
  constructor(message = "Operation cancelled") {
    super(message, ErrorCode.CANCELLED);
    this.name = "CancelledError";
  }
}

export class IterationLimitError extends AgentError {
  constructor(public readonly maxIterations: number) {
    super(`Agent exceeded the maximum of ${maxIterations} iterations`, ErrorCode.ITERATION_LIMIT_EXCEEDED);
    this.name = "IterationLimitError";
  }
}

export class PromptTooLongError extends AgentError {
  constructor(
    public readonly length: number,
    public readonly maxLength: number,
  ) {
    super(`Prompt is ${length} characters; the limit is ${maxLength}`, ErrorCode.PROMPT_TOO_LONG);
    this.name = "PromptTooLongError";
  }
}

export class ConfigError extends AgentError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/** Describe any thrown value as a single line. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
