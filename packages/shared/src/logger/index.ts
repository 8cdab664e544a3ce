/**
 * Structured logger with JSON output support.
 *
 * Features:
 * - JSON-structured log entries (when LOG_FORMAT=json)
 * - Log level filtering via LOG_LEVEL env var
 * - agent_id and trace_id fields for observability
 * - Redaction of sensitive keys in structured data (LOG_REDACT_KEYS adds more)
 * - Child loggers inherit context and redaction settings
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const REDACTED = "[REDACTED]";

export const DEFAULT_REDACT_KEYS: readonly string[] = [
  "apiKey",
  "api_key",
  "authorization",
  "x-api-key",
  "password",
  "secret",
  "token",
];

export interface LogContext {
  agentId?: string;
  traceId?: string;
  sessionId?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Minimum level; falls back to LOG_LEVEL, then "info". */
  level?: LogLevel;
  context?: LogContext;
  /** Keys whose values are replaced in logged data. Matched case-insensitively. */
  redactKeys?: readonly string[];
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Set persistent context fields (agentId, traceId, etc.) */
  setContext(ctx: LogContext): void;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from environment. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

/** Check if JSON output is requested. */
function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

function resolveRedactKeys(explicit?: readonly string[]): Set<string> {
  const fromEnv = (process.env.LOG_REDACT_KEYS ?? "")
    .split(",")
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
  return new Set(
    [...(explicit ?? DEFAULT_REDACT_KEYS), ...fromEnv].map((key) => key.toLowerCase()),
  );
}

function redact(value: unknown, keys: Set<string>): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, keys));
  }
  if (value !== null && typeof value === "object" && !(value instanceof Error)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = keys.has(key.toLowerCase()) ? REDACTED : redact(inner, keys);
    }
    return out;
  }
  return value;
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const minLevel = resolveMinLevel(options.level);
  const minPriority = LEVEL_PRIORITY[minLevel];
  const useJson = isJsonFormat();
  const redactKeys = resolveRedactKeys(options.redactKeys);
  let context: LogContext = { ...options.context };

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const timestamp = new Date().toISOString();
    const safeData =
      data && Object.keys(data).length > 0 ? redact(data, redactKeys) : undefined;

    if (useJson) {
      const entry: Record<string, unknown> = {
        timestamp,
        level,
        module: name,
        message,
      };
      if (context.agentId) entry.agent_id = context.agentId;
      if (context.traceId) entry.trace_id = context.traceId;
      if (context.sessionId) entry.session_id = context.sessionId;
      if (safeData !== undefined) {
        Object.assign(entry, safeData);
      }
      console.error(JSON.stringify(entry));
    } else {
      const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]`;
      if (safeData !== undefined) {
        console.error(`${prefix} ${message} ${JSON.stringify(safeData)}`);
      } else {
        console.error(`${prefix} ${message}`);
      }
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) =>
      createLogger(`${name}:${childName}`, {
        level: minLevel,
        context: { ...context },
        redactKeys: options.redactKeys,
      }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
