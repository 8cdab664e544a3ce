/**
 * Logger that records entries instead of printing them. Used by tests and
 * by embedders that forward logs elsewhere.
 */

import type { LogContext, Logger, LogLevel } from "./index.js";

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  context?: LogContext;
}

export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
  /** Entries at the given level, across this logger and its children. */
  at(level: LogLevel): LogEntry[];
}

export function createMemoryLogger(name = "test", entries: LogEntry[] = []): MemoryLogger {
  let context: LogContext = {};

  function record(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = { level, module: name, message };
    if (data) entry.data = data;
    if (Object.keys(context).length > 0) entry.context = { ...context };
    entries.push(entry);
  }

  return {
    entries,
    at: (level) => entries.filter((entry) => entry.level === level),
    debug: (msg, data) => record("debug", msg, data),
    info: (msg, data) => record("info", msg, data),
    warn: (msg, data) => record("warn", msg, data),
    error: (msg, data) => record("error", msg, data),
    child: (childName) => createMemoryLogger(`${name}:${childName}`, entries),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = Date.now();
      return () => {
        const durationMs = Date.now() - start;
        record("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
