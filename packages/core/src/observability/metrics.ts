/**
 * Lightweight in-memory metrics collector fed by the agent loop.
 */

import { addUsage, type TokenUsage } from "@ferryman/sdk";

/** Counter and gauge names written by the agent. */
export const MetricName = {
  LLM_REQUESTS: "llm.requests",
  LLM_ERRORS: "llm.errors",
  TOOL_CALLS: "tool.calls",
  TOOL_ERRORS: "tool.errors",
  RUNS_COMPLETED: "runs.completed",
  RUNS_FAILED: "runs.failed",
  MEMORY_SUMMARIES: "memory.summaries",
  LAST_RUN_ITERATIONS: "run.iterations",
} as const;

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  /** Token usage summed over every model call seen. */
  usage: TokenUsage;
  timestamp: number;
}

export interface MetricsCollector {
  increment(name: string, delta?: number): void;
  gauge(name: string, value: number): void;
  recordUsage(usage: TokenUsage | undefined): void;
  getSnapshot(): MetricsSnapshot;
  reset(): void;
}

const ZERO_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export function createMetricsCollector(): MetricsCollector {
  const counters = new Map<string, number>();
  const gauges = new Map<string, number>();
  let usage: TokenUsage = ZERO_USAGE;

  return {
    increment(name: string, delta = 1): void {
      counters.set(name, (counters.get(name) ?? 0) + delta);
    },

    gauge(name: string, value: number): void {
      gauges.set(name, value);
    },

    recordUsage(next: TokenUsage | undefined): void {
      usage = addUsage(usage, next) ?? usage;
    },

    getSnapshot(): MetricsSnapshot {
      return {
        counters: Object.fromEntries(counters),
        gauges: Object.fromEntries(gauges),
        usage: { ...usage },
        timestamp: Date.now(),
      };
    },

    reset(): void {
      counters.clear();
      gauges.clear();
      usage = ZERO_USAGE;
    },
  };
}
