/**
 * ToolExecutor - runs one model-requested tool call and turns every outcome
 * into a tool-result string. Failures are reported on the bus and to the
 * `onToolError` callback; they never reach the caller of the agent.
 */

import {
  AgentEventType,
  DEFAULT_TOOL_TIMEOUT_MS,
  ErrorCode,
  ToolExecutionError,
  errorMessage,
  type CancellationToken,
  type EventBus,
  type ITool,
  type ToolCall,
} from "@ferryman/sdk";
import { decodeToolArguments, type Logger } from "@ferryman/shared";
import type { ToolRegistry } from "../infrastructure/tool-registry.js";
import { MetricName, type MetricsCollector } from "../observability/metrics.js";

export type ToolOutcomeStatus = "ok" | "error" | "unknown_tool" | "confirmation_required";

export interface ToolOutcome {
  status: ToolOutcomeStatus;
  /** Text returned to the model as the tool result. */
  content: string;
}

export type ToolErrorCallback = (toolName: string, error: ToolExecutionError) => void;

export interface ToolExecutorDeps {
  registry: ToolRegistry;
  bus: EventBus;
  logger: Logger;
  metrics?: MetricsCollector;
  onToolError?: ToolErrorCallback;
}

export interface ToolExecutor {
  execute(call: ToolCall, cancellation?: CancellationToken): Promise<ToolOutcome>;
}

export function unknownToolMessage(name: string): string {
  return `Error: Tool "${name}" is not registered.`;
}

export function confirmationMessage(tool: ITool): string {
  return `CONFIRMATION_REQUIRED: This operation (${tool.description}) is sensitive. Please ask the user to confirm.`;
}

export function toolErrorMessage(name: string, detail: string): string {
  return `Error executing tool "${name}": ${detail}`;
}

async function withTimeout(tool: ITool, args: unknown): Promise<string> {
  const timeout = tool.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () =>
        reject(new ToolExecutionError(tool.name, `timed out after ${timeout}ms`, { code: ErrorCode.TOOL_TIMEOUT })),
      timeout,
    );
  });
  try {
    return await Promise.race([tool.execute(args), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

export function createToolExecutor(deps: ToolExecutorDeps): ToolExecutor {
  const { registry, bus, logger, metrics } = deps;

  function emitEvent(type: string, payload: Record<string, unknown>): void {
    bus.emit({ type, timestamp: Date.now(), payload });
  }

  function fail(call: ToolCall, error: ToolExecutionError): ToolOutcome {
    logger.error(`Tool execution error: ${call.name}`, { error: error.detail, code: error.code });
    metrics?.increment(MetricName.TOOL_ERRORS);
    emitEvent(AgentEventType.TOOL_ERROR, { toolCallId: call.id, name: call.name, error: error.detail });
    deps.onToolError?.(call.name, error);
    return { status: "error", content: toolErrorMessage(call.name, error.detail) };
  }

  return {
    async execute(call: ToolCall, cancellation?: CancellationToken): Promise<ToolOutcome> {
      cancellation?.throwIfCancelled();

      const decoded = decodeToolArguments(call.arguments);
      if (decoded.kind === "malformed") {
        logger.warn(`Could not decode arguments for tool "${call.name}"; using {}`, { raw: decoded.raw });
      }
      const raw = decoded.value;

      const tool = registry.get(call.name);
      if (!tool) {
        logger.warn(`Model requested unknown tool: ${call.name}`);
        metrics?.increment(MetricName.TOOL_ERRORS);
        emitEvent(AgentEventType.TOOL_ERROR, {
          toolCallId: call.id,
          name: call.name,
          error: "not registered",
        });
        return { status: "unknown_tool", content: unknownToolMessage(call.name) };
      }

      metrics?.increment(MetricName.TOOL_CALLS);
      emitEvent(AgentEventType.TOOL_EXECUTING, { toolCallId: call.id, name: call.name, arguments: raw });

      let args: unknown;
      try {
        args = tool.parseArgs(raw);
      } catch (err) {
        return fail(
          call,
          err instanceof ToolExecutionError ? err : new ToolExecutionError(call.name, errorMessage(err), { cause: err }),
        );
      }

      if (tool.requiresConfirmation?.(args) && raw.confirmed !== true) {
        logger.info(`Tool "${call.name}" needs user confirmation`);
        emitEvent(AgentEventType.TOOL_CONFIRMATION_REQUIRED, { toolCallId: call.id, name: call.name });
        return { status: "confirmation_required", content: confirmationMessage(tool) };
      }

      const stop = logger.time(`tool ${call.name}`);
      try {
        const result = await withTimeout(tool, args);
        stop();
        emitEvent(AgentEventType.TOOL_RESULT, { toolCallId: call.id, name: call.name, result });
        return { status: "ok", content: result };
      } catch (err) {
        stop();
        return fail(
          call,
          err instanceof ToolExecutionError ? err : new ToolExecutionError(call.name, errorMessage(err), { cause: err }),
        );
      }
    },
  };
}
