/**
 * Agent - the reason-act-observe loop.
 *
 * One run:
 *   prompt → memory → [model turn → (tool calls → tool results)*] → final answer
 *
 * The loop is bounded by `maxIterations`. A checkpoint is written before
 * every model call and after every tool execution, cleared on completion or
 * cancellation, and left in place with an error message when the run fails
 * so that `resumeFrom` can pick up at the next iteration.
 *
 * `run` and `runStreaming` share one generator; `run` drives it to the
 * final element with non-streaming model calls.
 */

import {
  AgentError,
  AgentEventType,
  CancelledError,
  ErrorCode,
  IterationLimitError,
  PromptTooLongError,
  addUsage,
  errorMessage,
  mergeSampling,
  type AgentResponse,
  type AgentStateCheckpoint,
  type CancellationToken,
  type ChatMessage,
  type ChatRequest,
  type EventBus,
  type FinalResponse,
  type ITool,
  type LlmClient,
  type SamplingOptions,
  type TokenUsage,
  type ToolCall,
  type ToolDefinition,
} from "@ferryman/sdk";
import { createLogger, generateId, sanitizePrompt, type Logger } from "@ferryman/shared";
import { createEventBus } from "../bus/index.js";
import { createToolRegistry } from "../infrastructure/tool-registry.js";
import type { MemoryManager } from "../memory/memory-manager.js";
import { MetricName, type MetricsCollector } from "../observability/metrics.js";
import { createRunState, type RunState } from "../state/run-state.js";
import { buildOutgoingMessages } from "./prompt.js";
import { createToolExecutor, type ToolErrorCallback, type ToolOutcome } from "./tool-executor.js";

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_MAX_PROMPT_LENGTH = 100 * 1024;
export const DEFAULT_INSTRUCTIONS = "You are a helpful assistant.";
export const NO_ANSWER_FALLBACK = "I have finished the requested tasks.";
/** Result recorded for calls of a batch that a cancellation cut short. */
export const CANCELLED_TOOL_RESULT = "Cancelled before execution";

export const CheckpointStep = {
  SENDING_REQUEST: "Sending request",
  executedTool: (name: string) => `Executed tool: ${name}`,
} as const;

export interface AgentOptions {
  name?: string;
  description?: string;
  instructions?: string;
  client: LlmClient;
  memory: MemoryManager;
  tools?: ITool[];
  maxIterations?: number;
  maxPromptLength?: number;
  /** Sampling defaults; a run's own `sampling` wins field by field. */
  sampling?: SamplingOptions;
  bus?: EventBus;
  runState?: RunState;
  metrics?: MetricsCollector;
  logger?: Logger;
  onToolError?: ToolErrorCallback;
  onAgentFailure?: (error: Error) => void;
  onWarning?: (warning: string) => void;
}

export interface RunOptions {
  cancellation?: CancellationToken;
  /** Continue an interrupted run instead of starting from a new prompt. */
  resumeFrom?: AgentStateCheckpoint;
  sampling?: SamplingOptions;
}

export interface Agent {
  readonly name: string;
  readonly description: string;
  readonly memory: MemoryManager;
  readonly state: RunState;
  readonly bus: EventBus;
  run(prompt: string, options?: RunOptions): Promise<FinalResponse>;
  runStreaming(prompt: string, options?: RunOptions): AsyncGenerator<AgentResponse>;
  /** Returns false when a tool with the same name is already registered. */
  addTool(tool: ITool): boolean;
  getToolDefinitions(): ToolDefinition[];
}

interface ModelTurn {
  text: string;
  toolCalls: ToolCall[];
  finishReason: string | null;
  usage?: TokenUsage;
}

export function createAgent(options: AgentOptions): Agent {
  const name = options.name ?? "assistant";
  const description = options.description ?? "";
  const instructions = options.instructions ?? DEFAULT_INSTRUCTIONS;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const maxPromptLength = options.maxPromptLength ?? DEFAULT_MAX_PROMPT_LENGTH;
  const { client, memory, metrics } = options;
  const logger = (options.logger ?? createLogger("Agent")).child(name);
  const bus = options.bus ?? createEventBus();
  const state = options.runState ?? createRunState({ bus, logger: logger.child("state") });
  const registry = createToolRegistry(logger.child("tools"));
  const executor = createToolExecutor({
    registry,
    bus,
    logger,
    metrics,
    onToolError: options.onToolError,
  });
  let running = false;
  let lastStep: string = CheckpointStep.SENDING_REQUEST;

  for (const tool of options.tools ?? []) registry.register(tool);

  function emitEvent(type: string, payload: Record<string, unknown> = {}): void {
    bus.emit({ type, timestamp: Date.now(), payload: { agent: name, ...payload } });
  }

  function warn(warning: string): void {
    logger.warn(warning);
    options.onWarning?.(warning);
  }

  async function checkpoint(step: string, iterationCount: number): Promise<void> {
    lastStep = step;
    await memory.saveCheckpoint({
      isRunning: true,
      currentStep: step,
      iterationCount,
      timestamp: new Date().toISOString(),
    });
  }

  async function answerSkippedCalls(calls: ToolCall[]): Promise<void> {
    for (const call of calls) {
      await memory.addMessage({ role: "tool", toolCallId: call.id, content: CANCELLED_TOOL_RESULT });
    }
  }

  async function sendTurn(request: ChatRequest, cancellation: CancellationToken | undefined): Promise<ModelTurn> {
    const response = await client.send(request, cancellation);
    const choice = response.choices[0];
    return {
      text: choice?.message.content ?? "",
      toolCalls: choice?.message.toolCalls ?? [],
      finishReason: choice?.finishReason ?? null,
      usage: response.usage,
    };
  }

  /** Forwards text deltas as they arrive and returns the aggregated turn. */
  async function* streamTurn(
    request: ChatRequest,
    cancellation: CancellationToken | undefined,
  ): AsyncGenerator<AgentResponse, ModelTurn> {
    const turn: ModelTurn = { text: "", toolCalls: [], finishReason: null };
    for await (const chunk of client.sendStreaming(request, cancellation)) {
      switch (chunk.type) {
        case "text_delta":
          turn.text += chunk.text;
          emitEvent(AgentEventType.STREAM_TEXT_DELTA, { text: chunk.text });
          yield { type: "text_delta", text: chunk.text };
          break;
        case "tool_calls":
          turn.toolCalls.push(...chunk.toolCalls);
          if (chunk.finishReason !== undefined) turn.finishReason = chunk.finishReason;
          if (chunk.usage) turn.usage = chunk.usage;
          break;
        case "finish":
          turn.finishReason = chunk.finishReason;
          if (chunk.usage) turn.usage = chunk.usage;
          break;
        case "usage":
          turn.usage = chunk.usage;
          break;
      }
    }
    return turn;
  }

  async function* execute(
    prompt: string,
    runOptions: RunOptions,
    streaming: boolean,
  ): AsyncGenerator<AgentResponse, FinalResponse> {
    const { cancellation, resumeFrom } = runOptions;
    const sampling = mergeSampling(options.sampling, runOptions.sampling);

    if (running) {
      throw new AgentError(`Agent "${name}" is already running`, ErrorCode.AGENT_BUSY);
    }

    if (!resumeFrom) {
      const clean = sanitizePrompt(prompt);
      if (clean.length > maxPromptLength) {
        const error = new PromptTooLongError(clean.length, maxPromptLength);
        logger.warn("Rejecting prompt", { length: clean.length, maxLength: maxPromptLength });
        state.failRun(error.message);
        metrics?.increment(MetricName.RUNS_FAILED);
        options.onAgentFailure?.(error);
        throw error;
      }
      prompt = clean;
    }

    running = true;
    lastStep = resumeFrom?.currentStep ?? CheckpointStep.SENDING_REQUEST;
    let settled = false;
    let iteration = resumeFrom?.iterationCount ?? 0;
    const traceId = generateId("trace");
    logger.setContext({ agentId: name, traceId });

    state.startRun();
    if (resumeFrom) {
      logger.info("Resuming agent run", { iteration, step: resumeFrom.currentStep });
      state.updateStep(resumeFrom.currentStep);
    } else {
      logger.info("Starting agent run", { promptLength: prompt.length, tools: registry.list().length });
    }
    emitEvent(AgentEventType.LOOP_STARTED, { traceId, resumed: resumeFrom !== undefined, iteration });

    try {
      if (!resumeFrom) {
        await memory.addMessage({ role: "user", content: prompt });
      }

      const inFlight: ChatMessage[] = buildOutgoingMessages(instructions, memory.getMessages());
      const tools = registry.toDefinitions();
      const executedCalls: ToolCall[] = [];
      let runUsage: TokenUsage | undefined;

      while (true) {
        iteration++;
        if (iteration > maxIterations) {
          throw new IterationLimitError(maxIterations);
        }
        if (cancellation?.isCancelled) {
          throw new CancelledError();
        }

        state.updateStep(`Iteration ${iteration}: waiting for model`);
        await checkpoint(CheckpointStep.SENDING_REQUEST, iteration);
        emitEvent(AgentEventType.LOOP_AWAITING_LLM, { iteration });

        const request: ChatRequest = {
          messages: [...inFlight],
          ...(tools.length > 0 ? { tools } : {}),
          ...(sampling ? { options: sampling } : {}),
        };
        metrics?.increment(MetricName.LLM_REQUESTS);
        const stop = logger.time("model turn");
        let turn: ModelTurn;
        try {
          turn = streaming ? yield* streamTurn(request, cancellation) : await sendTurn(request, cancellation);
        } catch (err) {
          if (!(err instanceof CancelledError)) metrics?.increment(MetricName.LLM_ERRORS);
          throw err;
        }
        stop();

        runUsage = addUsage(runUsage, turn.usage);
        metrics?.recordUsage(turn.usage);
        emitEvent(AgentEventType.STREAM_FINISH, { iteration, finishReason: turn.finishReason, usage: turn.usage });
        yield { type: "usage", usage: turn.usage, finishReason: turn.finishReason };

        if (turn.toolCalls.length === 0) {
          let text = turn.text;
          if (text.trim() === "") {
            warn("Agent run completed without final text");
            text = NO_ANSWER_FALLBACK;
          }
          await memory.addMessage({ role: "assistant", content: text });
          await memory.clearCheckpoint();
          state.completeRun();
          settled = true;
          metrics?.increment(MetricName.RUNS_COMPLETED);
          metrics?.gauge(MetricName.LAST_RUN_ITERATIONS, iteration);
          emitEvent(AgentEventType.LOOP_FINISHED, { traceId, iterations: iteration, finishReason: turn.finishReason });

          const final: FinalResponse = {
            type: "final",
            text,
            toolCalls: executedCalls,
            usage: runUsage,
            finishReason: turn.finishReason,
            iterations: iteration,
          };
          yield final;
          return final;
        }

        const assistantMessage: ChatMessage = {
          role: "assistant",
          content: turn.text === "" ? null : turn.text,
          toolCalls: turn.toolCalls,
        };
        await memory.addMessage(assistantMessage);
        inFlight.push(assistantMessage);
        yield { type: "tool_calls", toolCalls: turn.toolCalls, iteration };

        for (const [index, call] of turn.toolCalls.entries()) {
          state.updateStep(`Executing tool: ${call.name}`);
          let outcome: ToolOutcome;
          try {
            outcome = await executor.execute(call, cancellation);
          } catch (err) {
            // Each call of the batch in memory keeps a result.
            if (err instanceof CancelledError) await answerSkippedCalls(turn.toolCalls.slice(index));
            throw err;
          }
          executedCalls.push(call);

          const resultMessage: ChatMessage = { role: "tool", toolCallId: call.id, content: outcome.content };
          await memory.addMessage(resultMessage);
          inFlight.push(resultMessage);
          await checkpoint(CheckpointStep.executedTool(call.name), iteration);
        }
      }
    } catch (err) {
      settled = true;
      if (err instanceof CancelledError) {
        logger.info("Agent run cancelled", { iteration });
        await memory.clearCheckpoint();
        state.failRun(err.message);
        emitEvent(AgentEventType.LOOP_CANCELLED, { traceId, iteration });
        throw err;
      }

      const error = err instanceof Error ? err : new Error(errorMessage(err));
      logger.error("Agent run failed", { error: error.message, iteration });
      state.failRun(error.message);
      metrics?.increment(MetricName.RUNS_FAILED);
      emitEvent(AgentEventType.LOOP_ERROR, {
        traceId,
        iteration,
        error: error.message,
        ...(error instanceof AgentError ? { code: error.code } : {}),
      });
      try {
        await memory.saveCheckpoint({
          isRunning: false,
          currentStep: lastStep,
          iterationCount: Math.min(iteration, maxIterations),
          errorMessage: error.message,
          timestamp: new Date().toISOString(),
        });
      } catch (saveErr) {
        logger.error("Failed to save failure checkpoint", { error: errorMessage(saveErr) });
      }
      options.onAgentFailure?.(error);
      throw error;
    } finally {
      running = false;
      if (!settled) {
        // The consumer stopped iterating early; the checkpoint stays for a resume.
        logger.warn("Agent run abandoned before completion", { iteration });
        state.failRun("Run stopped before completion");
      }
    }
  }

  return {
    name,
    description,
    memory,
    state,
    bus,

    async run(prompt: string, runOptions: RunOptions = {}): Promise<FinalResponse> {
      const generator = execute(prompt, runOptions, false);
      while (true) {
        const next = await generator.next();
        if (next.done) return next.value;
      }
    },

    runStreaming(prompt: string, runOptions: RunOptions = {}): AsyncGenerator<AgentResponse> {
      return execute(prompt, runOptions, true);
    },

    addTool(tool: ITool): boolean {
      return registry.register(tool);
    },

    getToolDefinitions(): ToolDefinition[] {
      return registry.toDefinitions();
    },
  };
}

