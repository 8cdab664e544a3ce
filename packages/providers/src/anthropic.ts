/**
 * Anthropic Messages API adapter.
 *
 * System messages are hoisted into the top-level `system` field. Assistant
 * tool calls become `tool_use` blocks and tool results become `tool_result`
 * blocks inside a user message. The stream is a typed event sequence:
 *
 *   message_start → (content_block_start → content_block_delta* → content_block_stop)*
 *     → message_delta → message_stop
 *
 * Text deltas are forwarded as they arrive. Tool input JSON fragments are
 * buffered per block index and emitted once, in the final chunk.
 */

import { z } from "zod";
import type {
  CancellationToken,
  ChatMessage,
  ChatRequest,
  ChatResponse,
  ChatStreamChunk,
  LlmClient,
  SamplingOptions,
  TokenUsage,
  ToolCall,
} from "@ferryman/sdk";
import { ApiError, ProviderError, mergeSampling } from "@ferryman/sdk";
import { createLogger, parseJsonObject } from "@ferryman/shared";
import { createHttpTransport, readJson, type ClientDeps } from "./http/transport.js";
import { createMalformedFrameCounter, parseFrame, readSseEvents } from "./http/sse.js";

const PROVIDER = "anthropic";
const DEFAULT_MAX_TOKENS = 4096;

export interface AnthropicClientOptions extends ClientDeps {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  apiVersion?: string;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  defaults?: SamplingOptions;
}

type ContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | ContentBlock[];
}

const ResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(
    z
      .object({
        type: z.string(),
        text: z.string().optional(),
        id: z.string().optional(),
        name: z.string().optional(),
        input: z.record(z.unknown()).optional(),
      })
      .passthrough(),
  ),
  stop_reason: z.string().nullish(),
  usage: z
    .object({ input_tokens: z.number().default(0), output_tokens: z.number().default(0) })
    .optional(),
});

const StreamEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("message_start"),
    message: z.object({
      model: z.string().optional(),
      usage: z
        .object({ input_tokens: z.number().default(0), output_tokens: z.number().default(0) })
        .optional(),
    }),
  }),
  z.object({
    type: z.literal("content_block_start"),
    index: z.number(),
    content_block: z.object({
      type: z.string(),
      id: z.string().optional(),
      name: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal("content_block_delta"),
    index: z.number(),
    delta: z.object({
      type: z.string(),
      text: z.string().optional(),
      partial_json: z.string().optional(),
    }),
  }),
  z.object({ type: z.literal("content_block_stop"), index: z.number() }),
  z.object({
    type: z.literal("message_delta"),
    delta: z.object({ stop_reason: z.string().nullish() }),
    usage: z.object({ output_tokens: z.number().default(0) }).optional(),
  }),
  z.object({ type: z.literal("message_stop") }),
  z.object({ type: z.literal("ping") }),
  z.object({
    type: z.literal("error"),
    error: z.object({ type: z.string(), message: z.string() }),
  }),
]);

/** tool_use → tool_calls; everything else passes through. */
export function mapAnthropicStopReason(reason: string | null | undefined): string | null {
  if (!reason) return null;
  return reason === "tool_use" ? "tool_calls" : reason;
}

function isToolResultMessage(message: AnthropicMessage | undefined): message is AnthropicMessage & { content: ContentBlock[] } {
  return (
    message !== undefined &&
    message.role === "user" &&
    Array.isArray(message.content) &&
    message.content.every((block) => block.type === "tool_result")
  );
}

/** Split canonical messages into the hoisted system prompt and the Messages API list. */
export function toAnthropicMessages(messages: ChatMessage[]): {
  system?: string;
  messages: AnthropicMessage[];
} {
  const systemParts: string[] = [];
  const out: AnthropicMessage[] = [];

  for (const message of messages) {
    switch (message.role) {
      case "system":
        systemParts.push(message.content);
        break;
      case "user":
        out.push({ role: "user", content: message.content });
        break;
      case "assistant": {
        const calls = message.toolCalls ?? [];
        if (calls.length === 0) {
          out.push({ role: "assistant", content: message.content ?? "" });
          break;
        }
        const blocks: ContentBlock[] = [];
        if (message.content) blocks.push({ type: "text", text: message.content });
        for (const call of calls) {
          blocks.push({
            type: "tool_use",
            id: call.id,
            name: call.name,
            input: parseJsonObject(call.arguments),
          });
        }
        out.push({ role: "assistant", content: blocks });
        break;
      }
      case "tool": {
        const block: ContentBlock = {
          type: "tool_result",
          tool_use_id: message.toolCallId,
          content: message.content,
        };
        const previous = out[out.length - 1];
        if (isToolResultMessage(previous)) {
          previous.content.push(block);
        } else {
          out.push({ role: "user", content: [block] });
        }
        break;
      }
    }
  }

  return systemParts.length > 0
    ? { system: systemParts.join("\n\n"), messages: out }
    : { messages: out };
}

function combineUsage(input: number, output: number): TokenUsage {
  return { promptTokens: input, completionTokens: output, totalTokens: input + output };
}

export function createAnthropicClient(options: AnthropicClientOptions): LlmClient {
  const model = options.model ?? "claude-3-5-sonnet-latest";
  const baseUrl = (options.baseUrl ?? "https://api.anthropic.com/v1").replace(/\/+$/, "");
  const url = `${baseUrl}/messages`;
  const logger = options.logger ?? createLogger("AnthropicClient");
  const transport = createHttpTransport({
    provider: PROVIDER,
    logger,
    fetch: options.fetch,
    sleep: options.sleep,
    onRetry: options.onRetry,
    policy: {
      maxAttempts: options.maxAttempts ?? 3,
      baseDelayMs: options.retryBaseDelayMs ?? 1000,
      honorRetryAfter: false,
      retryOnServerError: true,
    },
  });

  const headers = {
    "x-api-key": options.apiKey,
    "anthropic-version": options.apiVersion ?? "2023-06-01",
    "content-type": "application/json",
  };

  function buildBody(request: ChatRequest, stream: boolean): Record<string, unknown> {
    const sampling = mergeSampling(options.defaults, request.options) ?? {};
    const { system, messages } = toAnthropicMessages(request.messages);
    const body: Record<string, unknown> = {
      model,
      max_tokens: sampling.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages,
    };
    if (system !== undefined) body.system = system;
    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters,
      }));
    }
    if (sampling.temperature !== undefined) body.temperature = sampling.temperature;
    if (sampling.topP !== undefined) body.top_p = sampling.topP;
    if (sampling.stop && sampling.stop.length > 0) body.stop_sequences = sampling.stop;
    if (stream) body.stream = true;
    return body;
  }

  return {
    provider: PROVIDER,
    model,

    async send(request: ChatRequest, cancellation?: CancellationToken): Promise<ChatResponse> {
      logger.debug("Sending messages request", { model, messages: request.messages.length });
      const response = await transport.post(url, headers, buildBody(request, false), cancellation);
      const parsed = ResponseSchema.safeParse(await readJson(response, PROVIDER));
      if (!parsed.success) {
        throw new ProviderError(PROVIDER, "unexpected response shape", response.status);
      }
      const data = parsed.data;
      const texts: string[] = [];
      const toolCalls: ToolCall[] = [];
      for (const block of data.content) {
        if (block.type === "text" && block.text !== undefined) {
          texts.push(block.text);
        } else if (block.type === "tool_use" && block.id && block.name) {
          toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
        }
      }
      return {
        model: data.model ?? model,
        choices: [
          {
            message: {
              role: "assistant",
              content: texts.length > 0 ? texts.join("") : null,
              ...(toolCalls.length > 0 ? { toolCalls } : {}),
            },
            finishReason: mapAnthropicStopReason(data.stop_reason),
          },
        ],
        usage: data.usage ? combineUsage(data.usage.input_tokens, data.usage.output_tokens) : undefined,
      };
    },

    async *sendStreaming(
      request: ChatRequest,
      cancellation?: CancellationToken,
    ): AsyncGenerator<ChatStreamChunk> {
      logger.debug("Sending streaming messages request", { model, messages: request.messages.length });
      const response = await transport.post(
        url,
        { ...headers, accept: "text/event-stream" },
        buildBody(request, true),
        cancellation,
      );
      const malformed = createMalformedFrameCounter(PROVIDER, logger);
      const toolBlocks = new Map<number, { id: string; name: string; json: string }>();
      let inputTokens = 0;
      let outputTokens = 0;
      let stopReason: string | null = null;

      stream: for await (const event of readSseEvents(response, { provider: PROVIDER, cancellation, logger })) {
        const parsed = StreamEventSchema.safeParse(parseFrame(event.data));
        if (!parsed.success) {
          malformed.record(event.data);
          continue;
        }
        const frame = parsed.data;

        switch (frame.type) {
          case "message_start":
            inputTokens = frame.message.usage?.input_tokens ?? 0;
            outputTokens = frame.message.usage?.output_tokens ?? 0;
            break;
          case "content_block_start":
            if (frame.content_block.type === "tool_use") {
              toolBlocks.set(frame.index, {
                id: frame.content_block.id ?? `toolu_${frame.index}`,
                name: frame.content_block.name ?? "",
                json: "",
              });
            }
            break;
          case "content_block_delta":
            if (frame.delta.type === "text_delta" && frame.delta.text) {
              yield { type: "text_delta", text: frame.delta.text };
            } else if (frame.delta.type === "input_json_delta") {
              const block = toolBlocks.get(frame.index);
              if (block) block.json += frame.delta.partial_json ?? "";
            }
            break;
          case "message_delta":
            if (frame.delta.stop_reason) stopReason = frame.delta.stop_reason;
            if (frame.usage) outputTokens = frame.usage.output_tokens;
            break;
          case "message_stop":
            break stream;
          case "error":
            throw new ApiError(PROVIDER, response.status, JSON.stringify(frame.error));
          case "content_block_stop":
          case "ping":
            break;
        }
      }

      malformed.report();

      const usage = combineUsage(inputTokens, outputTokens);
      if (toolBlocks.size > 0) {
        const toolCalls: ToolCall[] = [...toolBlocks.entries()]
          .sort(([a], [b]) => a - b)
          .map(([, block]) => ({
            id: block.id,
            name: block.name,
            arguments: JSON.stringify(parseJsonObject(block.json)),
          }));
        yield { type: "tool_calls", toolCalls, finishReason: mapAnthropicStopReason(stopReason), usage };
      } else {
        yield { type: "finish", finishReason: mapAnthropicStopReason(stopReason), usage };
      }
    },

    close(): void {
      transport.close();
    },
  };
}
