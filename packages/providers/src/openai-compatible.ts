/**
 * OpenAI-compatible chat completions adapter.
 *
 * Canonical messages map almost 1:1 onto the wire shape. Streaming is a
 * sequence of `data: {json}` frames ended by `data: [DONE]`; tool-call
 * arguments arrive as fragments keyed by index and are concatenated here.
 * Retries 429 (honouring retry-after) and connection failures.
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
  ToolDefinition,
} from "@ferryman/sdk";
import { ProviderError, mergeSampling } from "@ferryman/sdk";
import { createLogger, generateId } from "@ferryman/shared";
import { createHttpTransport, readJson, type ClientDeps } from "./http/transport.js";
import { createMalformedFrameCounter, parseFrame, readSseEvents } from "./http/sse.js";

const PROVIDER = "openai";

export interface OpenAICompatibleClientOptions extends ClientDeps {
  apiKey: string;
  model?: string;
  /** Base URL up to and including the version segment, e.g. https://api.openai.com/v1 */
  baseUrl?: string;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  /** Sampling applied when a request does not set its own. */
  defaults?: SamplingOptions;
}

const UsageSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  total_tokens: z.number().optional(),
});

const ResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().optional(),
                function: z.object({ name: z.string(), arguments: z.string().default("") }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: UsageSchema.nullish(),
  x_groq: z.object({ usage: UsageSchema.nullish() }).nullish(),
});

const StreamFrameSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number(),
                  id: z.string().nullish(),
                  function: z
                    .object({ name: z.string().nullish(), arguments: z.string().nullish() })
                    .nullish(),
                }),
              )
              .nullish(),
          })
          .nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: UsageSchema.nullish(),
  x_groq: z.object({ usage: UsageSchema.nullish() }).nullish(),
});

type WireUsage = z.infer<typeof UsageSchema>;

function toUsage(usage: WireUsage | null | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens ?? usage.prompt_tokens + usage.completion_tokens,
  };
}

export function toOpenAIMessage(message: ChatMessage): Record<string, unknown> {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "assistant":
      return {
        role: "assistant",
        content: message.content,
        ...(message.toolCalls && message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: "function",
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : {}),
      };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}

function toOpenAITool(tool: ToolDefinition): Record<string, unknown> {
  return {
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

export function createOpenAICompatibleClient(options: OpenAICompatibleClientOptions): LlmClient {
  const model = options.model ?? "gpt-4o-mini";
  const baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  const url = `${baseUrl}/chat/completions`;
  const logger = options.logger ?? createLogger("OpenAICompatibleClient");
  const transport = createHttpTransport({
    provider: PROVIDER,
    logger,
    fetch: options.fetch,
    sleep: options.sleep,
    onRetry: options.onRetry,
    policy: {
      maxAttempts: options.maxAttempts ?? 3,
      baseDelayMs: options.retryBaseDelayMs ?? 1000,
      honorRetryAfter: true,
      retryOnServerError: false,
    },
  });

  const headers = {
    "content-type": "application/json",
    authorization: `Bearer ${options.apiKey}`,
  };

  function buildBody(request: ChatRequest, stream: boolean): Record<string, unknown> {
    const sampling = mergeSampling(options.defaults, request.options) ?? {};
    const body: Record<string, unknown> = {
      model,
      messages: request.messages.map(toOpenAIMessage),
    };
    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map(toOpenAITool);
      body.tool_choice = "auto";
    }
    if (sampling.temperature !== undefined) body.temperature = sampling.temperature;
    if (sampling.maxTokens !== undefined) body.max_completion_tokens = sampling.maxTokens;
    if (sampling.topP !== undefined) body.top_p = sampling.topP;
    if (sampling.stop && sampling.stop.length > 0) body.stop = sampling.stop;
    if (stream) {
      body.stream = true;
      body.stream_options = { include_usage: true };
    }
    return body;
  }

  return {
    provider: PROVIDER,
    model,

    async send(request: ChatRequest, cancellation?: CancellationToken): Promise<ChatResponse> {
      logger.debug("Sending chat request", { model, messages: request.messages.length });
      const response = await transport.post(url, headers, buildBody(request, false), cancellation);
      const parsed = ResponseSchema.safeParse(await readJson(response, PROVIDER));
      if (!parsed.success) {
        throw new ProviderError(PROVIDER, "unexpected response shape", response.status);
      }
      const data = parsed.data;
      const choice = data.choices[0];
      const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id ?? generateId("call"),
        name: call.function.name,
        arguments: call.function.arguments,
      }));
      return {
        model: data.model ?? model,
        choices: [
          {
            message: {
              role: "assistant",
              content: choice.message.content ?? null,
              ...(toolCalls.length > 0 ? { toolCalls } : {}),
            },
            finishReason: choice.finish_reason ?? null,
          },
        ],
        usage: toUsage(data.usage) ?? toUsage(data.x_groq?.usage),
      };
    },

    async *sendStreaming(
      request: ChatRequest,
      cancellation?: CancellationToken,
    ): AsyncGenerator<ChatStreamChunk> {
      logger.debug("Sending streaming chat request", { model, messages: request.messages.length });
      const response = await transport.post(url, { ...headers, accept: "text/event-stream" }, buildBody(request, true), cancellation);
      const malformed = createMalformedFrameCounter(PROVIDER, logger);
      const pendingCalls = new Map<number, ToolCall>();
      let finishReason: string | null = null;
      let usage: TokenUsage | undefined;

      for await (const event of readSseEvents(response, { provider: PROVIDER, cancellation, logger })) {
        const data = event.data.trim();
        if (data === "[DONE]") break;

        const frame = StreamFrameSchema.safeParse(parseFrame(data));
        if (!frame.success) {
          malformed.record(data);
          continue;
        }

        usage = toUsage(frame.data.usage) ?? toUsage(frame.data.x_groq?.usage) ?? usage;

        for (const choice of frame.data.choices) {
          const delta = choice.delta;
          if (delta?.content) {
            yield { type: "text_delta", text: delta.content };
          }
          for (const part of delta?.tool_calls ?? []) {
            const existing = pendingCalls.get(part.index);
            if (existing) {
              if (part.id) existing.id = part.id;
              if (part.function?.name) existing.name += part.function.name;
              existing.arguments += part.function?.arguments ?? "";
            } else {
              pendingCalls.set(part.index, {
                id: part.id ?? generateId("call"),
                name: part.function?.name ?? "",
                arguments: part.function?.arguments ?? "",
              });
            }
          }
          if (choice.finish_reason) finishReason = choice.finish_reason;
        }
      }

      malformed.report();

      if (pendingCalls.size > 0) {
        const toolCalls = [...pendingCalls.entries()]
          .sort(([a], [b]) => a - b)
          .map(([, call]) => call);
        yield { type: "tool_calls", toolCalls, finishReason: finishReason ?? "tool_calls", usage };
      } else {
        yield { type: "finish", finishReason, usage };
      }
    },

    close(): void {
      transport.close();
    },
  };
}
