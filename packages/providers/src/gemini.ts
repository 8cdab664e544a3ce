/**
 * Gemini generateContent adapter.
 *
 * The system instruction is hoisted into `systemInstruction`; "assistant"
 * becomes "model"; tool results become a user turn of `functionResponse`
 * parts keyed by the function name of the call they answer. Stream frames
 * carry whole parts, so each text part is forwarded as a delta and the
 * function calls of a frame as one tool-call chunk.
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
import { ProviderError, mergeSampling } from "@ferryman/sdk";
import { createLogger, generateId, parseJsonObject } from "@ferryman/shared";
import { createHttpTransport, readJson, type ClientDeps } from "./http/transport.js";
import { createMalformedFrameCounter, parseFrame, readSseEvents } from "./http/sse.js";

const PROVIDER = "gemini";
const DEFAULT_MAX_OUTPUT_TOKENS = 8192;

export interface GeminiClientOptions extends ClientDeps {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  defaults?: SamplingOptions;
}

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: { result: string } } };

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

const PartSchema = z
  .object({
    text: z.string().optional(),
    functionCall: z
      .object({ name: z.string(), args: z.record(z.unknown()).nullish() })
      .optional(),
  })
  .passthrough();

const UsageSchema = z.object({
  promptTokenCount: z.number().optional(),
  candidatesTokenCount: z.number().optional(),
  totalTokenCount: z.number().optional(),
});

const GenerateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(PartSchema).default([]) }).optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  usageMetadata: UsageSchema.optional(),
  modelVersion: z.string().optional(),
});

type GenerateResponse = z.infer<typeof GenerateResponseSchema>;

/** STOP → stop, function calls → tool_calls, anything else lower-cased. */
export function mapGeminiFinishReason(
  reason: string | undefined,
  hasToolCalls: boolean,
): string | null {
  if (hasToolCalls) return "tool_calls";
  if (!reason) return null;
  return reason === "STOP" ? "stop" : reason.toLowerCase();
}

function toUsage(usage: z.infer<typeof UsageSchema> | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  const promptTokens = usage.promptTokenCount ?? 0;
  const completionTokens = usage.candidatesTokenCount ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: usage.totalTokenCount ?? promptTokens + completionTokens,
  };
}

function isFunctionResponseTurn(content: GeminiContent | undefined): content is GeminiContent {
  return (
    content !== undefined &&
    content.role === "user" &&
    content.parts.length > 0 &&
    content.parts.every((part) => "functionResponse" in part)
  );
}

/** Split canonical messages into the system instruction and Gemini contents. */
export function toGeminiContents(messages: ChatMessage[]): {
  systemInstruction?: { parts: { text: string }[] };
  contents: GeminiContent[];
} {
  const systemParts: { text: string }[] = [];
  const contents: GeminiContent[] = [];
  const callNames = new Map<string, string>();

  for (const message of messages) {
    switch (message.role) {
      case "system":
        systemParts.push({ text: message.content });
        break;
      case "user":
        contents.push({ role: "user", parts: [{ text: message.content }] });
        break;
      case "assistant": {
        const parts: GeminiPart[] = [];
        if (message.content) parts.push({ text: message.content });
        for (const call of message.toolCalls ?? []) {
          callNames.set(call.id, call.name);
          parts.push({ functionCall: { name: call.name, args: parseJsonObject(call.arguments) } });
        }
        if (parts.length === 0) parts.push({ text: "" });
        contents.push({ role: "model", parts });
        break;
      }
      case "tool": {
        const part: GeminiPart = {
          functionResponse: {
            name: callNames.get(message.toolCallId) ?? message.toolCallId,
            response: { result: message.content },
          },
        };
        const previous = contents[contents.length - 1];
        if (isFunctionResponseTurn(previous)) {
          previous.parts.push(part);
        } else {
          contents.push({ role: "user", parts: [part] });
        }
        break;
      }
    }
  }

  return systemParts.length > 0
    ? { systemInstruction: { parts: systemParts }, contents }
    : { contents };
}

function extractParts(data: GenerateResponse): { texts: string[]; toolCalls: ToolCall[] } {
  const texts: string[] = [];
  const toolCalls: ToolCall[] = [];
  for (const part of data.candidates?.[0]?.content?.parts ?? []) {
    if (part.text) texts.push(part.text);
    if (part.functionCall) {
      toolCalls.push({
        id: generateId("call"),
        name: part.functionCall.name,
        arguments: JSON.stringify(part.functionCall.args ?? {}),
      });
    }
  }
  return { texts, toolCalls };
}

export function createGeminiClient(options: GeminiClientOptions): LlmClient {
  const model = options.model ?? "gemini-1.5-flash-latest";
  const baseUrl = (options.baseUrl ?? "https://generativelanguage.googleapis.com/v1beta").replace(/\/+$/, "");
  const key = encodeURIComponent(options.apiKey);
  const generateUrl = `${baseUrl}/models/${model}:generateContent?key=${key}`;
  const streamUrl = `${baseUrl}/models/${model}:streamGenerateContent?alt=sse&key=${key}`;
  const logger = options.logger ?? createLogger("GeminiClient");
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

  const headers = { "content-type": "application/json" };

  function buildBody(request: ChatRequest): Record<string, unknown> {
    const sampling = mergeSampling(options.defaults, request.options) ?? {};
    const { systemInstruction, contents } = toGeminiContents(request.messages);
    const generationConfig: Record<string, unknown> = {
      maxOutputTokens: sampling.maxTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
    };
    if (sampling.temperature !== undefined) generationConfig.temperature = sampling.temperature;
    if (sampling.topP !== undefined) generationConfig.topP = sampling.topP;
    if (sampling.stop && sampling.stop.length > 0) generationConfig.stopSequences = sampling.stop;

    const body: Record<string, unknown> = { contents, generationConfig };
    if (systemInstruction) body.systemInstruction = systemInstruction;
    if (request.tools && request.tools.length > 0) {
      body.tools = [
        {
          functionDeclarations: request.tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
          })),
        },
      ];
    }
    return body;
  }

  return {
    provider: PROVIDER,
    model,

    async send(request: ChatRequest, cancellation?: CancellationToken): Promise<ChatResponse> {
      logger.debug("Sending generateContent request", { model, messages: request.messages.length });
      const response = await transport.post(generateUrl, headers, buildBody(request), cancellation);
      const parsed = GenerateResponseSchema.safeParse(await readJson(response, PROVIDER));
      if (!parsed.success) {
        throw new ProviderError(PROVIDER, "unexpected response shape", response.status);
      }
      const { texts, toolCalls } = extractParts(parsed.data);
      return {
        model: parsed.data.modelVersion ?? model,
        choices: [
          {
            message: {
              role: "assistant",
              content: texts.length > 0 ? texts.join("") : null,
              ...(toolCalls.length > 0 ? { toolCalls } : {}),
            },
            finishReason: mapGeminiFinishReason(
              parsed.data.candidates?.[0]?.finishReason,
              toolCalls.length > 0,
            ),
          },
        ],
        usage: toUsage(parsed.data.usageMetadata),
      };
    },

    async *sendStreaming(
      request: ChatRequest,
      cancellation?: CancellationToken,
    ): AsyncGenerator<ChatStreamChunk> {
      logger.debug("Sending streamGenerateContent request", { model, messages: request.messages.length });
      const response = await transport.post(streamUrl, headers, buildBody(request), cancellation);
      const malformed = createMalformedFrameCounter(PROVIDER, logger);

      for await (const event of readSseEvents(response, { provider: PROVIDER, cancellation, logger })) {
        const parsed = GenerateResponseSchema.safeParse(parseFrame(event.data));
        if (!parsed.success) {
          malformed.record(event.data);
          continue;
        }
        const frame = parsed.data;
        const usage = toUsage(frame.usageMetadata);

        if (!frame.candidates || frame.candidates.length === 0) {
          if (usage) yield { type: "usage", usage };
          continue;
        }

        const { texts, toolCalls } = extractParts(frame);
        for (const text of texts) {
          yield { type: "text_delta", text };
        }
        const finishReason = frame.candidates[0].finishReason;
        if (toolCalls.length > 0) {
          yield { type: "tool_calls", toolCalls, finishReason: "tool_calls", usage };
        } else if (finishReason) {
          yield { type: "finish", finishReason: mapGeminiFinishReason(finishReason, false), usage };
        } else if (usage) {
          yield { type: "usage", usage };
        }
      }

      malformed.report();
    },

    close(): void {
      transport.close();
    },
  };
}
