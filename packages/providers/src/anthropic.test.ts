import { describe, it, expect } from "vitest";
import { ApiError, CancellationToken, CancelledError, type ChatRequest } from "@ferryman/sdk";
import { createMemoryLogger } from "@ferryman/shared";
import { createAnthropicClient, mapAnthropicStopReason, toAnthropicMessages } from "./anthropic.js";
import {
  collect,
  createFakeFetch,
  createRecordingSleep,
  jsonResponse,
  sseFrames,
  streamResponse,
  type FakeReply,
} from "./testing/fake-fetch.js";

function setup(...replies: FakeReply[]) {
  const fake = createFakeFetch(...replies);
  const recording = createRecordingSleep();
  const retries: Array<[number, number, string]> = [];
  const client = createAnthropicClient({
    apiKey: "test-secret",
    model: "claude-test",
    fetch: fake.fetch,
    sleep: recording.sleep,
    onRetry: (attempt, delayMs, reason) => retries.push([attempt, delayMs, reason]),
    logger: createMemoryLogger(),
  });
  return { client, fake, delays: recording.delays, retries };
}

const simpleRequest: ChatRequest = { messages: [{ role: "user", content: "hi" }] };

describe("toAnthropicMessages", () => {
  it("hoists system messages and groups consecutive tool results", () => {
    const result = toAnthropicMessages([
      { role: "system", content: "one" },
      { role: "system", content: "two" },
      { role: "user", content: "add things" },
      {
        role: "assistant",
        content: "On it",
        toolCalls: [
          { id: "t1", name: "add", arguments: '{"a":1}' },
          { id: "t2", name: "add", arguments: "broken" },
        ],
      },
      { role: "tool", toolCallId: "t1", content: "2" },
      { role: "tool", toolCallId: "t2", content: "3" },
      { role: "assistant", content: null },
    ]);

    expect(result).toEqual({
      system: "one\n\ntwo",
      messages: [
        { role: "user", content: "add things" },
        {
          role: "assistant",
          content: [
            { type: "text", text: "On it" },
            { type: "tool_use", id: "t1", name: "add", input: { a: 1 } },
            { type: "tool_use", id: "t2", name: "add", input: {} },
          ],
        },
        {
          role: "user",
          content: [
            { type: "tool_result", tool_use_id: "t1", content: "2" },
            { type: "tool_result", tool_use_id: "t2", content: "3" },
          ],
        },
        { role: "assistant", content: "" },
      ],
    });
  });

  it("leaves out the system field when there is no system message", () => {
    expect(toAnthropicMessages([{ role: "user", content: "x" }])).toEqual({
      messages: [{ role: "user", content: "x" }],
    });
  });
});

describe("mapAnthropicStopReason", () => {
  it("renames tool_use and passes the rest through", () => {
    expect(mapAnthropicStopReason("tool_use")).toBe("tool_calls");
    expect(mapAnthropicStopReason("end_turn")).toBe("end_turn");
    expect(mapAnthropicStopReason(null)).toBeNull();
  });
});

describe("Anthropic client", () => {
  it("sends the Messages API request with version headers", async () => {
    const { client, fake } = setup(
      jsonResponse({
        model: "claude-test",
        content: [
          { type: "text", text: "first " },
          { type: "text", text: "second" },
        ],
        stop_reason: "end_turn",
        usage: { input_tokens: 10, output_tokens: 4 },
      }),
    );

    const response = await client.send({
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
      ],
      tools: [
        { name: "add", description: "Add", parameters: { type: "object", properties: {}, required: [] } },
      ],
      options: { temperature: 0.5, stop: ["###"] },
    });

    const request = fake.requests[0];
    expect(request.url).toBe("https://api.anthropic.com/v1/messages");
    expect(request.init.headers).toEqual({
      "x-api-key": "test-secret",
      "anthropic-version": "2023-06-01",
      "content-type": "application/json",
    });
    expect(request.body).toEqual({
      model: "claude-test",
      max_tokens: 4096,
      system: "be brief",
      messages: [{ role: "user", content: "hi" }],
      tools: [
        { name: "add", description: "Add", input_schema: { type: "object", properties: {}, required: [] } },
      ],
      temperature: 0.5,
      stop_sequences: ["###"],
    });
    expect(response).toEqual({
      model: "claude-test",
      choices: [{ message: { role: "assistant", content: "first second" }, finishReason: "end_turn" }],
      usage: { promptTokens: 10, completionTokens: 4, totalTokens: 14 },
    });
  });

  it("maps tool_use blocks in a non-streaming reply", async () => {
    const { client } = setup(
      jsonResponse({
        content: [{ type: "tool_use", id: "toolu_1", name: "add", input: { a: 1, b: 2 } }],
        stop_reason: "tool_use",
      }),
    );

    const response = await client.send(simpleRequest);

    expect(response.choices[0]).toEqual({
      message: {
        role: "assistant",
        content: null,
        toolCalls: [{ id: "toolu_1", name: "add", arguments: '{"a":1,"b":2}' }],
      },
      finishReason: "tool_calls",
    });
    expect(response.usage).toBeUndefined();
  });

  it("streams text deltas and a zero-usage finish", async () => {
    const { client } = setup(
      streamResponse([
        sseFrames(
          [
            { type: "message_start", message: { model: "claude-test" } },
            { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
            { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hi" } },
            { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: " there" } },
            { type: "content_block_stop", index: 0 },
            { type: "message_delta", delta: { stop_reason: "end_turn" } },
            { type: "message_stop" },
          ],
          { named: true },
        ),
      ]),
    );

    const chunks = await collect(client.sendStreaming(simpleRequest));

    expect(chunks).toEqual([
      { type: "text_delta", text: "Hi" },
      { type: "text_delta", text: " there" },
      { type: "finish", finishReason: "end_turn", usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 } },
    ]);
  });

  it("takes input tokens from message_start and output tokens from message_delta", async () => {
    const { client } = setup(
      streamResponse([
        sseFrames(
          [
            { type: "message_start", message: { usage: { input_tokens: 12, output_tokens: 1 } } },
            { type: "ping" },
            { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "ok" } },
            { type: "message_delta", delta: { stop_reason: "end_turn" }, usage: { output_tokens: 7 } },
            { type: "message_stop" },
          ],
          { named: true },
        ),
      ]),
    );

    const chunks = await collect(client.sendStreaming(simpleRequest));

    expect(chunks[chunks.length - 1]).toEqual({
      type: "finish",
      finishReason: "end_turn",
      usage: { promptTokens: 12, completionTokens: 7, totalTokens: 19 },
    });
  });

  it("buffers tool input fragments and emits every tool call in one chunk", async () => {
    const { client } = setup(
      streamResponse([
        sseFrames(
          [
            { type: "message_start", message: { usage: { input_tokens: 20, output_tokens: 0 } } },
            { type: "content_block_start", index: 0, content_block: { type: "tool_use", id: "toolu_a", name: "add" } },
            { type: "content_block_delta", index: 0, delta: { type: "input_json_delta", partial_json: '{"a":' } },
            { type: "content_block_delta", index: 0, delta: { type: "input_json_delta", partial_json: "1}" } },
            { type: "content_block_stop", index: 0 },
            { type: "content_block_start", index: 1, content_block: { type: "tool_use", id: "toolu_b", name: "mul" } },
            { type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: '{"x": 2}' } },
            { type: "content_block_stop", index: 1 },
            { type: "message_delta", delta: { stop_reason: "tool_use" }, usage: { output_tokens: 30 } },
            { type: "message_stop" },
          ],
          { named: true },
        ),
      ]),
    );

    const chunks = await collect(client.sendStreaming(simpleRequest));

    expect(chunks).toEqual([
      {
        type: "tool_calls",
        toolCalls: [
          { id: "toolu_a", name: "add", arguments: '{"a":1}' },
          { id: "toolu_b", name: "mul", arguments: '{"x":2}' },
        ],
        finishReason: "tool_calls",
        usage: { promptTokens: 20, completionTokens: 30, totalTokens: 50 },
      },
    ]);
  });

  it("raises an in-stream error event as an ApiError", async () => {
    const { client } = setup(
      streamResponse([
        sseFrames(
          [
            { type: "message_start", message: {} },
            { type: "error", error: { type: "overloaded_error", message: "Overloaded" } },
          ],
          { named: true },
        ),
      ]),
    );

    const failure = collect(client.sendStreaming(simpleRequest));

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({
      status: 200,
      body: '{"type":"overloaded_error","message":"Overloaded"}',
    });
  });

  it("retries a server error before succeeding", async () => {
    const { client, fake, delays, retries } = setup(
      jsonResponse({ type: "error" }, 500),
      jsonResponse({ content: [{ type: "text", text: "ok" }], stop_reason: "end_turn" }),
    );

    const response = await client.send(simpleRequest);

    expect(response.choices[0].message.content).toBe("ok");
    expect(fake.requests).toHaveLength(2);
    expect(delays).toEqual([2000]);
    expect(retries).toEqual([[1, 2000, "server error (500)"]]);
  });

  it("stops a stream that is cancelled mid-way", async () => {
    const { client } = setup(
      streamResponse([
        sseFrames(
          [
            { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hi" } },
            { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: " again" } },
            { type: "message_stop" },
          ],
          { named: true },
        ),
      ]),
    );
    const token = new CancellationToken();
    const seen: string[] = [];

    const consume = async (): Promise<void> => {
      for await (const chunk of client.sendStreaming(simpleRequest, token)) {
        if (chunk.type === "text_delta") seen.push(chunk.text);
        token.cancel();
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(CancelledError);
    expect(seen).toEqual(["Hi"]);
  });
});
