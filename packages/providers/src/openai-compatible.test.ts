import { describe, it, expect } from "vitest";
import { CancellationToken, CancelledError, type ChatRequest } from "@ferryman/sdk";
import { createMemoryLogger } from "@ferryman/shared";
import { createOpenAICompatibleClient } from "./openai-compatible.js";
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
  const logger = createMemoryLogger();
  const client = createOpenAICompatibleClient({
    apiKey: "test-secret",
    model: "gpt-test",
    baseUrl: "https://llm.example.com/v1/",
    fetch: fake.fetch,
    sleep: createRecordingSleep().sleep,
    logger,
  });
  return { client, fake, logger };
}

const simpleRequest: ChatRequest = { messages: [{ role: "user", content: "hi" }] };

describe("OpenAI-compatible client", () => {
  it("maps canonical messages, tools and sampling onto the wire", async () => {
    const { client, fake } = setup(
      jsonResponse({
        model: "gpt-test",
        choices: [{ message: { role: "assistant", content: "hi" }, finish_reason: "stop" }],
        usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
      }),
    );

    const response = await client.send({
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "hi" },
        {
          role: "assistant",
          content: null,
          toolCalls: [{ id: "call_1", name: "lookup", arguments: '{"q":"x"}' }],
        },
        { role: "tool", toolCallId: "call_1", content: "found" },
      ],
      tools: [
        {
          name: "lookup",
          description: "Look up",
          parameters: { type: "object", properties: { q: { type: "string" } }, required: ["q"] },
        },
      ],
      options: { temperature: 0.1, maxTokens: 50, stop: ["END"] },
    });

    const request = fake.requests[0];
    expect(request.url).toBe("https://llm.example.com/v1/chat/completions");
    expect(request.init.headers).toEqual({
      "content-type": "application/json",
      authorization: "Bearer test-secret",
    });
    expect(request.body).toEqual({
      model: "gpt-test",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "hi" },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            { id: "call_1", type: "function", function: { name: "lookup", arguments: '{"q":"x"}' } },
          ],
        },
        { role: "tool", tool_call_id: "call_1", content: "found" },
      ],
      tools: [
        {
          type: "function",
          function: {
            name: "lookup",
            description: "Look up",
            parameters: { type: "object", properties: { q: { type: "string" } }, required: ["q"] },
          },
        },
      ],
      tool_choice: "auto",
      temperature: 0.1,
      max_completion_tokens: 50,
      stop: ["END"],
    });

    expect(response).toEqual({
      model: "gpt-test",
      choices: [{ message: { role: "assistant", content: "hi" }, finishReason: "stop" }],
      usage: { promptTokens: 3, completionTokens: 2, totalTokens: 5 },
    });
  });

  it("omits tools and tool_choice when no tools are given", async () => {
    const { client, fake } = setup(
      jsonResponse({ choices: [{ message: { content: "ok" }, finish_reason: "stop" }] }),
    );
    await client.send(simpleRequest);
    expect(fake.requests[0].body).toEqual({ model: "gpt-test", messages: [{ role: "user", content: "hi" }] });
  });

  it("parses tool calls and falls back to x_groq usage", async () => {
    const { client } = setup(
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: "call_9", type: "function", function: { name: "lookup", arguments: '{"q":"y"}' } },
              ],
            },
            finish_reason: "tool_calls",
          },
        ],
        x_groq: { usage: { prompt_tokens: 1, completion_tokens: 1, total_tokens: 2 } },
      }),
    );

    const response = await client.send(simpleRequest);

    expect(response.choices[0]).toEqual({
      message: {
        role: "assistant",
        content: null,
        toolCalls: [{ id: "call_9", name: "lookup", arguments: '{"q":"y"}' }],
      },
      finishReason: "tool_calls",
    });
    expect(response.usage).toEqual({ promptTokens: 1, completionTokens: 1, totalTokens: 2 });
  });

  it("streams text deltas and finishes with usage", async () => {
    const { client, fake } = setup(
      streamResponse([
        sseFrames(
          [
            { choices: [{ delta: { role: "assistant", content: "Hel" } }] },
            { choices: [{ delta: { content: "lo" } }] },
            { choices: [{ delta: {}, finish_reason: "stop" }] },
            { choices: [], usage: { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 } },
          ],
          { done: true },
        ),
      ]),
    );

    const chunks = await collect(client.sendStreaming(simpleRequest));

    expect(chunks).toEqual([
      { type: "text_delta", text: "Hel" },
      { type: "text_delta", text: "lo" },
      { type: "finish", finishReason: "stop", usage: { promptTokens: 4, completionTokens: 2, totalTokens: 6 } },
    ]);
    expect(fake.requests[0].body).toMatchObject({ stream: true, stream_options: { include_usage: true } });
    expect(fake.requests[0].init.headers).toMatchObject({ accept: "text/event-stream" });
  });

  it("concatenates tool-call deltas by index into one final chunk", async () => {
    const { client } = setup(
      streamResponse([
        sseFrames(
          [
            {
              choices: [
                {
                  delta: {
                    tool_calls: [
                      { index: 0, id: "call_a", type: "function", function: { name: "add", arguments: "" } },
                    ],
                  },
                },
              ],
            },
            { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"a":' } }] } }] },
            {
              choices: [
                { delta: { tool_calls: [{ index: 1, id: "call_b", function: { name: "mul", arguments: "{}" } }] } },
              ],
            },
            { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: "1}" } }] } }] },
            { choices: [{ delta: {}, finish_reason: "tool_calls" }] },
          ],
          { done: true },
        ),
      ]),
    );

    const chunks = await collect(client.sendStreaming(simpleRequest));

    expect(chunks).toEqual([
      {
        type: "tool_calls",
        toolCalls: [
          { id: "call_a", name: "add", arguments: '{"a":1}' },
          { id: "call_b", name: "mul", arguments: "{}" },
        ],
        finishReason: "tool_calls",
        usage: undefined,
      },
    ]);
  });

  it("skips malformed frames and reports them at warn level", async () => {
    const { client, logger } = setup(
      streamResponse([
        sseFrames(["not-json", { choices: [{ delta: { content: "ok" }, finish_reason: "stop" }] }], {
          done: true,
        }),
      ]),
    );

    const chunks = await collect(client.sendStreaming(simpleRequest));

    expect(chunks).toEqual([
      { type: "text_delta", text: "ok" },
      { type: "finish", finishReason: "stop", usage: undefined },
    ]);
    expect(logger.at("warn").map((entry) => entry.message)).toEqual(["Skipped 1 malformed stream frame(s)"]);
  });

  it("never reaches the transport with a pre-cancelled token", async () => {
    const { client, fake } = setup(jsonResponse({}));
    const token = new CancellationToken();
    token.cancel();

    await expect(client.send(simpleRequest, token)).rejects.toBeInstanceOf(CancelledError);
    await expect(collect(client.sendStreaming(simpleRequest, token))).rejects.toBeInstanceOf(CancelledError);
    expect(fake.requests).toHaveLength(0);
  });

  it("rejects calls after close()", async () => {
    const { client, fake } = setup(jsonResponse({}));
    client.close();

    await expect(client.send(simpleRequest)).rejects.toMatchObject({ code: "TRANSPORT_CLOSED" });
    expect(fake.requests).toHaveLength(0);
  });

  it("reports an unexpected response shape as a provider error", async () => {
    const { client } = setup(jsonResponse({ choices: [] }));
    await expect(client.send(simpleRequest)).rejects.toMatchObject({ code: "PROVIDER_ERROR" });
  });
});
