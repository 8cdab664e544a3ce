import { describe, it, expect } from "vitest";
import { ProviderConfigSchema, RuntimeConfigSchema } from "./config-schema.js";
import { validateInput } from "./validation.js";

describe("ProviderConfigSchema", () => {
  it("applies per-provider defaults", () => {
    const config = ProviderConfigSchema.parse({ provider: "anthropic", apiKey: "test-secret" });
    expect(config).toEqual({
      provider: "anthropic",
      apiKey: "test-secret",
      model: "claude-3-5-sonnet-latest",
      baseUrl: "https://api.anthropic.com/v1",
      apiVersion: "2023-06-01",
      maxAttempts: 3,
      retryBaseDelayMs: 1000,
    });
  });

  it("keeps explicit values", () => {
    const config = ProviderConfigSchema.parse({
      provider: "openai",
      apiKey: "test-secret",
      model: "llama-3.1-70b",
      baseUrl: "http://localhost:8080/v1",
      temperature: 0.2,
    });
    expect(config.model).toBe("llama-3.1-70b");
    expect(config.baseUrl).toBe("http://localhost:8080/v1");
    expect(config.temperature).toBe(0.2);
  });

  it("rejects an empty API key with a readable message", () => {
    const result = validateInput(ProviderConfigSchema, { provider: "gemini", apiKey: "" });
    expect(result).toEqual({ success: false, error: "apiKey: API key must not be empty" });
  });

  it("rejects unknown providers", () => {
    expect(ProviderConfigSchema.safeParse({ provider: "local", apiKey: "k" }).success).toBe(false);
  });
});

describe("RuntimeConfigSchema", () => {
  it("fills agent and memory sections", () => {
    const config = RuntimeConfigSchema.parse({
      provider: { provider: "gemini", apiKey: "test-secret" },
    });
    expect(config.agent).toEqual({
      name: "assistant",
      description: "",
      instructions: "You are a helpful assistant.",
      maxIterations: 10,
      maxPromptLength: 102400,
      streaming: true,
    });
    expect(config.memory).toEqual({ shortLimit: 10, longLimit: 5 });
  });
});
