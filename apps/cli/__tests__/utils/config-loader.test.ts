import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "@ferryman/sdk";
import { loadRuntimeConfig, providerOverrides } from "../../src/utils/config-loader.js";

describe("providerOverrides", () => {
  it("maps FERRYMAN_* variables and skips blank ones", () => {
    expect(
      providerOverrides({
        FERRYMAN_PROVIDER: "gemini",
        FERRYMAN_API_KEY: " test-secret ",
        FERRYMAN_MODEL: "",
        HOME: "/home/someone",
      }),
    ).toEqual({ provider: "gemini", apiKey: "test-secret" });
  });
});

describe("loadRuntimeConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ferryman-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("builds a full config from environment variables alone", async () => {
    const config = await loadRuntimeConfig({
      env: { FERRYMAN_PROVIDER: "openai", FERRYMAN_API_KEY: "test-secret" },
    });

    expect(config).toEqual({
      provider: {
        provider: "openai",
        apiKey: "test-secret",
        model: "gpt-4o-mini",
        baseUrl: "https://api.openai.com/v1",
        maxAttempts: 3,
        retryBaseDelayMs: 1000,
      },
      agent: {
        name: "assistant",
        description: "",
        instructions: "You are a helpful assistant.",
        maxIterations: 10,
        maxPromptLength: 102400,
        streaming: true,
      },
      memory: { shortLimit: 10, longLimit: 5 },
    });
  });

  it("lets the environment override the file's provider fields", async () => {
    const path = join(dir, "ferryman.json");
    await writeFile(
      path,
      JSON.stringify({
        provider: { provider: "anthropic", apiKey: "file-key", temperature: 0.3 },
        agent: { name: "helper", streaming: false },
      }),
    );

    const config = await loadRuntimeConfig({
      configPath: path,
      env: { FERRYMAN_API_KEY: "test-secret", FERRYMAN_MODEL: "claude-test" },
    });

    expect(config.provider).toMatchObject({
      provider: "anthropic",
      apiKey: "test-secret",
      model: "claude-test",
      temperature: 0.3,
      apiVersion: "2023-06-01",
    });
    expect(config.agent.name).toBe("helper");
    expect(config.agent.streaming).toBe(false);
  });

  it("reports schema violations with their path", async () => {
    const path = join(dir, "ferryman.json");
    await writeFile(path, JSON.stringify({ provider: { provider: "openai", apiKey: "test-secret" }, memory: { shortLimit: 0 } }));

    await expect(loadRuntimeConfig({ configPath: path, env: {} })).rejects.toThrow(
      "Invalid configuration: memory.shortLimit: Number must be greater than 0",
    );
  });

  it("rejects a file that is not JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ provider: ");

    const error = await loadRuntimeConfig({ configPath: path, env: {} }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ message: expect.stringMatching(/^Config file .+ is not valid JSON: /) });
  });

  it("rejects a missing file", async () => {
    await expect(loadRuntimeConfig({ configPath: join(dir, "nope.json"), env: {} })).rejects.toBeInstanceOf(
      ConfigError,
    );
  });

  it("fails without any provider", async () => {
    await expect(loadRuntimeConfig({ env: {} })).rejects.toThrow(/^Invalid configuration: provider\.provider: /);
  });
});
