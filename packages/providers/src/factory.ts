/**
 * Build the adapter for a validated provider configuration.
 */

import type { LlmClient } from "@ferryman/sdk";
import type { ProviderConfig } from "@ferryman/shared";
import { createAnthropicClient } from "./anthropic.js";
import { createGeminiClient } from "./gemini.js";
import { createOpenAICompatibleClient } from "./openai-compatible.js";
import type { ClientDeps } from "./http/transport.js";

export function createLlmClient(config: ProviderConfig, deps: ClientDeps = {}): LlmClient {
  const common = {
    ...deps,
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    maxAttempts: config.maxAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
    defaults: {
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      topP: config.topP,
      stop: config.stop,
    },
  };

  switch (config.provider) {
    case "openai":
      return createOpenAICompatibleClient(common);
    case "anthropic":
      return createAnthropicClient({ ...common, apiVersion: config.apiVersion });
    case "gemini":
      return createGeminiClient(common);
  }
}
