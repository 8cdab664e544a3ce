/**
 * Zod schemas for runtime configuration.
 *
 * Validates the provider, agent and memory sections at load time,
 * providing clear error messages for misconfigured fields.
 */

import { z } from "zod";

const samplingFields = {
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  topP: z.number().min(0).max(1).optional(),
  stop: z.array(z.string()).optional(),
};

const retryFields = {
  /** Total attempts, including the first. */
  maxAttempts: z.number().int().min(1).max(10).default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(1000),
};

const apiKey = z.string().min(1, "API key must not be empty");

export const OpenAIProviderConfigSchema = z.object({
  provider: z.literal("openai"),
  apiKey,
  model: z.string().min(1).default("gpt-4o-mini"),
  baseUrl: z.string().url().default("https://api.openai.com/v1"),
  ...samplingFields,
  ...retryFields,
});

export const AnthropicProviderConfigSchema = z.object({
  provider: z.literal("anthropic"),
  apiKey,
  model: z.string().min(1).default("claude-3-5-sonnet-latest"),
  baseUrl: z.string().url().default("https://api.anthropic.com/v1"),
  apiVersion: z.string().min(1).default("2023-06-01"),
  ...samplingFields,
  ...retryFields,
});

export const GeminiProviderConfigSchema = z.object({
  provider: z.literal("gemini"),
  apiKey,
  model: z.string().min(1).default("gemini-1.5-flash-latest"),
  baseUrl: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),
  ...samplingFields,
  ...retryFields,
});

export const ProviderConfigSchema = z.discriminatedUnion("provider", [
  OpenAIProviderConfigSchema,
  AnthropicProviderConfigSchema,
  GeminiProviderConfigSchema,
]);

export const AgentSettingsSchema = z.object({
  name: z.string().min(1, "Agent name must not be empty").default("assistant"),
  description: z.string().default(""),
  instructions: z.string().default("You are a helpful assistant."),
  maxIterations: z.number().int().positive().default(10),
  maxPromptLength: z.number().int().positive().default(100 * 1024),
  streaming: z.boolean().default(true),
});

export const MemorySettingsSchema = z.object({
  shortLimit: z.number().int().positive().default(10),
  longLimit: z.number().int().positive().default(5),
  /** Directory for file persistence; in-memory when absent. */
  persistencePath: z.string().min(1).optional(),
});

export const RuntimeConfigSchema = z.object({
  provider: ProviderConfigSchema,
  agent: AgentSettingsSchema.default({}),
  memory: MemorySettingsSchema.default({}),
});

export type OpenAIProviderConfig = z.infer<typeof OpenAIProviderConfigSchema>;
export type AnthropicProviderConfig = z.infer<typeof AnthropicProviderConfigSchema>;
export type GeminiProviderConfig = z.infer<typeof GeminiProviderConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
/** Provider config before defaults are applied, as written by users. */
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type MemorySettings = z.infer<typeof MemorySettingsSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
