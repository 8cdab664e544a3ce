/**
 * Runtime configuration for the CLI: an optional JSON file overlaid with
 * FERRYMAN_* environment variables, validated with RuntimeConfigSchema.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigError, errorMessage } from "@ferryman/sdk";
import { RuntimeConfigSchema, isPlainObject, validateInput, type RuntimeConfig } from "@ferryman/shared";

/** Environment variables that override the provider section. */
export const ENV_KEYS = {
  provider: "FERRYMAN_PROVIDER",
  apiKey: "FERRYMAN_API_KEY",
  model: "FERRYMAN_MODEL",
  baseUrl: "FERRYMAN_BASE_URL",
} as const;

export interface LoadConfigOptions {
  configPath?: string;
  env?: Record<string, string | undefined>;
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  const fullPath = resolve(path);
  let raw: string;
  try {
    raw = await readFile(fullPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${fullPath}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${fullPath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  if (!isPlainObject(json)) {
    throw new ConfigError(`Config file ${fullPath} must contain a JSON object`);
  }
  return json;
}

/** Non-empty FERRYMAN_* values, keyed by provider field. */
export function providerOverrides(env: Record<string, string | undefined>): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]?.trim();
    if (value) overrides[field] = value;
  }
  return overrides;
}

export async function loadRuntimeConfig(options: LoadConfigOptions = {}): Promise<RuntimeConfig> {
  const env = options.env ?? process.env;
  const fileConfig = options.configPath ? await readConfigFile(options.configPath) : {};
  const fileProvider = isPlainObject(fileConfig.provider) ? fileConfig.provider : {};

  const result = validateInput(RuntimeConfigSchema, {
    ...fileConfig,
    provider: { ...fileProvider, ...providerOverrides(env) },
  });
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }
  return result.data;
}
