/**
 * Wire a validated RuntimeConfig into a ready-to-run agent.
 */

import { resolve } from "node:path";
import type { IPersistence, LlmClient } from "@ferryman/sdk";
import {
  FilePersistence,
  createAgent,
  createEventBus,
  createInMemoryPersistence,
  createMemoryManager,
  createMetricsCollector,
  getStandardTools,
  type Agent,
  type MemoryManager,
  type MetricsCollector,
} from "@ferryman/core";
import { createLlmClient } from "@ferryman/providers";
import { createLogger, type Logger, type ProviderConfig, type RuntimeConfig } from "@ferryman/shared";

export interface Runtime {
  config: RuntimeConfig;
  client: LlmClient;
  memory: MemoryManager;
  agent: Agent;
  metrics: MetricsCollector;
}

export interface RuntimeDeps {
  createClient?: (config: ProviderConfig) => LlmClient;
  logger?: Logger;
  onWarning?: (warning: string) => void;
}

export async function createRuntime(config: RuntimeConfig, deps: RuntimeDeps = {}): Promise<Runtime> {
  const logger = deps.logger ?? createLogger("cli");
  const client = (deps.createClient ?? createLlmClient)(config.provider);
  const bus = createEventBus({ logger: logger.child("bus") });
  const metrics = createMetricsCollector();

  const persistence: IPersistence = config.memory.persistencePath
    ? new FilePersistence(resolve(config.memory.persistencePath), { logger: logger.child("persistence") })
    : createInMemoryPersistence();

  const memory = createMemoryManager({
    summarizer: client,
    persistence,
    shortLimit: config.memory.shortLimit,
    longLimit: config.memory.longLimit,
    bus,
    metrics,
    logger: logger.child("memory"),
  });
  await memory.init();

  const agent = createAgent({
    name: config.agent.name,
    description: config.agent.description,
    instructions: config.agent.instructions,
    maxIterations: config.agent.maxIterations,
    maxPromptLength: config.agent.maxPromptLength,
    client,
    memory,
    tools: getStandardTools(),
    bus,
    metrics,
    logger,
    onWarning: deps.onWarning,
  });

  logger.debug("Runtime ready", {
    provider: config.provider.provider,
    model: config.provider.model,
    persistent: config.memory.persistencePath !== undefined,
  });
  return { config, client, memory, agent, metrics };
}
