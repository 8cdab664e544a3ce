/**
 * Coordinator - routes a conversation between several agents.
 *
 * The first agent starts active. Every agent gets the `transfer_to_agent`
 * tool; a transfer recorded during a run takes effect when that run ends,
 * whether it completed or failed, so the next prompt goes to the new agent.
 * Agents that share a MemoryManager hand over the full conversation.
 */

import {
  AgentEventType,
  ConfigError,
  type AgentResponse,
  type AgentStateCheckpoint,
  type EventBus,
  type FinalResponse,
} from "@ferryman/sdk";
import { createLogger, type Logger } from "@ferryman/shared";
import { createEventBus } from "../bus/index.js";
import type { Agent, RunOptions } from "../execution/loop.js";
import { createTransferTool } from "./transfer-tool.js";

export type CoordinatorRunOptions = Omit<RunOptions, "resumeFrom">;

export interface Coordinator {
  readonly bus: EventBus;
  getActiveAgent(): Agent;
  listAgents(): string[];
  /** Schedule a switch after the current run. Unknown names are ignored and return false. */
  triggerHandoff(name: string, reason?: string): boolean;
  run(prompt: string, options?: CoordinatorRunOptions): Promise<FinalResponse>;
  runStreaming(prompt: string, options?: CoordinatorRunOptions): AsyncGenerator<AgentResponse>;
  resume(checkpoint: AgentStateCheckpoint, options?: CoordinatorRunOptions): Promise<FinalResponse>;
  resumeStreaming(checkpoint: AgentStateCheckpoint, options?: CoordinatorRunOptions): AsyncGenerator<AgentResponse>;
}

export interface CoordinatorOptions {
  bus?: EventBus;
  logger?: Logger;
}

interface PendingTransfer {
  target: string;
  reason: string;
}

export function createCoordinator(agentList: readonly Agent[], options: CoordinatorOptions = {}): Coordinator {
  const first = agentList[0];
  if (!first) {
    throw new ConfigError("A coordinator needs at least one agent");
  }

  const logger = options.logger ?? createLogger("Coordinator");
  const bus = options.bus ?? createEventBus();
  const agents = new Map<string, Agent>();
  for (const agent of agentList) {
    if (agents.has(agent.name)) {
      throw new ConfigError(`Duplicate agent name: ${agent.name}`);
    }
    agents.set(agent.name, agent);
  }

  let active: Agent = first;
  let pending: PendingTransfer | undefined;

  function emitEvent(type: string, payload: Record<string, unknown>): void {
    bus.emit({ type, timestamp: Date.now(), payload });
  }

  function triggerHandoff(name: string, reason = ""): boolean {
    if (!agents.has(name)) {
      logger.warn(`Ignoring handoff to unknown agent: ${name}`);
      return false;
    }
    pending = { target: name, reason };
    logger.info(`Handoff requested: ${active.name} -> ${name}`, { reason });
    emitEvent(AgentEventType.COORDINATOR_TRANSFER_REQUESTED, { from: active.name, to: name, reason });
    return true;
  }

  function applyPendingTransfer(): void {
    const next = pending && agents.get(pending.target);
    if (!pending || !next) return;
    const { reason } = pending;
    pending = undefined;
    if (next === active) return;

    const from = active.name;
    active = next;
    logger.info(`Active agent is now ${next.name}`, { from });
    emitEvent(AgentEventType.COORDINATOR_HANDOFF, { from, to: next.name, reason });
  }

  const transferTool = createTransferTool({
    agentNames: () => [...agents.keys()],
    requestTransfer: (target, reason) => triggerHandoff(target, reason),
  });
  for (const agent of agents.values()) {
    if (!agent.addTool(transferTool)) {
      logger.warn(`Agent "${agent.name}" already has a transfer_to_agent tool`);
    }
  }

  async function runActive(prompt: string, runOptions: RunOptions): Promise<FinalResponse> {
    try {
      return await active.run(prompt, runOptions);
    } finally {
      applyPendingTransfer();
    }
  }

  async function* streamActive(prompt: string, runOptions: RunOptions): AsyncGenerator<AgentResponse> {
    try {
      yield* active.runStreaming(prompt, runOptions);
    } finally {
      applyPendingTransfer();
    }
  }

  return {
    bus,

    getActiveAgent: () => active,

    listAgents: () => [...agents.keys()],

    triggerHandoff,

    run: (prompt, runOptions = {}) => runActive(prompt, runOptions),

    runStreaming: (prompt, runOptions = {}) => streamActive(prompt, runOptions),

    resume: (checkpoint, runOptions = {}) => runActive("", { ...runOptions, resumeFrom: checkpoint }),

    resumeStreaming: (checkpoint, runOptions = {}) => streamActive("", { ...runOptions, resumeFrom: checkpoint }),
  };
}
