/**
 * MemoryManager - bounded conversation history with automatic summarization.
 *
 * Short-term memory holds the most recent messages. When it grows past its
 * limit, the whole window is summarized with one model call and replaced by
 * a `Historical context: …` system message in long-term memory. Long-term
 * memory keeps the newest summaries up to its own limit.
 *
 * After every `addMessage` resolves: shortTerm ≤ shortLimit and
 * longTerm ≤ longLimit.
 */

import {
  AgentEventType,
  errorMessage,
  type AgentStateCheckpoint,
  type ChatMessage,
  type EventBus,
  type IPersistence,
  type LlmClient,
  type StoredMessage,
} from "@ferryman/sdk";
import { createLogger, type Logger } from "@ferryman/shared";
import { MetricName, type MetricsCollector } from "../observability/metrics.js";

export const SUMMARY_PREFIX = "Historical context: ";

export const SUMMARIZER_INSTRUCTION =
  "You are a helpful summarizer. Summarize the following conversation history into a single concise paragraph that captures the key points, ongoing topics, and current context. Keep it under 500 words.";

export function fallbackSummary(count: number): string {
  return `Previous conversation context: ${count} messages exchanged, focusing on user queries and agent responses.`;
}

export interface MemoryStats {
  shortTerm: number;
  longTerm: number;
}

export interface MemoryManager {
  /** Load persisted rows. Summary rows go to long-term memory. */
  init(): Promise<void>;
  /** Returns false when the message was refused as empty. */
  addMessage(message: ChatMessage): Promise<boolean>;
  /** Long-term summaries followed by short-term history. */
  getMessages(): readonly ChatMessage[];
  clear(): Promise<void>;
  stats(): MemoryStats;
  saveCheckpoint(checkpoint: AgentStateCheckpoint): Promise<void>;
  loadCheckpoint(): Promise<AgentStateCheckpoint | null>;
  clearCheckpoint(): Promise<void>;
}

export interface MemoryManagerOptions {
  /** Client used for the summarization call. */
  summarizer: LlmClient;
  persistence?: IPersistence;
  shortLimit?: number;
  longLimit?: number;
  bus?: EventBus;
  metrics?: MetricsCollector;
  logger?: Logger;
}

/** Empty content is only allowed on tool-call and tool-result messages. */
export function isStorableMessage(message: ChatMessage): boolean {
  switch (message.role) {
    case "system":
    case "user":
      return message.content !== "";
    case "assistant":
      return (message.content ?? "") !== "" || (message.toolCalls?.length ?? 0) > 0;
    case "tool":
      return message.toolCallId !== "";
  }
}

export function toStoredMessage(message: ChatMessage, isSummary = false): StoredMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content, isSummary };
    case "assistant":
      return {
        role: "assistant",
        content: message.content ?? "",
        isSummary,
        ...(message.toolCalls && message.toolCalls.length > 0 ? { toolCalls: message.toolCalls } : {}),
      };
    case "tool":
      return { role: "tool", content: message.content, isSummary, toolCallId: message.toolCallId };
  }
}

/** Undefined for a tool row that lost its call id. */
export function fromStoredMessage(row: StoredMessage): ChatMessage | undefined {
  switch (row.role) {
    case "system":
    case "user":
      return { role: row.role, content: row.content };
    case "assistant": {
      const toolCalls = row.toolCalls ?? [];
      if (toolCalls.length === 0) return { role: "assistant", content: row.content };
      return { role: "assistant", content: row.content === "" ? null : row.content, toolCalls };
    }
    case "tool":
      return row.toolCallId ? { role: "tool", content: row.content, toolCallId: row.toolCallId } : undefined;
  }
}

function transcriptLine(message: ChatMessage): string {
  if (message.role === "assistant" && message.toolCalls && message.toolCalls.length > 0) {
    const names = message.toolCalls.map((call) => call.name).join(", ");
    const text = message.content ? `${message.content} ` : "";
    return `assistant: ${text}[called ${names}]`;
  }
  return `${message.role}: ${message.content ?? ""}`;
}

export function createMemoryManager(options: MemoryManagerOptions): MemoryManager {
  const { summarizer, persistence, bus, metrics } = options;
  const shortLimit = options.shortLimit ?? 10;
  const longLimit = options.longLimit ?? 5;
  const logger = options.logger ?? createLogger("MemoryManager");

  let shortTerm: ChatMessage[] = [];
  let longTerm: ChatMessage[] = [];
  let cache: readonly ChatMessage[] | undefined;

  async function summarize(messages: ChatMessage[]): Promise<{ text: string; fallback: boolean }> {
    try {
      const response = await summarizer.send({
        messages: [
          { role: "system", content: SUMMARIZER_INSTRUCTION },
          { role: "user", content: messages.map(transcriptLine).join("\n") },
        ],
      });
      const content = response.choices[0]?.message.content?.trim();
      if (!content) throw new Error("Empty summary response");
      logger.info("Summarized conversation history", {
        originalMessages: messages.length,
        summaryLength: content.length,
      });
      return { text: content, fallback: false };
    } catch (err) {
      logger.error("Failed to summarize messages", { error: errorMessage(err), messageCount: messages.length });
      return { text: fallbackSummary(messages.length), fallback: true };
    }
  }

  async function collapseShortTerm(): Promise<void> {
    logger.info("Short-term memory limit reached, summarizing to long-term memory", {
      shortTerm: shortTerm.length,
      shortLimit,
    });
    const window = shortTerm;
    const summary = await summarize(window);
    const summaryMessage: ChatMessage = { role: "system", content: `${SUMMARY_PREFIX}${summary.text}` };

    longTerm = [...longTerm, summaryMessage];
    shortTerm = [];
    cache = undefined;

    if (persistence) {
      await persistence.saveMessage(toStoredMessage(summaryMessage, true));
      await persistence.deleteOldMessages(shortLimit);
    }

    if (longTerm.length > longLimit) {
      longTerm = longTerm.slice(longTerm.length - longLimit);
      logger.debug("Evicted oldest long-term summary", { longTerm: longTerm.length });
    }

    metrics?.increment(MetricName.MEMORY_SUMMARIES);
    bus?.emit({
      type: AgentEventType.MEMORY_SUMMARIZED,
      timestamp: Date.now(),
      payload: { summarizedMessages: window.length, fallback: summary.fallback, longTerm: longTerm.length },
    });
  }

  return {
    async init(): Promise<void> {
      if (!persistence) return;
      const rows = await persistence.loadMessages();
      const restoredShort: ChatMessage[] = [];
      const restoredLong: ChatMessage[] = [];
      for (const row of rows) {
        const message = fromStoredMessage(row);
        if (!message) {
          logger.warn("Skipping stored tool result without a call id");
          continue;
        }
        (row.isSummary ? restoredLong : restoredShort).push(message);
      }
      shortTerm = restoredShort.slice(-shortLimit);
      longTerm = restoredLong.slice(-longLimit);
      cache = undefined;
      logger.info("Memory restored", { shortTerm: shortTerm.length, longTerm: longTerm.length });
    },

    async addMessage(message: ChatMessage): Promise<boolean> {
      if (!isStorableMessage(message)) {
        logger.warn("Refusing empty message", { role: message.role });
        return false;
      }

      if (persistence) {
        await persistence.saveMessage(toStoredMessage(message));
      }
      shortTerm = [...shortTerm, message];
      cache = undefined;

      if (shortTerm.length > shortLimit) {
        await collapseShortTerm();
      }
      return true;
    },

    getMessages(): readonly ChatMessage[] {
      if (!cache) cache = [...longTerm, ...shortTerm];
      return cache;
    },

    async clear(): Promise<void> {
      shortTerm = [];
      longTerm = [];
      cache = undefined;
      await persistence?.clearMessages();
      logger.info("Memory cleared");
    },

    stats(): MemoryStats {
      return { shortTerm: shortTerm.length, longTerm: longTerm.length };
    },

    async saveCheckpoint(checkpoint: AgentStateCheckpoint): Promise<void> {
      await persistence?.saveCheckpoint(checkpoint);
    },

    async loadCheckpoint(): Promise<AgentStateCheckpoint | null> {
      return persistence ? persistence.loadCheckpoint() : null;
    },

    async clearCheckpoint(): Promise<void> {
      await persistence?.clearCheckpoint();
    },
  };
}
