/**
 * Process-local persistence. The default when no directory is configured.
 */

import type { AgentStateCheckpoint, IPersistence, StoredMessage } from "@ferryman/sdk";

function copyMessage(message: StoredMessage): StoredMessage {
  return {
    ...message,
    ...(message.toolCalls ? { toolCalls: message.toolCalls.map((call) => ({ ...call })) } : {}),
  };
}

/** Keep the newest `keepLimit` rows plus every older summary row. */
export function pruneMessages(rows: StoredMessage[], keepLimit: number): StoredMessage[] {
  const cutoff = rows.length - Math.max(0, keepLimit);
  return rows.filter((row, index) => index >= cutoff || row.isSummary);
}

export interface InMemoryPersistence extends IPersistence {
  /** Current rows, for inspection in tests. */
  readonly rows: readonly StoredMessage[];
  readonly checkpoint: AgentStateCheckpoint | null;
}

export function createInMemoryPersistence(): InMemoryPersistence {
  let rows: StoredMessage[] = [];
  let checkpoint: AgentStateCheckpoint | null = null;

  return {
    get rows(): readonly StoredMessage[] {
      return rows;
    },
    get checkpoint(): AgentStateCheckpoint | null {
      return checkpoint;
    },

    async saveMessage(message: StoredMessage): Promise<void> {
      rows.push(copyMessage(message));
    },

    async loadMessages(): Promise<StoredMessage[]> {
      return rows.map(copyMessage);
    },

    async clearMessages(): Promise<void> {
      rows = [];
    },

    async deleteOldMessages(keepLimit: number): Promise<void> {
      rows = pruneMessages(rows, keepLimit);
    },

    async saveCheckpoint(next: AgentStateCheckpoint): Promise<void> {
      checkpoint = { ...next };
    },

    async loadCheckpoint(): Promise<AgentStateCheckpoint | null> {
      return checkpoint ? { ...checkpoint } : null;
    },

    async clearCheckpoint(): Promise<void> {
      checkpoint = null;
    },
  };
}
