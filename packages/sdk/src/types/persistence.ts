/**
 * Storage contract used by the memory manager and the agent loop.
 */

import type { MessageRole, ToolCall } from "./message.js";
import type { AgentStateCheckpoint } from "./checkpoint.js";

/** A message row as persisted. */
export interface StoredMessage {
  role: MessageRole;
  content: string;
  isSummary: boolean;
  toolCallId?: string;
  toolCalls?: ToolCall[];
}

export interface IPersistence {
  saveMessage(message: StoredMessage): Promise<void>;
  /** Rows in insertion order. */
  loadMessages(): Promise<StoredMessage[]>;
  clearMessages(): Promise<void>;
  /** Keep the newest `keepLimit` rows; delete older rows that are not summaries. */
  deleteOldMessages(keepLimit: number): Promise<void>;
  saveCheckpoint(checkpoint: AgentStateCheckpoint): Promise<void>;
  loadCheckpoint(): Promise<AgentStateCheckpoint | null>;
  clearCheckpoint(): Promise<void>;
}
