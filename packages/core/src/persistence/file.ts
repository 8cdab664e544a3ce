/**
 * File-based persistence so an interrupted run can be resumed after the
 * process restarts.
 *
 * Storage layout:
 *   {directory}/
 *   ├── messages.json     # Conversation rows, oldest first
 *   └── checkpoint.json   # Last run checkpoint, absent when none
 *
 * Atomic writes: tmp file + rename. Files are validated with zod on load.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import {
  AgentError,
  ErrorCode,
  errorMessage,
  type AgentStateCheckpoint,
  type IPersistence,
  type StoredMessage,
} from "@ferryman/sdk";
import {
  AgentStateCheckpointSchema,
  StoredMessageSchema,
  createLogger,
  formatZodError,
  type Logger,
} from "@ferryman/shared";
import { pruneMessages } from "./in-memory.js";

const MESSAGES_FILE = "messages.json";
const CHECKPOINT_FILE = "checkpoint.json";

const MessagesFileSchema = z.object({
  version: z.literal(1),
  messages: z.array(StoredMessageSchema),
});

export interface FilePersistenceOptions {
  logger?: Logger;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FilePersistence implements IPersistence {
  private readonly logger: Logger;
  private readonly messagesPath: string;
  private readonly checkpointPath: string;
  private cache: StoredMessage[] | undefined;
  /** Serializes read-modify-write cycles on messages.json. */
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly directory: string,
    options: FilePersistenceOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("FilePersistence");
    this.messagesPath = join(directory, MESSAGES_FILE);
    this.checkpointPath = join(directory, CHECKPOINT_FILE);
  }

  async saveMessage(message: StoredMessage): Promise<void> {
    await this.updateMessages((rows) => [...rows, message]);
  }

  async loadMessages(): Promise<StoredMessage[]> {
    await this.pending;
    return [...(await this.readMessages())];
  }

  async clearMessages(): Promise<void> {
    await this.updateMessages(() => []);
  }

  async deleteOldMessages(keepLimit: number): Promise<void> {
    await this.updateMessages((rows) => pruneMessages(rows, keepLimit));
  }

  async saveCheckpoint(checkpoint: AgentStateCheckpoint): Promise<void> {
    await this.writeAtomic(this.checkpointPath, checkpoint);
  }

  /** An unreadable checkpoint is logged and treated as absent. */
  async loadCheckpoint(): Promise<AgentStateCheckpoint | null> {
    let raw: unknown;
    try {
      raw = await this.readJson(this.checkpointPath);
    } catch (err) {
      this.logger.warn("Ignoring unreadable checkpoint file", { error: errorMessage(err) });
      return null;
    }
    if (raw === undefined) return null;
    const parsed = AgentStateCheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn("Ignoring invalid checkpoint file", {
        path: this.checkpointPath,
        error: formatZodError(parsed.error),
      });
      return null;
    }
    return parsed.data;
  }

  async clearCheckpoint(): Promise<void> {
    await rm(this.checkpointPath, { force: true });
  }

  private updateMessages(change: (rows: StoredMessage[]) => StoredMessage[]): Promise<void> {
    const run = this.pending.then(async () => {
      const next = change(await this.readMessages());
      await this.writeAtomic(this.messagesPath, { version: 1, messages: next });
      this.cache = next;
    });
    // Later writes still run after a failed one.
    this.pending = run.catch((err: unknown) => {
      this.logger.error("Message write failed", { path: this.messagesPath, error: errorMessage(err) });
    });
    return run;
  }

  private async readMessages(): Promise<StoredMessage[]> {
    if (this.cache) return this.cache;
    const raw = await this.readJson(this.messagesPath);
    if (raw === undefined) {
      this.cache = [];
      return this.cache;
    }
    const parsed = MessagesFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AgentError(
        `Invalid messages file ${this.messagesPath}: ${formatZodError(parsed.error)}`,
        ErrorCode.PERSISTENCE_ERROR,
      );
    }
    this.cache = parsed.data.messages;
    return this.cache;
  }

  /** Parsed file contents, or undefined when the file does not exist. */
  private async readJson(path: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw new AgentError(`Cannot read ${path}: ${errorMessage(err)}`, ErrorCode.PERSISTENCE_ERROR, {
        cause: err,
      });
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new AgentError(`Corrupt JSON in ${path}: ${errorMessage(err)}`, ErrorCode.PERSISTENCE_ERROR, {
        cause: err,
      });
    }
  }

  private async writeAtomic(path: string, value: unknown): Promise<void> {
    await mkdir(this.directory, { recursive: true, mode: 0o755 });
    const tmp = `${path}.tmp`;
    await writeFile(tmp, JSON.stringify(value, null, 2), { encoding: "utf-8", mode: 0o600 });
    await rename(tmp, path);
  }
}
