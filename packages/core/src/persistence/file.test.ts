import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createMemoryLogger } from "@ferryman/shared";
import { FilePersistence } from "./file.js";

const checkpoint = {
  isRunning: true,
  currentStep: "Executed tool: calculator",
  iterationCount: 4,
  timestamp: "2026-01-01T00:00:00.000Z",
};

describe("FilePersistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ferryman-persistence-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns empty state when nothing was written", async () => {
    const store = new FilePersistence(join(dir, "missing"), { logger: createMemoryLogger() });

    expect(await store.loadMessages()).toEqual([]);
    expect(await store.loadCheckpoint()).toBeNull();
  });

  it("persists messages across instances", async () => {
    const first = new FilePersistence(dir, { logger: createMemoryLogger() });
    await Promise.all([
      first.saveMessage({ role: "user", content: "hi", isSummary: false }),
      first.saveMessage({ role: "tool", content: "Result: 5", isSummary: false, toolCallId: "c1" }),
    ]);

    const second = new FilePersistence(dir, { logger: createMemoryLogger() });
    expect(await second.loadMessages()).toEqual([
      { role: "user", content: "hi", isSummary: false },
      { role: "tool", content: "Result: 5", isSummary: false, toolCallId: "c1" },
    ]);
    expect(await readdir(dir)).toEqual(["messages.json"]);
  });

  it("prunes old non-summary rows and clears", async () => {
    const store = new FilePersistence(dir, { logger: createMemoryLogger() });
    await store.saveMessage({ role: "user", content: "old", isSummary: false });
    await store.saveMessage({ role: "system", content: "Historical context: x", isSummary: true });
    await store.saveMessage({ role: "user", content: "new", isSummary: false });

    await store.deleteOldMessages(1);
    expect((await store.loadMessages()).map((m) => m.content)).toEqual(["Historical context: x", "new"]);

    await store.clearMessages();
    const onDisk: unknown = JSON.parse(await readFile(join(dir, "messages.json"), "utf-8"));
    expect(onDisk).toEqual({ version: 1, messages: [] });
  });

  it("round-trips and clears the checkpoint", async () => {
    const store = new FilePersistence(dir, { logger: createMemoryLogger() });

    await store.saveCheckpoint(checkpoint);
    expect(await new FilePersistence(dir, { logger: createMemoryLogger() }).loadCheckpoint()).toEqual(checkpoint);

    await store.clearCheckpoint();
    expect(await store.loadCheckpoint()).toBeNull();
    await expect(store.clearCheckpoint()).resolves.toBeUndefined();
  });

  it("treats an invalid checkpoint as absent and warns", async () => {
    const logger = createMemoryLogger();
    await writeFile(join(dir, "checkpoint.json"), JSON.stringify({ isRunning: "yes" }));

    expect(await new FilePersistence(dir, { logger }).loadCheckpoint()).toBeNull();
    expect(logger.at("warn").map((entry) => entry.message)).toEqual(["Ignoring invalid checkpoint file"]);
  });

  it("refuses a corrupt messages file", async () => {
    await writeFile(join(dir, "messages.json"), "{not json");
    const store = new FilePersistence(dir, { logger: createMemoryLogger() });

    await expect(store.loadMessages()).rejects.toMatchObject({ code: "PERSISTENCE_ERROR" });
  });
});
