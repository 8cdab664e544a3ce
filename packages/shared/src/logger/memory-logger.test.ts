import { describe, it, expect } from "vitest";
import { createMemoryLogger } from "./memory-logger.js";

describe("MemoryLogger", () => {
  it("records entries with level, module and data", () => {
    const logger = createMemoryLogger("Agent");
    logger.warn("slow", { ms: 5 });
    expect(logger.entries).toEqual([{ level: "warn", module: "Agent", message: "slow", data: { ms: 5 } }]);
  });

  it("children share the parent's entry list", () => {
    const logger = createMemoryLogger("Agent");
    logger.child("tools").info("ran");
    expect(logger.at("info")).toEqual([{ level: "info", module: "Agent:tools", message: "ran" }]);
  });

  it("attaches context set through setContext", () => {
    const logger = createMemoryLogger();
    logger.setContext({ traceId: "t-1" });
    logger.error("boom");
    expect(logger.entries[0].context).toEqual({ traceId: "t-1" });
  });
});
