import { describe, it, expect, vi } from "vitest";
import { AgentEventType, type AgentEvent } from "@ferryman/sdk";
import { createMemoryLogger } from "@ferryman/shared";
import { createEventBus } from "./index.js";

function makeEvent(type: string, payload?: unknown): AgentEvent {
  return { type, timestamp: Date.now(), payload };
}

describe("EventBus", () => {
  it("calls handler when matching event is emitted", () => {
    const bus = createEventBus();
    const handler = vi.fn();

    bus.on(AgentEventType.TOOL_RESULT, handler);
    const event = makeEvent(AgentEventType.TOOL_RESULT, { name: "calculator" });
    bus.emit(event);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it("does not call handler for non-matching event types", () => {
    const bus = createEventBus();
    const handler = vi.fn();

    bus.on(AgentEventType.TOOL_RESULT, handler);
    bus.emit(makeEvent(AgentEventType.TOOL_ERROR));

    expect(handler).not.toHaveBeenCalled();
  });

  it("unsubscribes handler via returned function", () => {
    const bus = createEventBus();
    const handler = vi.fn();

    const unsub = bus.on("test:event", handler);
    bus.emit(makeEvent("test:event"));
    unsub();
    bus.emit(makeEvent("test:event"));

    expect(handler).toHaveBeenCalledOnce();
  });

  it("once() handler fires only once", () => {
    const bus = createEventBus();
    const handler = vi.fn();

    bus.once("test:event", handler);
    bus.emit(makeEvent("test:event"));
    bus.emit(makeEvent("test:event"));

    expect(handler).toHaveBeenCalledOnce();
  });

  it("onAny() receives all events until unsubscribed", () => {
    const bus = createEventBus();
    const handler = vi.fn();

    const unsub = bus.onAny(handler);
    bus.emit(makeEvent("type:a"));
    bus.emit(makeEvent("type:b"));
    unsub();
    bus.emit(makeEvent("type:c"));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("isolates a throwing handler and logs it", () => {
    const logger = createMemoryLogger();
    const bus = createEventBus({ logger });
    const goodHandler = vi.fn();

    bus.on("test:event", () => {
      throw new Error("boom");
    });
    bus.on("test:event", goodHandler);
    bus.emit(makeEvent("test:event"));

    expect(goodHandler).toHaveBeenCalledOnce();
    expect(logger.at("error")).toEqual([
      { level: "error", module: "test", message: "Sync handler error", data: { type: "test:event", error: "boom" } },
    ]);
  });

  it("logs async handler rejections", async () => {
    const logger = createMemoryLogger();
    const bus = createEventBus({ logger });

    bus.on("test:event", async () => {
      throw new Error("async boom");
    });
    bus.emit(makeEvent("test:event"));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(logger.at("error").map((entry) => entry.data)).toEqual([
      { type: "test:event", error: "async boom" },
    ]);
  });
});
