/**
 * EventBus - publish/subscribe event system.
 *
 * Handlers can be sync or async. Errors in handlers are caught
 * and logged so one handler cannot break the agent that emitted.
 */

import type { EventBus as IEventBus, EventHandler, AgentEvent } from "@ferryman/sdk";
import { errorMessage } from "@ferryman/sdk";
import { createLogger, type Logger } from "@ferryman/shared";

export interface EventBusOptions {
  logger?: Logger;
}

export function createEventBus(options: EventBusOptions = {}): IEventBus {
  const logger = options.logger ?? createLogger("EventBus");
  const handlers = new Map<string, Set<EventHandler>>();
  const wildcardHandlers = new Set<EventHandler>();

  function getOrCreate(type: string): Set<EventHandler> {
    let set = handlers.get(type);
    if (!set) {
      set = new Set();
      handlers.set(type, set);
    }
    return set;
  }

  function safeCall(handler: EventHandler, event: AgentEvent): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          logger.error("Async handler error", { type: event.type, error: errorMessage(err) });
        });
      }
    } catch (err) {
      logger.error("Sync handler error", { type: event.type, error: errorMessage(err) });
    }
  }

  const bus: IEventBus = {
    on(type: string, handler: EventHandler): () => void {
      const set = getOrCreate(type);
      set.add(handler);
      return () => {
        set.delete(handler);
      };
    },

    once(type: string, handler: EventHandler): () => void {
      const wrapper: EventHandler = (event) => {
        unsub();
        return handler(event);
      };
      const unsub = bus.on(type, wrapper);
      return unsub;
    },

    onAny(handler: EventHandler): () => void {
      wildcardHandlers.add(handler);
      return () => {
        wildcardHandlers.delete(handler);
      };
    },

    emit(event: AgentEvent): void {
      const set = handlers.get(event.type);
      if (set) {
        for (const handler of [...set]) {
          safeCall(handler, event);
        }
      }

      for (const handler of [...wildcardHandlers]) {
        safeCall(handler, event);
      }
    },
  };

  return bus;
}
