/**
 * RunState - observable progress of the current agent run.
 *
 * Every transition is published on the event bus as `state:changed`, so a
 * UI can follow several agents from one bus. `subscribe` filters the bus
 * down to this tracker.
 */

import { AgentEventType, type EventBus } from "@ferryman/sdk";
import { createLogger, generateId, isPlainObject, type Logger } from "@ferryman/shared";
import { createEventBus } from "../bus/index.js";

export interface RunStateSnapshot {
  isRunning: boolean;
  currentStep: string;
  errorMessage?: string;
}

export type RunStateListener = (snapshot: RunStateSnapshot) => void;

export interface RunState {
  readonly id: string;
  getSnapshot(): RunStateSnapshot;
  startRun(): void;
  updateStep(step: string): void;
  completeRun(): void;
  failRun(error: string): void;
  reset(): void;
  subscribe(listener: RunStateListener): () => void;
}

export const RunStep = {
  INITIALIZING: "Initializing agent run...",
  COMPLETED: "Run completed",
  FAILED: "Run failed",
} as const;

export interface RunStateOptions {
  bus?: EventBus;
  logger?: Logger;
}

export function createRunState(options: RunStateOptions = {}): RunState {
  const bus = options.bus ?? createEventBus();
  const logger = options.logger ?? createLogger("RunState");
  const id = generateId("state");
  let snapshot: RunStateSnapshot = { isRunning: false, currentStep: "" };

  function publish(next: RunStateSnapshot): void {
    snapshot = next;
    bus.emit({ type: AgentEventType.STATE_CHANGED, timestamp: Date.now(), payload: { stateId: id, ...next } });
  }

  return {
    id,

    getSnapshot(): RunStateSnapshot {
      return { ...snapshot };
    },

    startRun(): void {
      logger.info("Agent run started");
      publish({ isRunning: true, currentStep: RunStep.INITIALIZING });
    },

    updateStep(step: string): void {
      logger.debug(`State step updated: ${step}`);
      publish({ ...snapshot, currentStep: step });
    },

    completeRun(): void {
      logger.info("Agent run completed");
      publish({ isRunning: false, currentStep: RunStep.COMPLETED });
    },

    failRun(error: string): void {
      logger.error(`Agent run failed: ${error}`);
      publish({ isRunning: false, currentStep: RunStep.FAILED, errorMessage: error });
    },

    reset(): void {
      publish({ isRunning: false, currentStep: "" });
    },

    subscribe(listener: RunStateListener): () => void {
      return bus.on(AgentEventType.STATE_CHANGED, (event) => {
        if (isPlainObject(event.payload) && event.payload.stateId === id) {
          listener({ ...snapshot });
        }
      });
    },
  };
}
