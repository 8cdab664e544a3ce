/**
 * Server-Sent Events reader over a fetch Response body.
 *
 * Checks the cancellation token before every read and before yielding
 * every event. Once cancelled, the body reader is cancelled and nothing
 * further is parsed.
 */

import { CancelledError, TransportError, errorMessage, type CancellationToken } from "@ferryman/sdk";
import type { Logger } from "@ferryman/shared";

export interface SseEvent {
  /** Value of the `event:` field, when the frame had one. */
  event?: string;
  data: string;
}

export interface ReadSseOptions {
  provider: string;
  cancellation?: CancellationToken;
  logger: Logger;
}

interface PendingEvent {
  event?: string;
  data: string[];
}

function takeEvent(pending: PendingEvent): SseEvent | undefined {
  if (pending.data.length === 0) return undefined;
  const event: SseEvent = { data: pending.data.join("\n") };
  if (pending.event !== undefined) event.event = pending.event;
  return event;
}

/** Apply one line to the pending event. Returns a completed event on a blank line. */
function applyLine(line: string, pending: PendingEvent): SseEvent | undefined {
  if (line === "") {
    const event = takeEvent(pending);
    pending.data = [];
    pending.event = undefined;
    return event;
  }
  if (line.startsWith(":")) return undefined;

  const colon = line.indexOf(":");
  const field = colon === -1 ? line : line.slice(0, colon);
  let value = colon === -1 ? "" : line.slice(colon + 1);
  if (value.startsWith(" ")) value = value.slice(1);

  if (field === "data") pending.data.push(value);
  else if (field === "event") pending.event = value;
  return undefined;
}

export async function* readSseEvents(
  response: Response,
  options: ReadSseOptions,
): AsyncGenerator<SseEvent> {
  const { provider, cancellation, logger } = options;
  if (!response.body) {
    throw new TransportError(provider, "response has no body to stream");
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  const pending: PendingEvent = { data: [] };
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      if (cancellation?.isCancelled) throw new CancelledError();

      let chunk: { done: boolean; value?: Uint8Array };
      try {
        chunk = await reader.read();
      } catch (err) {
        if (cancellation?.isCancelled) throw new CancelledError();
        throw new TransportError(provider, `stream read failed: ${errorMessage(err)}`, { cause: err });
      }

      if (chunk.done) {
        finished = true;
        buffer += decoder.decode();
      } else if (chunk.value) {
        buffer += decoder.decode(chunk.value, { stream: true });
      }

      const lines = buffer.split(/\r?\n/);
      buffer = finished ? "" : (lines.pop() ?? "");

      for (const line of lines) {
        const event = applyLine(line, pending);
        if (event) {
          if (cancellation?.isCancelled) throw new CancelledError();
          yield event;
        }
      }

      if (finished) {
        const last = takeEvent(pending);
        if (last) {
          if (cancellation?.isCancelled) throw new CancelledError();
          yield last;
        }
        return;
      }
    }
  } finally {
    if (!finished) {
      try {
        await reader.cancel();
      } catch (err) {
        logger.debug("Failed to cancel stream reader", { provider, error: errorMessage(err) });
      }
    }
  }
}

/** Parse one SSE data payload as JSON. Returns undefined for malformed frames. */
export function parseFrame(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

/** Counts frames that could not be understood and reports them once per stream. */
export interface MalformedFrameCounter {
  record(data: string): void;
  report(): void;
}

export function createMalformedFrameCounter(provider: string, logger: Logger): MalformedFrameCounter {
  let count = 0;
  let sample = "";
  return {
    record(data: string): void {
      count++;
      if (!sample) sample = data.slice(0, 200);
      logger.debug("Skipping malformed stream frame", { provider });
    },
    report(): void {
      if (count > 0) {
        logger.warn(`Skipped ${count} malformed stream frame(s)`, { provider, count, sample });
      }
    },
  };
}
