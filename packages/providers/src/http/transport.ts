/**
 * HTTP transport shared by the protocol adapters: JSON POST with
 * cancellation, close() and a per-adapter retry policy.
 *
 * Node's global fetch pools connections per origin, so one transport per
 * client instance reuses sockets across calls.
 */

import {
  ApiError,
  CancelledError,
  ErrorCode,
  ProviderError,
  RateLimitError,
  TransportError,
  errorMessage,
  type CancellationToken,
} from "@ferryman/sdk";
import type { Logger } from "@ferryman/shared";

export interface HttpRequestInit {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<Response>;

/** Resolves after `ms`, or early once `signal` aborts. */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryListener = (attempt: number, delayMs: number, reason: string) => void;

/** Injectable collaborators every adapter accepts. */
export interface ClientDeps {
  fetch?: FetchLike;
  sleep?: SleepFn;
  onRetry?: RetryListener;
  logger?: Logger;
}

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  /** Use the retry-after header of a 429 when present. */
  honorRetryAfter: boolean;
  retryOnServerError: boolean;
}

export interface HttpTransport {
  readonly closed: boolean;
  post(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    cancellation?: CancellationToken,
  ): Promise<Response>;
  close(): void;
}

export interface HttpTransportOptions extends ClientDeps {
  provider: string;
  policy: RetryPolicy;
  logger: Logger;
}

export const defaultSleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

/** Delay before retrying a failed HTTP status: base × 2^attempt. */
export function statusBackoff(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt;
}

/** Delay before retrying a connection failure: base × 2^(attempt-1). */
export function transportBackoff(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/** Parse a retry-after header (delta-seconds or HTTP date) into ms. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === "") return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function createHttpTransport(options: HttpTransportOptions): HttpTransport {
  const { provider, policy, logger } = options;
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const sleep = options.sleep ?? defaultSleep;
  const lifetime = new AbortController();

  function closedError(): TransportError {
    return new TransportError(provider, "client is closed", { code: ErrorCode.TRANSPORT_CLOSED });
  }

  function ensureUsable(cancellation?: CancellationToken): void {
    if (cancellation?.isCancelled) throw new CancelledError();
    if (lifetime.signal.aborted) throw closedError();
  }

  async function waitBeforeRetry(
    attempt: number,
    delayMs: number,
    reason: string,
    signal: AbortSignal,
  ): Promise<void> {
    logger.warn(`${reason}; retrying in ${delayMs}ms`, {
      provider,
      attempt,
      maxAttempts: policy.maxAttempts,
    });
    options.onRetry?.(attempt, delayMs, reason);
    await sleep(delayMs, signal);
  }

  return {
    get closed(): boolean {
      return lifetime.signal.aborted;
    },

    async post(url, headers, body, cancellation) {
      ensureUsable(cancellation);
      // The composed signal outlives this call while the caller reads the body.
      const signal = cancellation ? AbortSignal.any([cancellation.signal, lifetime.signal]) : lifetime.signal;
      const payload = JSON.stringify(body);

      for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        ensureUsable(cancellation);
        const isLastAttempt = attempt === policy.maxAttempts;
        const stop = logger.time(`${provider} request`);

        let response: Response;
        try {
          response = await fetchImpl(url, { method: "POST", headers, body: payload, signal });
        } catch (err) {
          stop();
          ensureUsable(cancellation);
          if (isLastAttempt) {
            throw new TransportError(
              provider,
              `request failed after ${policy.maxAttempts} attempts: ${errorMessage(err)}`,
              { cause: err },
            );
          }
          await waitBeforeRetry(
            attempt,
            transportBackoff(attempt, policy.baseDelayMs),
            `connection error: ${errorMessage(err)}`,
            signal,
          );
          continue;
        }
        stop();

        if (response.ok) return response;

        const text = await response.text();

        if (response.status === 429) {
          const retryAfterMs = policy.honorRetryAfter
            ? parseRetryAfter(response.headers.get("retry-after"))
            : undefined;
          if (isLastAttempt) {
            throw new RateLimitError(provider, text, retryAfterMs);
          }
          await waitBeforeRetry(
            attempt,
            retryAfterMs ?? statusBackoff(attempt, policy.baseDelayMs),
            "rate limited (429)",
            signal,
          );
          continue;
        }

        if (response.status >= 500 && policy.retryOnServerError && !isLastAttempt) {
          await waitBeforeRetry(
            attempt,
            statusBackoff(attempt, policy.baseDelayMs),
            `server error (${response.status})`,
            signal,
          );
          continue;
        }

        logger.error("Request failed", { provider, status: response.status });
        throw new ApiError(provider, response.status, text);
      }

      // maxAttempts < 1 is rejected by config validation
      throw new TransportError(provider, "no request attempts were made");
    },

    close(): void {
      if (!lifetime.signal.aborted) {
        logger.debug("Closing transport", { provider });
        lifetime.abort(closedError());
      }
    },
  };
}

/** Read a JSON response body, reporting garbage as a provider error. */
export async function readJson(response: Response, provider: string): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ProviderError(provider, `response is not valid JSON: ${errorMessage(err)}`, response.status, {
      cause: err,
    });
  }
}
