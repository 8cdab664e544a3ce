/**
 * CancellationToken - a one-way flag shared between a caller and every
 * awaited operation of one turn. Backed by an AbortController so that
 * in-flight HTTP requests are aborted as well.
 */

import { CancelledError } from "./errors/base.js";

export class CancellationToken {
  private readonly controller = new AbortController();

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Aborted once `cancel()` is called. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Idempotent. */
  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancelledError());
    }
  }

  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancelledError();
    }
  }

  /** Run `listener` on cancellation (immediately if already cancelled). Returns an unsubscribe function. */
  onCancel(listener: () => void): () => void {
    if (this.isCancelled) {
      listener();
      return () => {};
    }
    const signal = this.controller.signal;
    signal.addEventListener("abort", listener, { once: true });
    return () => signal.removeEventListener("abort", listener);
  }
}
