/**
 * Cancellation Token with AbortController
 *
 * Joint shutdown of a session is driven through one token: the first loop
 * (or timer) that sees a terminal condition cancels it, and every blocking
 * read, receive or write in the session is waiting on its signal.
 */

/**
 * Cancellation token carrying the reason it was cancelled with.
 */
export class CancellationToken<R = string> {
  private readonly abortController = new AbortController();
  private cancelReason?: R;

  /**
   * Get the AbortSignal for abort-aware APIs.
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /**
   * Reason passed to the first successful cancel() call.
   */
  get reason(): R | undefined {
    return this.cancelReason;
  }

  /**
   * Cancel all operations using this token.
   *
   * @returns true for the call that actually cancelled, false afterwards
   */
  cancel(reason: R): boolean {
    if (this.isCancelled()) {
      return false;
    }
    this.cancelReason = reason;
    this.abortController.abort();
    return true;
  }

  isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }
}

/**
 * Error thrown when an operation is cancelled.
 */
export class CancellationError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancellationError";
  }

  static isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === "AbortError";
  }

  static isCancellation(err: unknown): boolean {
    return err instanceof CancellationError || CancellationError.isAbortError(err);
  }
}

/**
 * Run `onAbort` once when `signal` aborts. Returns a disposer that detaches
 * the listener; call it once the guarded operation settles.
 */
export function onAbort(signal: AbortSignal | undefined, onAbortFn: () => void): () => void {
  if (!signal) {
    return () => {};
  }
  if (signal.aborted) {
    onAbortFn();
    return () => {};
  }
  signal.addEventListener("abort", onAbortFn, { once: true });
  return () => signal.removeEventListener("abort", onAbortFn);
}
