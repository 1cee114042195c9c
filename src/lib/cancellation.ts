/**
 * Cancellation token shared by everything that can block a session:
 * subprocesses, readiness polls and prompts.
 *
 * The SIGINT handler only flips the token. Components check it at each
 * suspension point and return an `InterruptError` result themselves.
 */

import { InterruptError, err, ok, type Result } from './errors.js';

export class CancellationToken {
  private readonly controller = new AbortController();
  private cancelReason: string | null = null;

  /**
   * Signal handed to child processes so they are killed on cancel
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.cancelReason !== null;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  cancel(reason: string = 'Interrupted by user'): void {
    if (this.cancelReason !== null) {
      return;
    }
    this.cancelReason = reason;
    this.controller.abort(new InterruptError(reason));
  }

  /**
   * Register a listener. Returns a function that removes it.
   */
  onCancel(listener: () => void): () => void {
    if (this.isCancelled) {
      listener();
      return () => {};
    }
    const handler = () => listener();
    this.controller.signal.addEventListener('abort', handler, { once: true });
    return () => this.controller.signal.removeEventListener('abort', handler);
  }

  /**
   * Suspension-point check
   */
  check(): Result<void, InterruptError> {
    if (this.cancelReason !== null) {
      return err(new InterruptError(this.cancelReason));
    }
    return ok(undefined);
  }
}

/**
 * Sleep that wakes early when the token is cancelled
 */
export function sleep(ms: number, token?: CancellationToken): Promise<void> {
  return new Promise((resolve) => {
    if (token?.isCancelled) {
      resolve();
      return;
    }
    let dispose: () => void = () => {};
    const timer = setTimeout(() => {
      dispose();
      resolve();
    }, ms);
    if (token) {
      dispose = token.onCancel(() => {
        clearTimeout(timer);
        resolve();
      });
    }
  });
}
