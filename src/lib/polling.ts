/**
 * Bounded readiness polling
 *
 * The only place the orchestrator waits in a loop: a fixed interval, an
 * overall deadline, and a cancellation check before every attempt.
 */

import { sleep, type CancellationToken } from './cancellation.js';
import { InterruptError, TimeoutError, err, ok, type Result } from './errors.js';

export interface PollOptions {
  /** What is being waited for, used in the timeout message */
  description: string;
  intervalMs: number;
  timeoutMs: number;
  token?: CancellationToken;
  /** Shown in the timeout error so the user can check by hand */
  hint?: string;
  onAttempt?: (attempt: number, elapsedMs: number) => void;
  now?: () => number;
  wait?: (ms: number, token?: CancellationToken) => Promise<void>;
}

/**
 * Call `check` until it returns a value other than `undefined`, the deadline
 * passes, or the token is cancelled.
 *
 * @example
 * ```typescript
 * const address = await pollUntil(() => fetchLoadBalancerAddress(), {
 *   description: 'load balancer address',
 *   intervalMs: 10_000,
 *   timeoutMs: 600_000,
 *   token,
 * });
 * ```
 */
export async function pollUntil<T>(
  check: () => Promise<T | undefined>,
  options: PollOptions
): Promise<Result<T, TimeoutError | InterruptError>> {
  const now = options.now ?? Date.now;
  const wait = options.wait ?? sleep;
  const startedAt = now();
  let attempt = 0;

  while (true) {
    if (options.token?.isCancelled) {
      return err(new InterruptError(options.token.reason ?? undefined));
    }

    attempt++;
    const value = await check();
    if (value !== undefined) {
      return ok(value);
    }

    const elapsed = now() - startedAt;
    options.onAttempt?.(attempt, elapsed);

    if (elapsed + options.intervalMs > options.timeoutMs) {
      return err(
        new TimeoutError(
          `Timed out after ${Math.round(options.timeoutMs / 1000)}s waiting for ${options.description}`,
          options.timeoutMs,
          options.hint
        )
      );
    }

    await wait(options.intervalMs, options.token);
  }
}
