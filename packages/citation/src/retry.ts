/**
 * @zoneledger/citation — Retrying a fetch from a remote Zone.
 *
 * One citation check may try a remote Zone several times. Every attempt
 * and every pause between attempts belongs to that check: once the check's
 * AbortSignal fires (its timeout, or the caller giving up), the pause ends
 * and no further attempt starts.
 *
 * Pause before retry n (n = 1, 2, ...):
 *   min(initialDelayMs * 2^(n-1) + random(0, jitterMs), maxDelayMs)
 */

export interface RetryPolicy {
  /** Attempts per fetch, the first one included */
  readonly attempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  initialDelayMs: 250,
  maxDelayMs: 2000,
  jitterMs: 50,
};

/** Waits `ms`, or less if the signal fires first. Never rejects. */
export type Pause = (ms: number, signal?: AbortSignal) => Promise<void>;

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Every attempt failed with a transient error.
 */
export class AttemptsExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`${attempts} attempts failed; last error: ${describeError(lastError)}`);
    this.name = "AttemptsExhaustedError";
  }
}

/**
 * The check was cancelled before the fetch could succeed.
 */
export class FetchCancelledError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    const tried = attempts === 1 ? "1 attempt" : `${attempts} attempts`;
    super(
      lastError === undefined
        ? `cancelled after ${tried}`
        : `cancelled after ${tried}; last error: ${describeError(lastError)}`,
    );
    this.name = "FetchCancelledError";
  }
}

export function retryDelay(
  retry: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.initialDelayMs * 2 ** (retry - 1);
  return Math.min(exponential + random() * policy.jitterMs, policy.maxDelayMs);
}

export const pause: Pause = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted === true) {
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

export interface RetryOptions {
  readonly policy: RetryPolicy;
  /** Errors worth another attempt; any other error is rethrown at once */
  readonly isTransient: (err: unknown) => boolean;
  readonly signal?: AbortSignal | undefined;
  readonly pause?: Pause | undefined;
}

/**
 * Run `attempt` until it succeeds, fails permanently, runs out of
 * attempts or the signal fires.
 *
 * @throws AttemptsExhaustedError after the last transient failure
 * @throws FetchCancelledError once the signal has fired
 * @throws the attempt's own error when it is not transient
 */
export async function retryTransient<T>(
  attempt: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, isTransient, signal } = options;
  const wait = options.pause ?? pause;
  let lastError: unknown;

  for (let made = 0; made < policy.attempts; made++) {
    if (signal?.aborted === true) {
      throw new FetchCancelledError(made, lastError);
    }
    if (made > 0) {
      await wait(retryDelay(made, policy), signal);
      if (signal?.aborted) {
        throw new FetchCancelledError(made, lastError);
      }
    }

    try {
      return await attempt();
    } catch (err) {
      if (!isTransient(err)) {
        throw err;
      }
      lastError = err;
    }
  }

  if (signal?.aborted === true) {
    throw new FetchCancelledError(policy.attempts, lastError);
  }
  throw new AttemptsExhaustedError(policy.attempts, lastError);
}
