/**
 * Bounded Retry
 *
 * Runs an operation up to `maxAttempts` times with an explicit backoff policy
 * between attempts. Every error is retried; there is no error classification,
 * and the budget is shared across error types.
 *
 * DESIGN:
 * - Backoff is a parameter, not a hidden default
 * - Fixed interval (0ms) reproduces a plain retry loop
 * - Exponential backoff with jitter is available for rate-limited sources
 */

/**
 * Delay in milliseconds before attempt `attempt + 1`, given `attempt` failed
 */
export type BackoffPolicy = (attempt: number) => number;

export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly error: Error;
  readonly delayMs: number;
}

export interface RetryOptions {
  readonly maxAttempts: number;
  readonly backoff?: BackoffPolicy;

  /** Called after every failed attempt, before any delay */
  readonly onAttemptFailed?: (attempt: RetryAttempt) => void;

  /** Injected for tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Retry exhausted error (thrown after max attempts)
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Same delay after every failure
 */
export function fixedBackoff(delayMs = 0): BackoffPolicy {
  return () => delayMs;
}

/**
 * delay = initial * multiplier^(attempt-1), capped, with ±jitter
 */
export function exponentialBackoff(options: {
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier?: number;
  readonly jitterFactor?: number;
}): BackoffPolicy {
  const multiplier = options.multiplier ?? 2;
  const jitterFactor = options.jitterFactor ?? 0;

  return (attempt) => {
    const exponential = options.initialDelayMs * Math.pow(multiplier, attempt - 1);
    const capped = Math.min(exponential, options.maxDelayMs);
    const jitterRange = capped * jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;
    return Math.max(0, Math.floor(capped + jitter));
  };
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` with bounded retry
 *
 * @throws RetryExhaustedError carrying every attempt and the last error
 *
 * @example
 * ```typescript
 * const body = await withRetry(() => transport.download(url, path), {
 *   maxAttempts: 5,
 *   backoff: fixedBackoff(),
 * });
 * ```
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const backoff = options.backoff ?? fixedBackoff();
  const sleep = options.sleep ?? defaultSleep;
  const attempts: RetryAttempt[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));
      const delayMs = attempt < maxAttempts ? backoff(attempt) : 0;
      const record: RetryAttempt = { attemptNumber: attempt, error: lastError, delayMs };
      attempts.push(record);
      options.onAttemptFailed?.(record);

      if (attempt === maxAttempts) {
        throw new RetryExhaustedError(attempts, lastError);
      }
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }

  // Unreachable: the loop either returns or throws on the last attempt
  throw new Error('withRetry: no attempts made');
}
