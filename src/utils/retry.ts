/**
 * Bounded retry with exponential backoff, plus a Promise.race timeout.
 *
 * Shared by the generation adapter and the evaluation worker pool.
 */

export interface RetryOptions {
  /** Retries after the first attempt (0 = try once) */
  maxRetries: number;
  /** Delay before the first retry; doubles on each subsequent retry */
  baseDelayMs: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each retry with the 1-based attempt that just failed */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Run `fn` until it resolves or the retry budget is spent. The last error is
 * rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;
  const totalAttempts = options.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (error) {
      const retryable = options.shouldRetry?.(error, attempt) ?? true;
      if (!retryable || attempt >= totalAttempts) {
        throw error;
      }
      const delayMs = options.baseDelayMs * 2 ** (attempt - 1);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}

/**
 * Reject with the error from `onTimeout` if `promise` has not settled in time.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
