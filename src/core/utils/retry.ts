/**
 * Reusable retry logic utility
 */

export interface RetryOptions {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, given the failure of `attempt` (1-based). */
  delayMs: (attempt: number, error: Error) => number;
  retryCondition?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempt: number,
  ) {
    super(message, { cause: originalError });
    this.name = "RetryError";
  }
}

/**
 * Executes an operation with retry logic
 * @throws RetryError if all attempts are exhausted, or the original error when
 *   `retryCondition` rejects it
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxAttempts,
    delayMs,
    retryCondition = () => true,
    onRetry,
    sleep: wait = sleep,
  } = options;
  const attempts = Math.max(1, maxAttempts);

  let lastError: Error = new Error("no attempt made");

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = toError(error);

      if (!retryCondition(lastError)) {
        throw lastError;
      }
      if (attempt === attempts) break;

      const delay = delayMs(attempt, lastError);
      onRetry?.(attempt, lastError, delay);
      await wait(delay);
    }
  }

  throw new RetryError(
    `Operation failed after ${attempts} attempts: ${lastError.message}`,
    lastError,
    attempts,
  );
}

export interface BackoffOptions {
  /** Exponent base, in seconds: attempt n waits base^n seconds. */
  base: number;
  jitterMinMs: number;
  jitterMaxMs: number;
  random?: () => number;
}

/** `base^attempt` seconds plus a uniform jitter in [jitterMinMs, jitterMaxMs]. */
export function exponentialBackoffMs(attempt: number, options: BackoffOptions): number {
  const random = options.random ?? Math.random;
  const span = Math.max(0, options.jitterMaxMs - options.jitterMinMs);
  const jitter = options.jitterMinMs + Math.floor(random() * (span + 1));
  return Math.pow(options.base, attempt) * 1000 + jitter;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  base: 2,
  jitterMinMs: 1000,
  jitterMaxMs: 3000,
};

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
