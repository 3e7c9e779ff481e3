import { setTimeout as sleep } from 'timers/promises';

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
  /** Return false to give up on this error at once. */
  shouldRetry?: (error: unknown) => boolean;
  /** A wait the server asked for; replaces the backoff delay for that attempt, capped at maxDelayMs. */
  retryAfterMs?: (error: unknown) => number | undefined;
}

export async function retry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const backoff = options.backoffFactor ?? 2;
  const maxDelay = options.maxDelayMs ?? 5_000;
  let delay = Math.max(0, options.delayMs ?? 250);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || options.shouldRetry?.(error) === false) {
        throw error;
      }
      const requested = options.retryAfterMs?.(error);
      const wait = requested === undefined ? delay : Math.min(maxDelay, Math.max(0, requested));
      options.onRetry?.(error, attempt, wait);
      if (wait > 0) await sleep(wait);
      delay = Math.min(maxDelay, Math.ceil(delay * backoff));
    }
  }
}
