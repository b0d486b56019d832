export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total number of calls, including the first one. */
  attempts: number;
  /** Base delay; attempt `n` waits `delayMs * n` before attempt `n + 1`. */
  delayMs: number;
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown) => boolean;
}

export async function retryWithDelay<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry?.(error) ?? true;
      if (attempt >= attempts || !retryable) {
        throw error;
      }
      const delay = options.delayMs * attempt;
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
