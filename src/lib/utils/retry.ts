/**
 * Retry utility with exponential backoff
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  maxAttempts: number;
  baseDelay: number;
  onRetry?: (attempt: number, delay: number, error: unknown) => void;
  sleep?: Sleep;
}

/**
 * Run `fn` until it resolves or `maxAttempts` calls have failed; rethrows the last error
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown = new Error('Max retries exceeded');

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt < options.maxAttempts) {
        const delay = options.baseDelay * Math.pow(2, attempt - 1);
        options.onRetry?.(attempt, delay, error);
        await wait(delay);
      }
    }
  }

  throw lastError;
}
