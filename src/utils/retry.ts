/**
 * Retry an async operation with exponential backoff.
 * Rate-limit failures (429 / "rate limit") back off at 3^attempt with a
 * 5s floor, anything else at 2^attempt.
 */

export interface RetryOptions {
  maxRetries: number;
  retryDelayMs: number;
  /** Called before each wait */
  onRetry?: (attempt: number, delayMs: number, error: Error) => void;
}

export function isRateLimitError(error: Error): boolean {
  return /\b429\b|rate.?limit/i.test(error.message);
}

export function retryDelay(attempt: number, baseDelayMs: number, error: Error): number {
  if (isRateLimitError(error)) {
    return Math.max(5000, baseDelayMs * Math.pow(3, attempt));
  }
  return baseDelayMs * Math.pow(2, attempt);
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < options.maxRetries) {
        const delay = retryDelay(attempt, options.retryDelayMs, lastError);
        options.onRetry?.(attempt + 1, delay, lastError);
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error('withRetry failed');
}
