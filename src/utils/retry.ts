export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function retryDelay(attempt: number, options: RetryOptions): number {
  const delay = options.baseDelayMs * Math.pow(options.factor, attempt);
  return options.maxDelayMs === undefined ? delay : Math.min(delay, options.maxDelayMs);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      const retryable = options.shouldRetry?.(error) ?? true;
      if (attempt >= options.retries || !retryable) {
        throw error;
      }

      const delay = retryDelay(attempt, options);
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
