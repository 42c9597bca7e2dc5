import { getLogger } from '../core/logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Substrings of an error message or name that make it worth another attempt */
  retryableErrors?: string[];
  onRetry?: (attempt: number, error: Error) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
};

/**
 * Retry a function with exponential backoff and jitter
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = getLogger();

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (attempt >= opts.maxRetries) throw error;

      if (opts.retryableErrors && opts.retryableErrors.length > 0) {
        const isRetryable = opts.retryableErrors.some(
          e => error.message.includes(e) || error.name.includes(e),
        );
        if (!isRetryable) throw error;
      }

      const delay = Math.min(
        opts.baseDelay * Math.pow(opts.backoffFactor, attempt) + Math.random() * opts.baseDelay,
        opts.maxDelay,
      );

      logger.debug({ attempt: attempt + 1, delay, error: error.message }, 'Retrying after error');
      opts.onRetry?.(attempt + 1, error);

      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class TimeoutError extends Error {
  constructor(message: string, public readonly ms: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Reject with a TimeoutError when the promise does not settle in time.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message?: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(message || `Operation timed out after ${ms}ms`, ms));
    }, ms);

    promise
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
