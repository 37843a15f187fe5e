/**
 * Retry Logic
 * 
 * Configurable retry wrapper with exponential backoff.
 */

import { sleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  
  let delay = opts.initialDelay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      
      if (attempt >= opts.maxAttempts) {
        throw error;
      }
      
      opts.onRetry?.(error, attempt);
      
      await sleep(delay);
      
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
    }
  }
}
