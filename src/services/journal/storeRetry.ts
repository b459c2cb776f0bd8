// MARK: - Store Retry
// Backoff for transient store outages

import { StoreUnavailableError } from '../../errors';
import { RetryExhaustedError, withRetry } from '../../utils/retry';

export interface StoreRetryOptions {
  attempts: number;
  baseDelayMs: number;
}

export const DEFAULT_STORE_RETRY: StoreRetryOptions = {
  attempts: 3,
  baseDelayMs: 500,
};

/**
 * Retries only StoreUnavailableError; the final failure is rethrown as-is
 */
export async function retryStoreCall<T>(
  label: string,
  task: () => Promise<T>,
  options: StoreRetryOptions = DEFAULT_STORE_RETRY,
): Promise<T> {
  try {
    return await withRetry(task, {
      attempts: options.attempts,
      baseDelayMs: options.baseDelayMs,
      retryIf: error => error instanceof StoreUnavailableError,
      label,
    });
  } catch (error) {
    if (error instanceof RetryExhaustedError) {
      throw error.lastError;
    }
    throw error;
  }
}
