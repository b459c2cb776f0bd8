// MARK: - Retry Utility
// Exponential backoff with a per-attempt timeout

import { logger } from './logger';

const MAX_DELAY_MS = 10_000;

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  timeoutMs?: number;
  /** Return false to rethrow immediately */
  retryIf?: (error: unknown) => boolean;
  label?: string;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), MAX_DELAY_MS);
}

export async function withTimeout<T>(task: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

/**
 * Runs task until it succeeds or the attempt budget is spent.
 * Errors rejected by retryIf propagate unchanged; an exhausted budget
 * surfaces as RetryExhaustedError carrying the last failure.
 */
export async function withRetry<T>(task: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return options.timeoutMs ? await withTimeout(task, options.timeoutMs) : await task();
    } catch (error) {
      if (options.retryIf && !options.retryIf(error)) {
        throw error;
      }

      lastError = error;

      if (attempt >= attempts) {
        break;
      }

      const delay = backoffDelay(attempt, options.baseDelayMs);
      logger.warn('Retrying after failure', {
        label: options.label,
        attempt,
        attempts,
        delay,
        error: error instanceof Error ? error.message : String(error),
      });

      if (delay > 0) {
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  throw new RetryExhaustedError(attempts, lastError);
}
