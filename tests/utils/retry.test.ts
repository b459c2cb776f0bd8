import { afterEach, describe, expect, it, vi } from 'vitest';
import { RetryExhaustedError, backoffDelay, withRetry, withTimeout } from '../../src/utils/retry';
import { retryStoreCall } from '../../src/services/journal/storeRetry';
import { StoreUnavailableError } from '../../src/errors';

describe('retry utilities', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('doubles the delay per attempt up to ten seconds', () => {
    expect(backoffDelay(1, 500)).toBe(500);
    expect(backoffDelay(2, 500)).toBe(1000);
    expect(backoffDelay(3, 500)).toBe(2000);
    expect(backoffDelay(10, 500)).toBe(10000);
  });

  it('returns the first successful result', async () => {
    const task = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    await expect(withRetry(task, { attempts: 3, baseDelayMs: 0 })).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('gives up with the last failure attached', async () => {
    const last = new Error('still down');
    const task = vi.fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(last);

    const error = await withRetry(task, { attempts: 2, baseDelayMs: 0 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 2, lastError: last });
  });

  it('rethrows errors the predicate rejects without retrying', async () => {
    const fatal = new Error('bad request');
    const task = vi.fn<() => Promise<void>>().mockRejectedValue(fatal);

    await expect(withRetry(task, { attempts: 5, baseDelayMs: 0, retryIf: () => false })).rejects.toBe(fatal);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('times out a hung attempt', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(() => new Promise<never>(() => undefined), 50);
    const assertion = expect(pending).rejects.toThrow('Timed out after 50ms');

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('retries store outages and surfaces the final outage unchanged', async () => {
    const task = vi.fn<() => Promise<void>>().mockRejectedValue(new StoreUnavailableError('getUser'));

    await expect(retryStoreCall('getUser', task, { attempts: 2, baseDelayMs: 0 })).rejects.toBeInstanceOf(
      StoreUnavailableError,
    );
    expect(task).toHaveBeenCalledTimes(2);
  });
});
