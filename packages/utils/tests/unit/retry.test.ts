import { describe, expect, test, vi } from 'vitest';

import { backoffDelay, retry } from '../../src/retry.js';

describe('retry', () => {
  test('passes the attempt number and returns the first success', async () => {
    const seen: number[] = [];
    const value = await retry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return 'done';
      },
      { maxAttempts: 3, initialDelay: 1, maxDelay: 1 }
    );

    expect(value).toBe('done');
    expect(seen).toEqual([1, 2, 3]);
  });

  test('stops immediately when retryIf declines', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(
      retry(fn, { maxAttempts: 5, initialDelay: 1, retryIf: () => false })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('reports each retry and rethrows after the last attempt', async () => {
    const onRetry = vi.fn();

    await expect(
      retry(
        async () => {
          throw new Error('always');
        },
        { maxAttempts: 2, initialDelay: 1, onRetry }
      )
    ).rejects.toThrow('always');
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 1);
  });
});

describe('backoffDelay', () => {
  test('doubles from the initial delay up to the cap', () => {
    const policy = { initialDelay: 1000, maxDelay: 5000, backoffMultiplier: 2 };

    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, policy))).toEqual([1000, 2000, 4000, 5000]);
  });
});

describe('retry with a signal', () => {
  test('ends the backoff wait when the signal aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      throw new Error('engine failed');
    });
    setTimeout(() => controller.abort(), 50);
    const started = Date.now();

    await expect(
      retry(fn, { maxAttempts: 3, initialDelay: 10_000, signal: controller.signal })
    ).rejects.toThrow('engine failed');
    expect(Date.now() - started).toBeLessThan(5000);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('does not retry once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => {
      throw new Error('engine failed');
    });

    await expect(retry(fn, { maxAttempts: 3, initialDelay: 1, signal: controller.signal })).rejects.toThrow(
      'engine failed'
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
