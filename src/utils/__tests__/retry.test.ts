import { describe, it, expect, vi } from 'vitest';
import { withRetry, withTimeout } from '../retry.js';

const noSleep = () => Promise.resolve();

describe('withRetry', () => {
  it('returns the first success with its attempt count', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 10, sleep: noSleep })).resolves.toEqual({
      value: 'ok',
      attempts: 1,
    });
  });

  it('retries with doubling delays until success', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('ok');
    const delays: number[] = [];

    const result = await withRetry(fn, {
      maxRetries: 2,
      baseDelayMs: 100,
      sleep: noSleep,
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
    });

    expect(result).toEqual({ value: 'ok', attempts: 3 });
    expect(delays).toEqual([100, 200]);
  });

  it('rethrows the last error when the budget is spent', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(withRetry(fn, { maxRetries: 1, baseDelayMs: 1, sleep: noSleep })).rejects.toThrow(
      'down'
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops immediately when shouldRetry says no', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('permanent'));

    await expect(
      withRetry(fn, { maxRetries: 5, baseDelayMs: 1, sleep: noSleep, shouldRetry: () => false })
    ).rejects.toThrow('permanent');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('resolves when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve(5), 1000, () => new Error('late'))).resolves.toBe(5);
  });

  it('rejects with the timeout error', async () => {
    const never = new Promise<number>(() => {});

    await expect(withTimeout(never, 5, () => new Error('late'))).rejects.toThrow('late');
  });
});
