import { describe, it, expect, vi } from 'vitest';
import { RetryExhaustedError, sleep, withRetry } from '../../src/lib/retry.js';

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
      return 'ok';
    });
    const onRetry = vi.fn();

    const result = await withRetry(fn, { maxAttempts: 3, baseDelayMs: 1, onRetry });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it('rethrows errors it should not retry', async () => {
    const failure = new Error('fatal');
    const fn = vi.fn(async () => {
      throw failure;
    });

    await expect(withRetry(fn, { baseDelayMs: 1, shouldRetry: () => false })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const failure = new Error('still down');
    const fn = vi.fn(async () => {
      throw failure;
    });

    const error = await withRetry(fn, { maxAttempts: 2, baseDelayMs: 1 }).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.attempts).toBe(2);
    expect(error.lastError).toBe(failure);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('stop');
    controller.abort(reason);
    const fn = vi.fn(async () => 'never');

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBe(reason);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('rejects with the abort reason when aborted mid-wait', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    const pending = sleep(10_000, controller.signal);

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});
