import { describe, it, expect, vi } from 'vitest';
import {
  NonRetryableError,
  ProviderError,
  isTransientError,
  isTransientStatus,
  sleep,
  withRetry,
} from '../utils/retry.js';

describe('isTransientStatus', () => {
  it('treats timeouts, rate limits and server errors as transient', () => {
    expect(isTransientStatus(408)).toBe(true);
    expect(isTransientStatus(429)).toBe(true);
    expect(isTransientStatus(503)).toBe(true);
    expect(isTransientStatus(400)).toBe(false);
    expect(isTransientStatus(404)).toBe(false);
  });
});

describe('isTransientError', () => {
  it('classifies by error type', () => {
    expect(isTransientError(new ProviderError('busy', true, 503))).toBe(true);
    expect(isTransientError(new ProviderError('bad prompt', false, 422))).toBe(false);
    expect(isTransientError(new NonRetryableError('no key'))).toBe(false);
    expect(isTransientError(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientError(new Error('boom'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('retries transient failures until one succeeds', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new ProviderError('rate limited', true, 429))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 0, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const last = new ProviderError('still down', true, 503);
    const fn = vi.fn()
      .mockRejectedValueOnce(new ProviderError('down', true, 503))
      .mockRejectedValueOnce(new ProviderError('down', true, 503))
      .mockRejectedValueOnce(last);

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 })).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry permanent failures', async () => {
    const err = new ProviderError('bad request', false, 400);
    const fn = vi.fn().mockRejectedValue(err);

    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 0 })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('honours a custom retry predicate', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue(7);
    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 0, isRetryable: () => true })).resolves.toBe(7);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('stopped');
    controller.abort(reason);
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { maxAttempts: 3, signal: controller.signal })).rejects.toBe(reason);
    expect(fn).not.toHaveBeenCalled();
  });

  it('stops waiting between attempts when aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('stopped');
    const fn = vi.fn().mockImplementation(async () => {
      setTimeout(() => controller.abort(reason), 5);
      throw new ProviderError('down', true, 503);
    });

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 60_000, signal: controller.signal }))
      .rejects.toBe(reason);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('rejects immediately on an aborted signal', async () => {
    const controller = new AbortController();
    const reason = new Error('stopped');
    controller.abort(reason);
    await expect(sleep(10_000, controller.signal)).rejects.toBe(reason);
  });

  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});
