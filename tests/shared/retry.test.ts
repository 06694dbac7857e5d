import { describe, it, expect, vi, afterEach } from 'vitest';
import { retry } from '../../src/shared/retry.js';

class Transient extends Error {}

describe('retry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(retry(fn, { retries: 3, minDelayMs: 1, maxDelayMs: 1, shouldRetry: () => true })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries while shouldRetry accepts the error', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Transient('first'))
      .mockRejectedValueOnce(new Transient('second'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    const result = await retry(fn, {
      retries: 4,
      minDelayMs: 1,
      maxDelayMs: 1,
      shouldRetry: (err) => err instanceof Transient,
      onRetry,
      randomFn: () => 0,
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([ctx]) => ctx.attempt)).toEqual([1, 2]);
  });

  it('does not retry errors shouldRetry rejects', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));
    const onGiveUp = vi.fn();

    await expect(retry(fn, {
      retries: 4,
      minDelayMs: 1,
      maxDelayMs: 1,
      shouldRetry: (err) => err instanceof Transient,
      onGiveUp,
    })).rejects.toThrow('fatal');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(onGiveUp).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, maxAttempts: 5 }));
  });

  it('rethrows the last error once retries run out', async () => {
    const fn = vi.fn().mockRejectedValue(new Transient('still down'));

    await expect(retry(fn, { retries: 2, minDelayMs: 1, maxDelayMs: 1, shouldRetry: () => true }))
      .rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('backs off exponentially up to the cap, plus jitter', async () => {
    vi.useFakeTimers();
    const fn = vi.fn().mockRejectedValue(new Transient('down'));
    const delays: number[] = [];

    const run = retry(fn, {
      retries: 4,
      minDelayMs: 100,
      maxDelayMs: 500,
      shouldRetry: () => true,
      onRetry: ({ delayMs }) => delays.push(delayMs),
      randomFn: () => 0.5,
      jitterRatio: 0.2,
    });
    const settled = expect(run).rejects.toThrow('down');

    await vi.runAllTimersAsync();
    await settled;

    // backoff 100, 200, 400, 500 (capped); jitter adds 10%
    expect(delays).toEqual([110, 220, 440, 550]);
  });
});
