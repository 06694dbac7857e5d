import { describe, it, expect } from 'vitest';
import { createLimiter } from '../../src/shared/limiter.js';

function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createLimiter', () => {
  it('rejects an invalid concurrency', () => {
    expect(() => createLimiter(0)).toThrow('concurrency must be an integer >= 1');
    expect(() => createLimiter(1.5)).toThrow('concurrency must be an integer >= 1');
  });

  it('never runs more than the limit at once', async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const work = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 2));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 6 }, () => limit(work)));

    expect(peak).toBe(2);
  });

  it('starts queued tasks in submission order', async () => {
    const limit = createLimiter(1);
    const gate = deferred();
    const started: number[] = [];

    const first = limit(async () => {
      started.push(1);
      await gate.promise;
    });
    const rest = [2, 3, 4].map((n) => limit(async () => {
      started.push(n);
    }));

    await Promise.resolve();
    expect(started).toEqual([1]);

    gate.resolve();
    await Promise.all([first, ...rest]);
    expect(started).toEqual([1, 2, 3, 4]);
  });

  it('passes results and rejections through and keeps going', async () => {
    const limit = createLimiter(1);

    await expect(limit(async () => {
      throw new Error('nope');
    })).rejects.toThrow('nope');
    await expect(limit(async () => 7)).resolves.toBe(7);
  });
});
