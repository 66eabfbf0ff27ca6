import { describe, it, expect, vi } from 'vitest';
import { createConcurrencyLimiter, withTimeout } from '../lib/concurrency.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createConcurrencyLimiter', () => {
  it('queues work beyond the limit and hands slots over in order', async () => {
    const limiter = createConcurrencyLimiter(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, i) =>
      limiter.run(async () => {
        started.push(i);
        await gate.promise;
        return i;
      }),
    );

    expect(limiter.active).toBe(2);
    expect(limiter.pending).toBe(1);

    gates[0].resolve();
    await runs[0];
    expect(limiter.pending).toBe(0);
    expect(limiter.active).toBe(2);

    gates[1].resolve();
    gates[2].resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
    expect(started).toEqual([0, 1, 2]);
    expect(limiter.active).toBe(0);
  });

  it('never exceeds the limit under load', async () => {
    const limiter = createConcurrencyLimiter(3);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 12 }, () =>
        limiter.run(async () => {
          running += 1;
          peak = Math.max(peak, running);
          await new Promise((resolve) => setTimeout(resolve, 2));
          running -= 1;
        }),
      ),
    );

    expect(peak).toBe(3);
  });

  it('releases the slot when a task throws', async () => {
    const limiter = createConcurrencyLimiter(1);
    await expect(limiter.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(limiter.active).toBe(0);
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  it('rejects a non-positive limit', () => {
    expect(() => createConcurrencyLimiter(0)).toThrow(RangeError);
  });
});

describe('withTimeout', () => {
  it('returns the task result when it finishes in time', async () => {
    await expect(withTimeout(Promise.resolve('fast'), 1_000, () => new Error('late'))).resolves.toBe('fast');
  });

  it('rejects with the supplied error and runs the timeout hook', async () => {
    const onTimeout = vi.fn();
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 10, () => new Error('late'), onTimeout)).rejects.toThrow('late');
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });
});
