import { describe, it, expect } from 'vitest';
import { ExecutorShutdownError } from '@cardinal/core';
import { BoundedExecutor, defaultConcurrency } from '../executor';
import { Deferred } from './helpers';

describe('BoundedExecutor', () => {
  it('defaults to four tasks per available core', () => {
    expect(new BoundedExecutor().concurrency).toBe(defaultConcurrency());
  });

  it('rejects a non-positive bound', () => {
    expect(() => new BoundedExecutor({ maxConcurrency: 0 })).toThrow(RangeError);
  });

  it('never runs more tasks than the bound', async () => {
    const executor = new BoundedExecutor({ maxConcurrency: 2 });
    const gates = [new Deferred(), new Deferred(), new Deferred(), new Deferred()];
    let running = 0;
    let peak = 0;

    const results = gates.map((gate, i) =>
      executor.submit(async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
        return i;
      })
    );

    await Promise.resolve();
    await Promise.resolve();
    expect(executor.activeCount).toBe(2);
    expect(executor.queuedCount).toBe(2);

    gates.forEach((gate) => gate.resolve());
    expect(await Promise.all(results)).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
    expect(executor.activeCount).toBe(0);
  });

  it('turns a synchronous throw into a rejection', async () => {
    const executor = new BoundedExecutor({ maxConcurrency: 1 });
    const error = new Error('boom');

    await expect(
      executor.submit(() => {
        throw error;
      })
    ).rejects.toBe(error);
    expect(await executor.submit(() => 'next')).toBe('next');
  });

  it('abandons queued work on shutdown and lets running work finish', async () => {
    const executor = new BoundedExecutor({ maxConcurrency: 1 });
    const gate = new Deferred();
    const running = executor.submit(async () => {
      await gate.promise;
      return 'done';
    });
    const queued = executor.submit(() => 'never').catch((error: unknown) => error);

    executor.shutdown();
    gate.resolve();

    expect(await running).toBe('done');
    expect(await queued).toBeInstanceOf(ExecutorShutdownError);
    await expect(executor.submit(() => 'late')).rejects.toBeInstanceOf(ExecutorShutdownError);
    expect(executor.isShutdown).toBe(true);
  });
});
