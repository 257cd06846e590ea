import { describe, it, expect } from 'vitest';
import { OperationAbortedError } from '../errors/errors.js';
import { TaskTimeoutError, WorkerPool } from './worker-pool.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('WorkerPool', () => {
  it('keeps input order regardless of completion order', async () => {
    const results = await WorkerPool.run(
      [30, 10, 20],
      async ms => {
        await delay(ms);
        return ms * 2;
      },
      { concurrency: 3 }
    );
    expect(results).toEqual([60, 20, 40]);
  });

  it('never has more tasks in flight than the concurrency', async () => {
    let active = 0;
    let peak = 0;

    await WorkerPool.run(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        active++;
        peak = Math.max(peak, active);
        await delay(5);
        active--;
      },
      { concurrency: 3 }
    );

    expect(peak).toBe(3);
  });

  it('fails the run on the first error and starts nothing after it', async () => {
    const started: number[] = [];
    const run = WorkerPool.run(
      [0, 1, 2, 3],
      async item => {
        started.push(item);
        if (item === 1) throw new Error('item 1 failed');
        await delay(1);
        return item;
      },
      { concurrency: 1 }
    );

    await expect(run).rejects.toThrow('item 1 failed');
    expect(started).toEqual([0, 1]);
  });

  it('reports failures per item with settle', async () => {
    const results = await WorkerPool.settle(
      ['a', 'b'],
      async item => {
        if (item === 'b') throw new Error('nope');
        return item.toUpperCase();
      },
      { concurrency: 2 }
    );

    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(results[1]?.status).toBe('rejected');
  });

  it('times out slow tasks', async () => {
    const run = WorkerPool.run([0], () => delay(200), { concurrency: 1, timeoutMs: 10, stage: 'role fetch' });
    await expect(run).rejects.toThrow(new TaskTimeoutError('role fetch', 10));
  });

  it('stops starting tasks once aborted', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const run = WorkerPool.run(
      [0, 1, 2],
      async item => {
        seen.push(item);
        controller.abort();
        return item;
      },
      { concurrency: 1, signal: controller.signal, stage: 'ingestion' }
    );

    await expect(run).rejects.toBeInstanceOf(OperationAbortedError);
    expect(seen).toEqual([0]);
  });

  it('returns an empty list for no items', async () => {
    await expect(WorkerPool.run([], async () => 1, { concurrency: 4 })).resolves.toEqual([]);
  });
});
