/**
 * Worker Pool
 *
 * Runs an async worker over a list of items with a bounded number of tasks
 * in flight. Results keep the input order.
 */

import { OperationAbortedError, throwIfAborted } from '../errors/errors.js';

export interface WorkerPoolOptions {
  concurrency: number;
  /** Per-task timeout; unset means no timeout */
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
  /** Label used in timeout and abort errors */
  stage?: string | undefined;
}

export class TaskTimeoutError extends Error {
  constructor(stage: string, timeoutMs: number) {
    super(`${stage} task timed out after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

function withTimeout<R>(task: Promise<R>, timeoutMs: number | undefined, stage: string): Promise<R> {
  if (timeoutMs === undefined) return task;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TaskTimeoutError(stage, timeoutMs)), timeoutMs);
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

export class WorkerPool {
  /**
   * Execute the worker over every item. The first failure rejects the run;
   * tasks already started are allowed to settle but no new ones start.
   */
  static async run<T, R>(
    items: readonly T[],
    worker: (item: T, index: number) => Promise<R>,
    options: WorkerPoolOptions
  ): Promise<R[]> {
    const stage = options.stage ?? 'worker pool';
    const concurrency = Math.max(1, Math.floor(options.concurrency));
    const results = new Array<R>(items.length);
    const queue = items.entries();
    let failed = false;

    throwIfAborted(options.signal, stage);

    const lane = async (): Promise<void> => {
      for (const [index, item] of queue) {
        if (failed) return;
        if (options.signal?.aborted) {
          failed = true;
          throw new OperationAbortedError(stage);
        }
        try {
          results[index] = await withTimeout(worker(item, index), options.timeoutMs, stage);
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
    await Promise.all(lanes);
    return results;
  }

  /**
   * Like run, but a failing item is reported instead of failing the run
   */
  static async settle<T, R>(
    items: readonly T[],
    worker: (item: T, index: number) => Promise<R>,
    options: WorkerPoolOptions
  ): Promise<PromiseSettledResult<R>[]> {
    return WorkerPool.run(
      items,
      async (item, index): Promise<PromiseSettledResult<R>> => {
        try {
          return { status: 'fulfilled', value: await worker(item, index) };
        } catch (error) {
          if (error instanceof OperationAbortedError) throw error;
          return { status: 'rejected', reason: error };
        }
      },
      options
    );
  }
}
