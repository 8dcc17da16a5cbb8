/**
 * Bounded worker pool
 */

import { cpus } from 'node:os';

/**
 * Workers for a run: half the processors, never more than the job count or
 * the configured cap, never less than one.
 */
export function degreeOfParallelism(jobCount: number, maxParallel?: number, processorCount = cpus().length): number {
  const cap = maxParallel ?? Number.POSITIVE_INFINITY;
  return Math.max(1, Math.min(jobCount, Math.floor(processorCount / 2), cap));
}

export class WorkerPool {
  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Run the task for every item with at most `size` in flight. Items start
   * in order; each result lands in the slot of its item, whatever order
   * the tasks complete in.
   */
  async map<T, R>(items: readonly T[], task: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        results[index] = await task(items[index], index);
      }
    };

    const workers = Array.from({ length: Math.min(this.size, items.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }
}
