/**
 * futurekit/testing
 *
 * Deterministic scheduling for tests. A manual scheduler only runs tasks when
 * told to, so drains and reactions can be stepped one at a time.
 *
 * @example
 * ```typescript
 * const scheduler = createManualScheduler();
 * configureFutures({ queueScheduler: scheduler.schedule });
 *
 * const future = Future.fulfilled(1);
 * future.then((n) => seen.push(n), createSchedulerContext(scheduler.schedule));
 *
 * scheduler.flush();
 * expect(seen).toEqual([1]);
 * ```
 */

import { createSchedulerContext, type ExecutionContext, type Scheduler } from "./context";

export interface ManualScheduler {
  /** Scheduler function to hand to contexts or `configureFutures`. */
  schedule: Scheduler;

  /**
   * Run the oldest queued task.
   * @returns false when nothing was queued
   */
  runNext(): boolean;

  /**
   * Run tasks until the queue is empty, including tasks queued while
   * flushing.
   * @param limit - Upper bound on tasks run (default 10000)
   * @returns Number of tasks run
   */
  flush(limit?: number): number;

  /** Number of queued tasks. */
  pending(): number;
}

export interface ManualContext extends ExecutionContext {
  readonly scheduler: ManualScheduler;
}

export function createManualScheduler(): ManualScheduler {
  const queue: Array<() => void> = [];

  const runNext = (): boolean => {
    const task = queue.shift();
    if (!task) return false;
    task();
    return true;
  };

  return {
    schedule: (task) => {
      queue.push(task);
    },
    runNext,
    flush: (limit = 10_000) => {
      let count = 0;
      while (count < limit && runNext()) {
        count++;
      }
      if (queue.length > 0) {
        throw new Error(`Manual scheduler still has ${queue.length} tasks after ${limit} runs`);
      }
      return count;
    },
    pending: () => queue.length,
  };
}

/**
 * Create a context backed by its own manual scheduler.
 */
export function createManualContext(name?: string): ManualContext {
  const scheduler = createManualScheduler();
  return {
    ...createSchedulerContext(scheduler.schedule, name),
    scheduler,
  };
}
