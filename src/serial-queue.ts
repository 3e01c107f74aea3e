/**
 * Per-future serialization boundary.
 *
 * `sync` is the exclusive region guarding a future's state and subscriber
 * list as one unit. `async` queues tasks that run later, in submission order,
 * outside any critical section.
 *
 * @internal
 */

import type { Scheduler } from "./context";
import { ReentrantAccessError } from "./errors";

export interface SerialQueue {
  /**
   * Run a critical section to completion and return its result.
   * @throws ReentrantAccessError if called from inside another `sync` on this queue
   */
  sync<R>(critical: () => R): R;

  /**
   * Enqueue a task. Tasks run in FIFO order on the queue's scheduler.
   * A task that throws does not hold back the ones queued after it.
   */
  async(task: () => void): void;
}

export function createSerialQueue(
  scheduler: Scheduler,
  label?: string
): SerialQueue {
  let locked = false;
  let scheduled = false;
  const tasks: Array<() => void> = [];

  function drain(): void {
    scheduled = false;
    // Tasks enqueued while draining run in the same pass.
    while (tasks.length > 0) {
      const task = tasks.shift();
      if (!task) continue;
      try {
        task();
      } catch (error) {
        // Hand the rest to a fresh drain before the error leaves this one.
        if (tasks.length > 0 && !scheduled) {
          scheduled = true;
          scheduler(drain);
        }
        throw error;
      }
    }
  }

  return {
    sync: <R>(critical: () => R): R => {
      if (locked) {
        throw new ReentrantAccessError(label);
      }
      locked = true;
      try {
        return critical();
      } finally {
        locked = false;
      }
    },

    async: (task) => {
      tasks.push(task);
      if (!scheduled) {
        scheduled = true;
        scheduler(drain);
      }
    },
  };
}
