/**
 * futurekit/context
 *
 * Execution contexts decide where a unit of work runs. The library never
 * picks a thread or queue on its own; every reaction is handed to the
 * context its subscriber named.
 *
 * @example
 * ```typescript
 * import { createSchedulerContext, macrotaskScheduler } from 'futurekit';
 *
 * const io = createSchedulerContext(macrotaskScheduler, 'io');
 * future.then((value) => save(value), io);
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Hands a task to something that will run it later.
 */
export type Scheduler = (task: () => void) => void;

/**
 * Capability: run this unit of work, eventually, somewhere.
 */
export interface ExecutionContext {
  /**
   * Accept a zero-argument unit of work. Implementations guarantee it runs
   * (now or later) unless they document a reason to drop it.
   */
  execute(work: () => void): void;

  /** Optional name, surfaced in events. */
  readonly name?: string;
}

// =============================================================================
// Schedulers
// =============================================================================

/**
 * Runs tasks on the microtask queue, before control returns to the event loop.
 */
export const microtaskScheduler: Scheduler = (task) => {
  queueMicrotask(task);
};

/**
 * Runs tasks on the check phase of the event loop, after pending I/O.
 */
export const macrotaskScheduler: Scheduler = (task) => {
  setImmediate(task);
};

// =============================================================================
// Contexts
// =============================================================================

/**
 * Create an always-available context that forwards every unit of work to a
 * scheduler.
 */
export function createSchedulerContext(
  scheduler: Scheduler,
  name?: string
): ExecutionContext {
  return {
    name,
    execute: (work) => scheduler(work),
  };
}
