/**
 * futurekit
 *
 * Single-assignment futures with explicit execution contexts.
 *
 * ## Overview
 *
 * A `Future<T>` starts pending and settles exactly once, with a value or a
 * failure. Any number of observers can subscribe before, during or after
 * settlement; each reaction runs asynchronously on the execution context
 * its subscriber chose.
 *
 * - **Settle**: `fulfill`, `reject`, `cancel` (later calls are no-ops)
 * - **Chain**: `then`, `map`, `flatMap`, `tap`, `catch`, `always`
 * - **Inspect**: `state`, `value`, `error`, `isPending`, `isFulfilled`, `isRejected`
 * - **Combine**: `all`, `zip`
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Future, all } from 'futurekit';
 *
 * const price = new Future<number>((fulfill) => fulfill(5));
 *
 * price
 *   .then((n) => n * 2)
 *   .then((doubled) => console.log(doubled)); // 10
 *
 * all([price, Future.fulfilled(7)]).then(([a, b]) => a + b);
 * ```
 */

// =============================================================================
// Future
// =============================================================================

export { Future, type Executor, type Fulfill, type Reject } from "./future";

export {
  type SettlementState,
  type SettlementStatus,
  pending,
  fulfilledState,
  rejectedState,
  isPending,
  isFulfilled,
  isRejected,
  valueOf,
  errorOf,
} from "./state";

// =============================================================================
// Combinators
// =============================================================================

export { all, zip } from "./combinators";

// =============================================================================
// Execution Contexts
// =============================================================================

export {
  type Scheduler,
  type ExecutionContext,
  microtaskScheduler,
  macrotaskScheduler,
  createSchedulerContext,
} from "./context";

export {
  type InvalidatableContext,
  createInvalidatableContext,
} from "./invalidatable";

// =============================================================================
// Errors
// =============================================================================

export {
  CancelledError,
  NilError,
  ReentrantAccessError,
  isCancelledError,
  isNilError,
  isReentrantAccessError,
  describeError,
} from "./errors";

// =============================================================================
// Configuration & Events
// =============================================================================

export {
  type FutureConfig,
  DEFAULT_CONFIG,
  configureFutures,
  getFutureConfig,
  resetFutureConfig,
  mainContext,
  backgroundContext,
} from "./config";

export type { FutureEvent, FutureEventType, FutureEventListener } from "./events";

export {
  type LogLevel,
  type EventLogger,
  type EventLoggerOptions,
  type EventLogEntry,
  toLogEntry,
  createEventLogger,
} from "./logger";
