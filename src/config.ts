/**
 * futurekit/config
 *
 * Process-wide defaults: which context reactions run on when a call site
 * names none, which context executors start on, which scheduler drives each
 * future's internal queue, and where events go.
 *
 * @example
 * ```typescript
 * import pino from 'pino';
 * import { configureFutures, createEventLogger } from 'futurekit';
 *
 * configureFutures({ onEvent: createEventLogger(pino()) });
 * ```
 */

import {
  createSchedulerContext,
  macrotaskScheduler,
  microtaskScheduler,
  type ExecutionContext,
  type Scheduler,
} from "./context";
import type { FutureEvent, FutureEventListener } from "./events";

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for futures created after it is applied.
 */
export interface FutureConfig {
  /**
   * Context used by `then`/`catch`/`always` and the combinators when the
   * caller passes none. Stands in for a UI/foreground queue.
   * @default microtask context
   */
  mainContext: ExecutionContext;

  /**
   * Context executor work starts on when the caller passes none.
   * @default macrotask context (setImmediate)
   */
  backgroundContext: ExecutionContext;

  /**
   * Scheduler driving each future's internal drain queue.
   * Captured when a future is created.
   * @default microtaskScheduler
   */
  queueScheduler: Scheduler;

  /**
   * Listener for settlement, drain and drop events.
   */
  onEvent?: FutureEventListener;

  /**
   * Receives anything `onEvent` throws. Settlement and draining carry on
   * either way.
   * @default rethrow on a fresh microtask
   */
  onListenerError: (error: unknown) => void;
}

// =============================================================================
// Default Configuration
// =============================================================================

function rethrowLater(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}

export const DEFAULT_CONFIG: Readonly<FutureConfig> = Object.freeze({
  mainContext: createSchedulerContext(microtaskScheduler, "main"),
  backgroundContext: createSchedulerContext(macrotaskScheduler, "background"),
  queueScheduler: microtaskScheduler,
  onListenerError: rethrowLater,
});

let activeConfig: FutureConfig = { ...DEFAULT_CONFIG };

// =============================================================================
// Access
// =============================================================================

/**
 * Merge overrides into the active configuration.
 *
 * @returns The configuration that was active before the call
 */
export function configureFutures(config: Partial<FutureConfig>): FutureConfig {
  const previous = activeConfig;
  activeConfig = { ...activeConfig, ...config };
  return previous;
}

export function getFutureConfig(): Readonly<FutureConfig> {
  return activeConfig;
}

/**
 * Restore the built-in defaults and drop any event listener.
 */
export function resetFutureConfig(): void {
  activeConfig = { ...DEFAULT_CONFIG };
}

/**
 * Deliver an event to the configured listener, if any.
 * @internal
 */
export function emitEvent(event: FutureEvent): void {
  const { onEvent, onListenerError } = activeConfig;
  if (!onEvent) return;
  try {
    onEvent(event);
  } catch (error) {
    onListenerError(error);
  }
}

// =============================================================================
// Default Contexts
// =============================================================================

/**
 * Resolves to the configured main context at the moment work is submitted.
 */
export const mainContext: ExecutionContext = {
  name: "main",
  execute: (work) => activeConfig.mainContext.execute(work),
};

/**
 * Resolves to the configured background context at the moment work is submitted.
 */
export const backgroundContext: ExecutionContext = {
  name: "background",
  execute: (work) => activeConfig.backgroundContext.execute(work),
};
