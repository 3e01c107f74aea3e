/**
 * futurekit/invalidatable
 *
 * A context that stops accepting work once its owner goes away, e.g. a view
 * that has been torn down and must not receive late callbacks.
 *
 * @example
 * ```typescript
 * const screen = createInvalidatableContext();
 *
 * loadProfile().then((profile) => render(profile), screen);
 *
 * // later, when the screen is destroyed
 * screen.invalidate();
 * ```
 */

import type { ExecutionContext } from "./context";
import { emitEvent, mainContext } from "./config";

export interface InvalidatableContext extends ExecutionContext {
  /**
   * Permanently stop accepting work. Work already handed to the target
   * context is not recalled.
   */
  invalidate(): void;

  /** Whether the context still accepts work. */
  isValid(): boolean;
}

/**
 * Create a context that forwards work to `target` until `invalidate()` is
 * called, and drops it afterwards.
 *
 * @param target - Context that actually runs the work (default: main context)
 * @param name - Optional name, reported in `work_dropped` events
 */
export function createInvalidatableContext(
  target: ExecutionContext = mainContext,
  name?: string
): InvalidatableContext {
  let valid = true;

  return {
    name,
    invalidate: () => {
      valid = false;
    },
    isValid: () => valid,
    execute: (work) => {
      if (!valid) {
        emitEvent({ type: "work_dropped", contextName: name, ts: Date.now() });
        return;
      }
      target.execute(work);
    },
  };
}
