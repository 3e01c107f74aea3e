/**
 * futurekit/errors
 *
 * Built-in failure kinds. Every other rejection payload is supplied by the
 * caller and passed through untouched.
 */

// =============================================================================
// Built-in Errors
// =============================================================================

/**
 * Rejection produced by `future.cancel()`.
 */
export class CancelledError extends Error {
  readonly type = "CANCELLED" as const;

  constructor(message = "Future was cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

/**
 * Rejection synthesized when a failure has no concrete cause,
 * e.g. `reject()` called with `undefined`.
 */
export class NilError extends Error {
  readonly type = "NIL_ERROR" as const;

  constructor(message = "Future was rejected without an error") {
    super(message);
    this.name = "NilError";
  }
}

/**
 * Thrown when a serial queue's critical section is entered from inside itself.
 */
export class ReentrantAccessError extends Error {
  readonly type = "REENTRANT_ACCESS" as const;
  readonly queueLabel?: string;

  constructor(queueLabel?: string) {
    super(
      queueLabel
        ? `Reentrant access to serial queue "${queueLabel}"`
        : "Reentrant access to serial queue"
    );
    this.name = "ReentrantAccessError";
    this.queueLabel = queueLabel;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

function hasType(error: unknown, type: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === type
  );
}

/**
 * Type guard for CancelledError.
 */
export function isCancelledError(error: unknown): error is CancelledError {
  return hasType(error, "CANCELLED");
}

/**
 * Type guard for NilError.
 */
export function isNilError(error: unknown): error is NilError {
  return hasType(error, "NIL_ERROR");
}

/**
 * Type guard for ReentrantAccessError.
 */
export function isReentrantAccessError(
  error: unknown
): error is ReentrantAccessError {
  return hasType(error, "REENTRANT_ACCESS");
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Render any rejection payload as a single line for logs.
 *
 * @example
 * ```typescript
 * describeError(new TypeError("bad input")); // "TypeError: bad input"
 * describeError("TIMEOUT");                   // "TIMEOUT"
 * describeError({ code: 42 });                // '{"code":42}'
 * ```
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  if (typeof error === "object" && error !== null) {
    try {
      return JSON.stringify(error);
    } catch {
      return Object.prototype.toString.call(error);
    }
  }
  return String(error);
}
