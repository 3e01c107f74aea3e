/**
 * Logger adapter - turns the future event stream into structured log lines.
 *
 * Works with any structured logger exposing `debug/info/warn/error(obj, msg)`
 * (Pino, Bunyan, or a console shim).
 *
 * @example
 * ```typescript
 * import pino from 'pino';
 * import { configureFutures, createEventLogger } from 'futurekit';
 *
 * configureFutures({
 *   onEvent: createEventLogger(pino({ level: 'debug' })),
 * });
 * ```
 */

import { describeError } from "./errors";
import type { FutureEvent, FutureEventListener, FutureEventType } from "./events";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Minimal structured logger surface.
 */
export interface EventLogger {
  debug(obj: object, msg: string): void;
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

export interface EventLoggerOptions {
  /**
   * Event types to skip entirely.
   * @default []
   */
  ignore?: FutureEventType[];

  /**
   * Extra fields merged into every log object.
   */
  bindings?: Record<string, string | number | boolean>;
}

/**
 * A log line before it is handed to the logger.
 */
export interface EventLogEntry {
  level: LogLevel;
  msg: string;
  fields: Record<string, unknown>;
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Map one event to its log level, message and fields.
 */
export function toLogEntry(event: FutureEvent): EventLogEntry {
  switch (event.type) {
    case "future_settled": {
      if (event.status === "fulfilled") {
        return {
          level: "debug",
          msg: "future fulfilled",
          fields: { futureId: event.futureId },
        };
      }
      return {
        level: event.cancelled ? "info" : "warn",
        msg: event.cancelled ? "future cancelled" : "future rejected",
        fields: { futureId: event.futureId, error: describeError(event.error) },
      };
    }
    case "subscribers_drained":
      return {
        level: "debug",
        msg: "subscribers drained",
        fields: { futureId: event.futureId, count: event.count },
      };
    case "reaction_error":
      return {
        level: "error",
        msg: "reaction threw",
        fields: { futureId: event.futureId, error: describeError(event.error) },
      };
    case "work_dropped":
      return {
        level: "debug",
        msg: "work dropped by invalidated context",
        fields: event.contextName ? { context: event.contextName } : {},
      };
  }
}

// =============================================================================
// Adapter
// =============================================================================

/**
 * Create an `onEvent` listener that writes every event to `logger`.
 */
export function createEventLogger(
  logger: EventLogger,
  options: EventLoggerOptions = {}
): FutureEventListener {
  const ignored = new Set<FutureEventType>(options.ignore ?? []);

  return (event) => {
    if (ignored.has(event.type)) return;
    const { level, msg, fields } = toLogEntry(event);
    logger[level]({ ...options.bindings, event: event.type, ...fields }, msg);
  };
}
