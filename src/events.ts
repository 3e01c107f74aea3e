/**
 * Event stream emitted by futures and contexts.
 *
 * Events are delivered synchronously to the configured `onEvent` listener,
 * always outside any critical section. Use them for logging or debugging
 * (see `createEventLogger`).
 */

import type { SettlementStatus } from "./state";

export type FutureEvent =
  | {
      type: "future_settled";
      futureId: number;
      status: Exclude<SettlementStatus, "pending">;
      cancelled: boolean;
      error?: unknown;
      ts: number;
    }
  | {
      type: "subscribers_drained";
      futureId: number;
      count: number;
      ts: number;
    }
  | {
      type: "reaction_error";
      futureId: number;
      error: unknown;
      ts: number;
    }
  | { type: "work_dropped"; contextName?: string; ts: number };

export type FutureEventType = FutureEvent["type"];

export type FutureEventListener = (event: FutureEvent) => void;
