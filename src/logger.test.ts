/**
 * Logger adapter tests, driven through pino writing to an in-memory stream.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import pino from "pino";
import { createEventLogger, toLogEntry, type EventLogger } from "./logger";
import { configureFutures, resetFutureConfig } from "./config";
import { CancelledError } from "./errors";
import { Future } from "./future";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

interface LogLine {
  level: number;
  msg: string;
  event: string;
  [key: string]: unknown;
}

function createCapturingLogger(level = "debug") {
  const logs: LogLine[] = [];
  const logger = pino(
    { level },
    {
      write: (msg: string) => {
        logs.push(JSON.parse(msg));
      },
    }
  );
  return { logs, logger };
}

afterEach(() => {
  resetFutureConfig();
});

describe("Logger", () => {
  describe("toLogEntry", () => {
    it("should log fulfilment at debug", () => {
      expect(
        toLogEntry({
          type: "future_settled",
          futureId: 1,
          status: "fulfilled",
          cancelled: false,
          ts: 0,
        })
      ).toEqual({ level: "debug", msg: "future fulfilled", fields: { futureId: 1 } });
    });

    it("should log cancellation at info", () => {
      expect(
        toLogEntry({
          type: "future_settled",
          futureId: 2,
          status: "rejected",
          cancelled: true,
          error: new CancelledError(),
          ts: 0,
        })
      ).toEqual({
        level: "info",
        msg: "future cancelled",
        fields: { futureId: 2, error: "CancelledError: Future was cancelled" },
      });
    });

    it("should log rejection at warn", () => {
      expect(
        toLogEntry({
          type: "future_settled",
          futureId: 3,
          status: "rejected",
          cancelled: false,
          error: "TIMEOUT",
          ts: 0,
        })
      ).toEqual({
        level: "warn",
        msg: "future rejected",
        fields: { futureId: 3, error: "TIMEOUT" },
      });
    });

    it("should log reaction errors at error", () => {
      expect(
        toLogEntry({ type: "reaction_error", futureId: 4, error: new Error("x"), ts: 0 })
      ).toEqual({
        level: "error",
        msg: "reaction threw",
        fields: { futureId: 4, error: "Error: x" },
      });
    });

    it("should log dropped work with the context name", () => {
      expect(toLogEntry({ type: "work_dropped", contextName: "screen", ts: 0 })).toEqual({
        level: "debug",
        msg: "work dropped by invalidated context",
        fields: { context: "screen" },
      });
      expect(toLogEntry({ type: "work_dropped", ts: 0 }).fields).toEqual({});
    });
  });

  describe("createEventLogger", () => {
    it("should call the matching logger method", () => {
      const logger: EventLogger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const listener = createEventLogger(logger, { bindings: { service: "checkout" } });

      listener({ type: "subscribers_drained", futureId: 5, count: 2, ts: 0 });

      expect(logger.debug).toHaveBeenCalledWith(
        { service: "checkout", event: "subscribers_drained", futureId: 5, count: 2 },
        "subscribers drained"
      );
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("should write settlement to pino", () => {
      const { logs, logger } = createCapturingLogger();
      configureFutures({ onEvent: createEventLogger(logger) });

      const future = new Future<number>();
      future.fulfill(1);

      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        level: 20,
        msg: "future fulfilled",
        event: "future_settled",
        futureId: future.id,
      });
    });

    it("should write rejections and cancellations at their levels", () => {
      const { logs, logger } = createCapturingLogger();
      configureFutures({ onEvent: createEventLogger(logger) });

      new Future<number>().reject(new Error("boom"));
      new Future<number>().cancel();

      expect(logs.map((line) => [line.level, line.msg, line.error])).toEqual([
        [40, "future rejected", "Error: boom"],
        [30, "future cancelled", "CancelledError: Future was cancelled"],
      ]);
    });

    it("should respect the pino level", () => {
      const { logs, logger } = createCapturingLogger("warn");
      configureFutures({ onEvent: createEventLogger(logger) });

      new Future<number>().fulfill(1);
      new Future<number>().reject("FAILED");

      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ level: 40, error: "FAILED" });
    });

    it("should skip ignored event types", async () => {
      const { logs, logger } = createCapturingLogger();
      configureFutures({
        onEvent: createEventLogger(logger, { ignore: ["subscribers_drained"] }),
      });

      const future = new Future<number>();
      future.tap(vi.fn());
      future.fulfill(1);
      await tick();

      expect(logs.map((line) => line.event)).toEqual(["future_settled"]);
    });

    it("should log a throwing observer", async () => {
      const { logs, logger } = createCapturingLogger();
      configureFutures({ onEvent: createEventLogger(logger) });

      const future = new Future<number>();
      future.tap(() => {
        throw new Error("observer failed");
      });
      future.fulfill(1);
      await tick();

      expect(logs.map((line) => line.event)).toEqual([
        "future_settled",
        "subscribers_drained",
        "reaction_error",
      ]);
      expect(logs[2]).toMatchObject({
        level: 50,
        msg: "reaction threw",
        futureId: future.id,
        error: "Error: observer failed",
      });
    });
  });
});
