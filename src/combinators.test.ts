import { describe, it, expect } from "vitest";
import { all, zip } from "./combinators";
import { Future } from "./future";
import { createManualContext } from "./testing";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("Combinators", () => {
  describe("all", () => {
    it("should fulfil an empty input synchronously", () => {
      const result = all<number>([]);

      expect(result.isFulfilled).toBe(true);
      expect(result.value).toEqual([]);
    });

    it("should keep input order regardless of completion order", async () => {
      const first = new Future<number>();
      const second = new Future<number>();
      const third = new Future<number>();

      const result = all([first, second, third]);
      third.fulfill(3);
      first.fulfill(1);
      await tick();
      expect(result.isPending).toBe(true);

      second.fulfill(2);
      await expect(result.toPromise()).resolves.toEqual([1, 2, 3]);
    });

    it("should accept already-fulfilled inputs", async () => {
      const result = all([Future.fulfilled("a"), Future.fulfilled("b")]);

      await expect(result.toPromise()).resolves.toEqual(["a", "b"]);
    });

    it("should reject on the first rejection while others are pending", async () => {
      const error = new Error("B failed");
      const a = new Future<number>();
      const b = new Future<number>();
      const c = new Future<number>();

      const result = all([a, b, c]);
      b.reject(error);
      await tick();

      expect(a.isPending).toBe(true);
      expect(c.isPending).toBe(true);
      expect(result.isRejected).toBe(true);
      expect(result.error).toBe(error);

      a.fulfill(1);
      c.fulfill(3);
      await tick();

      expect(result.isRejected).toBe(true);
      expect(result.error).toBe(error);
    });

    it("should keep the first observed rejection", async () => {
      const first = new Error("first");
      const a = new Future<number>();
      const b = new Future<number>();

      const result = all([a, b]);
      a.reject(first);
      await tick();
      b.reject(new Error("second"));
      await tick();

      expect(result.error).toBe(first);
    });

    it("should run its reactions on the given context", async () => {
      const context = createManualContext();

      const result = all([Future.fulfilled(1)], context);
      await tick();

      expect(result.isPending).toBe(true);
      expect(context.scheduler.pending()).toBe(1);

      context.scheduler.flush();
      expect(result.value).toEqual([1]);
    });
  });

  describe("zip", () => {
    it("should fulfil with both values", async () => {
      const name = new Future<string>();
      const count = new Future<number>();

      const result = zip(name, count);
      name.fulfill("x");
      count.fulfill(7);

      await expect(result.toPromise()).resolves.toEqual(["x", 7]);
    });

    it("should stay pending until both inputs fulfil", async () => {
      const name = new Future<string>();
      const count = new Future<number>();

      const result = zip(name, count);
      name.fulfill("x");
      await tick();

      expect(result.isPending).toBe(true);
    });

    it("should reject when either input rejects", async () => {
      const error = new Error("count failed");
      const name = new Future<string>();
      const count = new Future<number>();

      const result = zip(name, count);
      count.reject(error);

      await expect(result.toPromise()).rejects.toBe(error);
      expect(name.isPending).toBe(true);
    });

    it("should combine three futures into a triple", async () => {
      const result = zip(
        Future.fulfilled("a"),
        Future.fulfilled(2),
        Future.fulfilled(true)
      );

      await expect(result.toPromise()).resolves.toEqual(["a", 2, true]);
    });

    it("should reject a triple when the last input rejects", async () => {
      const error = new Error("third failed");
      const third = new Future<boolean>();

      const result = zip(Future.fulfilled("a"), Future.fulfilled(2), third);
      third.reject(error);

      await expect(result.toPromise()).rejects.toBe(error);
    });

    it("should stay pending while the last of three is pending", async () => {
      const result = zip(
        Future.fulfilled("a"),
        Future.fulfilled(2),
        new Future<boolean>()
      );
      await tick();

      expect(result.isPending).toBe(true);
    });
  });
});
