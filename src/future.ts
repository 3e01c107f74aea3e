/**
 * futurekit/future
 *
 * A single-assignment container that starts pending, settles exactly once,
 * and runs registered reactions on the execution context each subscriber
 * chose, whether it subscribed before or after settlement.
 *
 * ## Settlement and draining
 *
 * All reads and writes of a future's state and subscriber list happen inside
 * its serial queue's `sync` region. Observer code never runs there: settling
 * or subscribing only enqueues a drain task, which takes the subscriber list
 * under `sync`, clears it, leaves the region, and then hands each reaction to
 * its own context in registration order.
 *
 * @example
 * ```typescript
 * import { Future } from 'futurekit';
 *
 * const user = new Future<User>((fulfill, reject) => {
 *   db.load('42', (error, row) => (error ? reject(error) : fulfill(row)));
 * });
 *
 * user
 *   .then((u) => u.name)
 *   .then((name) => console.log(name))
 *   .catch((error) => console.error(error));
 * ```
 */

import type { ExecutionContext } from "./context";
import { backgroundContext, emitEvent, getFutureConfig, mainContext } from "./config";
import { CancelledError, NilError, isCancelledError } from "./errors";
import { createSerialQueue, type SerialQueue } from "./serial-queue";
import {
  errorOf,
  fulfilledState,
  isFulfilled,
  isPending,
  isRejected,
  pending,
  rejectedState,
  valueOf,
  type SettlementState,
} from "./state";

// =============================================================================
// Types
// =============================================================================

export type Fulfill<T> = (value: T) => void;
export type Reject = (error?: unknown) => void;

/**
 * Work that eventually settles a future. A synchronous throw rejects it.
 */
export type Executor<T> = (fulfill: Fulfill<T>, reject: Reject) => void;

/**
 * One registered observer.
 * @internal
 */
interface Subscriber<T> {
  onFulfilled: (value: T) => void;
  onRejected: (error: unknown) => void;
  context: ExecutionContext;
}

const noop = (): void => {};

let nextFutureId = 1;

// =============================================================================
// Future
// =============================================================================

export class Future<T> {
  /** Process-unique id, reported in events. */
  readonly id: number;

  private current: SettlementState<T> = pending();
  private subscribers: Subscriber<T>[] = [];
  private readonly queue: SerialQueue;

  /**
   * Settle with a value. No-op once settled.
   */
  readonly fulfill = (value: T): void => {
    this.updateState(fulfilledState(value));
  };

  /**
   * Settle with a failure. No-op once settled.
   * A missing cause (`undefined` or `null`) is replaced with a `NilError`.
   */
  readonly reject = (error?: unknown): void => {
    this.updateState(rejectedState(error ?? new NilError()));
  };

  /**
   * Create a pending future. When `work` is given it is scheduled on
   * `context` and handed this future's `fulfill` and `reject`.
   *
   * @param work - Executor that settles the future
   * @param context - Where `work` runs (default: background context)
   */
  constructor(work?: Executor<T>, context: ExecutionContext = backgroundContext) {
    this.id = nextFutureId++;
    this.queue = createSerialQueue(
      getFutureConfig().queueScheduler,
      `future-${this.id}`
    );

    if (work) {
      context.execute(() => {
        try {
          work(this.fulfill, this.reject);
        } catch (error) {
          this.reject(error);
        }
      });
    }
  }

  /**
   * Create a future that is already fulfilled.
   */
  static fulfilled<T>(value: T): Future<T> {
    const future = new Future<T>();
    future.current = fulfilledState(value);
    return future;
  }

  /**
   * Create a future that is already rejected.
   */
  static rejected<T = never>(error?: unknown): Future<T> {
    const future = new Future<T>();
    future.current = rejectedState(error ?? new NilError());
    return future;
  }

  /**
   * Adopt the outcome of a native promise or any thenable.
   */
  static from<T>(thenable: PromiseLike<T>): Future<T> {
    const future = new Future<T>();
    void thenable.then(future.fulfill, future.reject);
    return future;
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  /** Snapshot of the current state. */
  get state(): SettlementState<T> {
    return this.queue.sync(() => this.current);
  }

  get value(): T | undefined {
    return valueOf(this.state);
  }

  get error(): unknown {
    return errorOf(this.state);
  }

  get isPending(): boolean {
    return isPending(this.state);
  }

  get isFulfilled(): boolean {
    return isFulfilled(this.state);
  }

  get isRejected(): boolean {
    return isRejected(this.state);
  }

  // ===========================================================================
  // Settlement
  // ===========================================================================

  /**
   * Reject with a `CancelledError` if still pending. Work already dispatched
   * for this future keeps running; its later settlement is ignored.
   */
  cancel(): void {
    this.reject(new CancelledError());
  }

  private updateState(next: SettlementState<T>): void {
    if (next.status === "pending") return;

    const changed = this.queue.sync(() => {
      if (!isPending(this.current)) return false;
      this.current = next;
      return true;
    });
    if (!changed) return;

    const error = next.status === "rejected" ? next.error : undefined;
    emitEvent({
      type: "future_settled",
      futureId: this.id,
      status: next.status,
      cancelled: isCancelledError(error),
      error,
      ts: Date.now(),
    });

    this.fireCallbacksIfNecessary();
  }

  // ===========================================================================
  // Subscription
  // ===========================================================================

  /**
   * Chain a future-returning step. `onFulfilled` runs on `context` once this
   * future fulfils; the future it returns settles the result. A throw rejects
   * the result, and a rejection of this future passes through unchanged.
   */
  flatMap<U>(
    onFulfilled: (value: T) => Future<U>,
    context: ExecutionContext = mainContext
  ): Future<U> {
    const result = new Future<U>();

    this.addSubscriber({
      context,
      onFulfilled: (value) => {
        let inner: Future<U>;
        try {
          inner = onFulfilled(value);
        } catch (error) {
          result.reject(error);
          return;
        }
        inner.tap(result.fulfill, result.reject, context);
      },
      onRejected: result.reject,
    });

    return result;
  }

  /**
   * Transform the fulfilled value. A throw rejects the result.
   */
  map<U>(
    onFulfilled: (value: T) => U,
    context: ExecutionContext = mainContext
  ): Future<U> {
    return this.flatMap((value) => {
      try {
        return Future.fulfilled(onFulfilled(value));
      } catch (error) {
        return Future.rejected<U>(error);
      }
    }, context);
  }

  /**
   * Observe the outcome without deriving a new future.
   *
   * A throw from either reaction never reaches the context or any other
   * subscriber; it is reported as a `reaction_error` event.
   *
   * @returns This future, for chaining
   */
  tap(
    onFulfilled: (value: T) => void,
    onRejected: (error: unknown) => void = noop,
    context: ExecutionContext = mainContext
  ): this {
    this.addSubscriber({
      context,
      onFulfilled: (value) => this.observe(() => onFulfilled(value)),
      onRejected: (error) => this.observe(() => onRejected(error)),
    });
    return this;
  }

  /**
   * Chain onto this future.
   *
   * - `then(fn)` where `fn` returns a `Future<U>` flattens it.
   * - `then(fn)` where `fn` returns a plain value maps to `Future<U>`.
   * - `then(onFulfilled, onRejected)` observes and returns this future.
   *
   * The trailing `context` decides where the reaction runs (default: main context).
   */
  then<U>(
    onFulfilled: (value: T) => Future<U>,
    context?: ExecutionContext
  ): Future<U>;
  then<U>(onFulfilled: (value: T) => U, context?: ExecutionContext): Future<U>;
  then(
    onFulfilled: (value: T) => void,
    onRejected: (error: unknown) => void,
    context?: ExecutionContext
  ): this;
  then<U>(
    onFulfilled: (value: T) => U | Future<U>,
    contextOrOnRejected?: ExecutionContext | ((error: unknown) => void),
    context?: ExecutionContext
  ): Future<U> | this {
    if (typeof contextOrOnRejected === "function") {
      return this.tap(onFulfilled, contextOrOnRejected, context);
    }
    return this.flatMap<U>((value) => {
      const next = onFulfilled(value);
      return next instanceof Future ? next : Future.fulfilled(next);
    }, contextOrOnRejected);
  }

  /**
   * Observe a rejection.
   */
  catch(
    onRejected: (error: unknown) => void,
    context: ExecutionContext = mainContext
  ): this {
    return this.tap(noop, onRejected, context);
  }

  /**
   * Run `onComplete` once, whatever the outcome.
   */
  always(
    onComplete: () => void,
    context: ExecutionContext = mainContext
  ): this {
    return this.tap(
      () => onComplete(),
      () => onComplete(),
      context
    );
  }

  /**
   * Bridge to a native promise, e.g. for `await`.
   */
  toPromise(context: ExecutionContext = mainContext): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.tap(resolve, reject, context);
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private addSubscriber(subscriber: Subscriber<T>): void {
    this.queue.sync(() => {
      this.subscribers.push(subscriber);
    });
    this.fireCallbacksIfNecessary();
  }

  private fireCallbacksIfNecessary(): void {
    this.queue.async(() => {
      const drained = this.queue.sync(() => {
        if (isPending(this.current)) return undefined;
        const subscribers = this.subscribers;
        this.subscribers = [];
        return { state: this.current, subscribers };
      });
      if (!drained || drained.subscribers.length === 0) return;

      const { state, subscribers } = drained;
      for (const subscriber of subscribers) {
        // A context may run work inline; one failure must not cost later
        // subscribers their turn.
        try {
          if (state.status === "fulfilled") {
            const value = state.value;
            subscriber.context.execute(() => subscriber.onFulfilled(value));
          } else if (state.status === "rejected") {
            const error = state.error;
            subscriber.context.execute(() => subscriber.onRejected(error));
          }
        } catch (error) {
          this.reportReactionError(error);
        }
      }

      emitEvent({
        type: "subscribers_drained",
        futureId: this.id,
        count: subscribers.length,
        ts: Date.now(),
      });
    });
  }

  private observe(reaction: () => void): void {
    try {
      reaction();
    } catch (error) {
      this.reportReactionError(error);
    }
  }

  private reportReactionError(error: unknown): void {
    emitEvent({
      type: "reaction_error",
      futureId: this.id,
      error,
      ts: Date.now(),
    });
  }
}
