/**
 * futurekit/combinators
 *
 * Compositions built only from the public `Future` contract.
 *
 * @example
 * ```typescript
 * import { all, zip } from 'futurekit';
 *
 * all([loadUser('1'), loadUser('2')]).then((users) => render(users));
 *
 * zip(loadUser('1'), loadSettings('1')).then(([user, settings]) => {
 *   apply(user, settings);
 * });
 * ```
 */

import type { ExecutionContext } from "./context";
import { mainContext } from "./config";
import { Future } from "./future";

// =============================================================================
// all
// =============================================================================

/**
 * Wait for every future to fulfil.
 *
 * - Empty input returns an already-fulfilled future of `[]`.
 * - Values keep the input order, not completion order.
 * - The first rejection observed rejects the result immediately, even while
 *   other inputs are still pending. Later outcomes are ignored.
 *
 * @param futures - Futures to wait for
 * @param context - Where the internal reactions run (default: main context)
 */
export function all<T>(
  futures: readonly Future<T>[],
  context: ExecutionContext = mainContext
): Future<T[]> {
  if (futures.length === 0) {
    return Future.fulfilled<T[]>([]);
  }

  const result = new Future<T[]>();
  const values: T[] = new Array<T>(futures.length);
  let remaining = futures.length;

  futures.forEach((future, index) => {
    future.tap(
      (value) => {
        values[index] = value;
        remaining--;
        if (remaining === 0) {
          result.fulfill(values);
        }
      },
      result.reject,
      context
    );
  });

  return result;
}

// =============================================================================
// zip
// =============================================================================

/**
 * Pair up the values of two futures, or combine three into a triple.
 * Fulfils once every input has fulfilled; rejects with the first rejection.
 */
export function zip<A, B>(
  first: Future<A>,
  second: Future<B>,
  context?: ExecutionContext
): Future<[A, B]>;
export function zip<A, B, C>(
  first: Future<A>,
  second: Future<B>,
  third: Future<C>,
  context?: ExecutionContext
): Future<[A, B, C]>;
export function zip<A, B, C>(
  first: Future<A>,
  second: Future<B>,
  thirdOrContext?: Future<C> | ExecutionContext,
  context?: ExecutionContext
): Future<[A, B]> | Future<[A, B, C]> {
  if (thirdOrContext instanceof Future) {
    return zip3(first, second, thirdOrContext, context);
  }
  return zip2(first, second, thirdOrContext);
}

function zip2<A, B>(
  first: Future<A>,
  second: Future<B>,
  context: ExecutionContext = mainContext
): Future<[A, B]> {
  const result = new Future<[A, B]>();

  const resolve = (): void => {
    const a = first.state;
    const b = second.state;
    if (a.status === "fulfilled" && b.status === "fulfilled") {
      result.fulfill([a.value, b.value]);
    }
  };

  first.tap(resolve, result.reject, context);
  second.tap(resolve, result.reject, context);

  return result;
}

function zip3<A, B, C>(
  first: Future<A>,
  second: Future<B>,
  third: Future<C>,
  context: ExecutionContext = mainContext
): Future<[A, B, C]> {
  return zip2(zip2(first, second, context), third, context).map(
    ([[a, b], c]): [A, B, C] => [a, b, c],
    context
  );
}
