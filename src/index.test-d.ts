/**
 * Type tests for futurekit
 * Run with: npm run test:types
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  Future,
  all,
  zip,
  createInvalidatableContext,
  type SettlementState,
} from "./index";

type User = { id: string; name: string };

declare const user: Future<User>;
declare const count: Future<number>;
declare const flag: Future<boolean>;

// =============================================================================
// then overloads
// =============================================================================

// Map form
expectType<Future<string>>(user.then((u) => u.name));

// Flat-map form
expectType<Future<number>>(user.then(() => count));

// Side-effect form returns the same future
expectType<Future<User>>(
  user.then(
    (u) => console.log(u.id),
    (error) => console.error(error)
  )
);

// Context as trailing argument
const screen = createInvalidatableContext();
expectType<Future<string>>(user.then((u) => u.id, screen));

// =============================================================================
// Explicit forms
// =============================================================================

expectType<Future<number>>(user.map((u) => u.name.length));
expectType<Future<number>>(user.flatMap(() => count));
expectType<Future<User>>(user.tap((u) => u.name));
expectType<Future<User>>(user.catch(() => undefined));
expectType<Future<User>>(user.always(() => undefined));
expectType<Promise<User>>(user.toPromise());

// =============================================================================
// Status
// =============================================================================

expectType<SettlementState<User>>(user.state);
expectType<User | undefined>(user.value);
expectType<unknown>(user.error);
expectType<boolean>(user.isPending);

// =============================================================================
// Combinators
// =============================================================================

expectType<Future<number[]>>(all([count, count]));
expectType<Future<[User, number]>>(zip(user, count));
expectType<Future<[User, number, boolean]>>(zip(user, count, flag));
expectType<Future<[User, number]>>(zip(user, count, screen));

// =============================================================================
// Awaiting
// =============================================================================

async function _awaitFuture() {
  const value = await count;
  expectType<number>(value);
}
