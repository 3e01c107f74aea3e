/**
 * futurekit/state
 *
 * The tagged settlement state of a future. Pure data: the projections below
 * never mutate anything.
 */

export type SettlementStatus = "pending" | "fulfilled" | "rejected";

export type SettlementState<T> =
  | { readonly status: "pending" }
  | { readonly status: "fulfilled"; readonly value: T }
  | { readonly status: "rejected"; readonly error: unknown };

// =============================================================================
// Constructors
// =============================================================================

const PENDING = { status: "pending" } as const;

export const pending = <T = never>(): SettlementState<T> => PENDING;

export const fulfilledState = <T>(value: T): SettlementState<T> => ({
  status: "fulfilled",
  value,
});

export const rejectedState = <T = never>(error: unknown): SettlementState<T> => ({
  status: "rejected",
  error,
});

// =============================================================================
// Projections
// =============================================================================

export const isPending = <T>(
  state: SettlementState<T>
): state is { readonly status: "pending" } => state.status === "pending";

export const isFulfilled = <T>(
  state: SettlementState<T>
): state is { readonly status: "fulfilled"; readonly value: T } =>
  state.status === "fulfilled";

export const isRejected = <T>(
  state: SettlementState<T>
): state is { readonly status: "rejected"; readonly error: unknown } =>
  state.status === "rejected";

/**
 * The fulfilled value, or `undefined` for any other state.
 */
export const valueOf = <T>(state: SettlementState<T>): T | undefined =>
  state.status === "fulfilled" ? state.value : undefined;

/**
 * The rejection payload, or `undefined` for any other state.
 */
export const errorOf = <T>(state: SettlementState<T>): unknown =>
  state.status === "rejected" ? state.error : undefined;
