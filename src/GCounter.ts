/**
 * G-Counter (Grow-only Counter) replicated type.
 *
 * Keeps one running total per key. Merging a `CounterIncrement` adds its
 * amount to the total, so totals only ever grow.
 *
 * Properties:
 * - Commutative and associative across distinct operations
 * - NOT idempotent: the type keeps no operation identity, so applying the
 *   same increment twice counts it twice. Exactly-once delivery is assumed;
 *   a transport that duplicates messages must be deduplicated upstream.
 *
 * @since 0.1.0
 */

import { dual, pipe } from "effect/Function"
import * as Option from "effect/Option"
import * as Predicate from "effect/Predicate"
import * as STM from "effect/STM"
import * as TMap from "effect/TMap"
import type { Mutable } from "effect/Types"
import { makeProtoBase } from "./internal/proto.js"
import type { Operation } from "./Operation.js"
import { InvalidOperation } from "./ReplicationError.js"
import type { ReplicatedType } from "./ReplicatedType.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * G-Counter type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const GCounterTypeId: unique symbol = Symbol.for("broadcast-crdt/GCounter")

/**
 * G-Counter type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type GCounterTypeId = typeof GCounterTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * G-Counter data structure.
 *
 * @since 0.1.0
 * @category models
 */
export interface GCounter extends ReplicatedType<number> {
  readonly [GCounterTypeId]: GCounterTypeId
  readonly totals: TMap.TMap<string, number>
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is a GCounter.
 *
 * @since 0.1.0
 * @category guards
 */
export const isGCounter = (u: unknown): u is GCounter =>
  Predicate.hasProperty(u, GCounterTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoGCounter = makeProtoBase(GCounterTypeId)

/** @internal */
const applyOperation = (self: GCounter, op: Operation): STM.STM<void, InvalidOperation> => {
  if (op._tag !== "CounterIncrement") {
    return STM.fail(new InvalidOperation({ message: `G-Counter cannot apply a ${op._tag} operation` }))
  }
  if (!Number.isSafeInteger(op.amount) || op.amount < 0) {
    return STM.fail(
      new InvalidOperation({ message: `Counter increment must be a non-negative integer, got ${op.amount}` })
    )
  }
  return pipe(
    TMap.get(self.totals, op.key),
    STM.map(Option.getOrElse(() => 0)),
    STM.flatMap((total) =>
      Number.isSafeInteger(total + op.amount)
        ? TMap.set(self.totals, op.key, total + op.amount)
        : STM.fail(new InvalidOperation({ message: `Counter "${op.key}" would exceed the largest safe integer` }))
    )
  )
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates an empty G-Counter.
 *
 * @example
 * ```ts
 * import * as GCounter from "broadcast-crdt/GCounter"
 * import * as Operation from "broadcast-crdt/Operation"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const counter = yield* GCounter.make
 *   yield* GCounter.apply(counter, Operation.CounterIncrement({ key: "visitors", amount: 3 }))
 *   return yield* GCounter.read(counter, "visitors") // Some(3)
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make: STM.STM<GCounter> = STM.gen(function* () {
  const counter: Mutable<GCounter> = Object.create(ProtoGCounter)
  counter.accepts = "CounterIncrement"
  counter.totals = yield* TMap.empty<string, number>()
  counter.apply = (op) => applyOperation(counter, op)
  counter.read = (key) => TMap.get(counter.totals, key)
  counter.keys = TMap.keys(counter.totals)
  return counter
})

// =============================================================================
// Operations
// =============================================================================

/**
 * Add an increment to its key's total.
 *
 * Fails with `InvalidOperation`, leaving the counter untouched, when the
 * operation is not a `CounterIncrement`, its amount is not a non-negative
 * integer, or the total would leave the safe integer range.
 *
 * @since 0.1.0
 * @category operations
 */
export const apply: {
  (op: Operation): (self: GCounter) => STM.STM<GCounter, InvalidOperation>
  (self: GCounter, op: Operation): STM.STM<GCounter, InvalidOperation>
} = dual(
  2,
  (self: GCounter, op: Operation): STM.STM<GCounter, InvalidOperation> =>
    self.apply(op).pipe(STM.as(self))
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Current total for a key, if it was ever incremented.
 *
 * @since 0.1.0
 * @category getters
 */
export const read: {
  (key: string): (self: GCounter) => STM.STM<Option.Option<number>>
  (self: GCounter, key: string): STM.STM<Option.Option<number>>
} = dual(2, (self: GCounter, key: string): STM.STM<Option.Option<number>> => self.read(key))

/**
 * @since 0.1.0
 * @category getters
 */
export const query = (self: GCounter): STM.STM<ReadonlyMap<string, number>> =>
  TMap.toMap(self.totals)
