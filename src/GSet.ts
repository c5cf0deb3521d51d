/**
 * G-Set (Grow-only Set) replicated type.
 *
 * Keeps the members ever added under each key. Merging a `SetAdd` adds the
 * element if it is absent, which makes the merge idempotent and commutative
 * regardless of delivery order or duplication.
 *
 * Members are listed in local insertion order. That order differs between
 * replicas; compare listings as sets, never as sequences.
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
 * G-Set type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const GSetTypeId: unique symbol = Symbol.for("broadcast-crdt/GSet")

/**
 * G-Set type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type GSetTypeId = typeof GSetTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * G-Set data structure.
 *
 * @since 0.1.0
 * @category models
 */
export interface GSet extends ReplicatedType<ReadonlyArray<string>> {
  readonly [GSetTypeId]: GSetTypeId
  readonly members: TMap.TMap<string, ReadonlyArray<string>>
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is a GSet.
 *
 * @since 0.1.0
 * @category guards
 */
export const isGSet = (u: unknown): u is GSet =>
  Predicate.hasProperty(u, GSetTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoGSet = makeProtoBase(GSetTypeId)

/** @internal */
const applyOperation = (self: GSet, op: Operation): STM.STM<void, InvalidOperation> => {
  if (op._tag !== "SetAdd") {
    return STM.fail(new InvalidOperation({ message: `G-Set cannot apply a ${op._tag} operation` }))
  }
  return pipe(
    TMap.get(self.members, op.key),
    STM.map(Option.getOrElse((): ReadonlyArray<string> => [])),
    STM.flatMap((current) =>
      current.includes(op.element) ? STM.void : TMap.set(self.members, op.key, [...current, op.element])
    )
  )
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates an empty G-Set.
 *
 * @example
 * ```ts
 * import * as GSet from "broadcast-crdt/GSet"
 * import * as Operation from "broadcast-crdt/Operation"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* GSet.make
 *   yield* GSet.apply(set, Operation.SetAdd({ key: "tags", element: "crdt" }))
 *   yield* GSet.apply(set, Operation.SetAdd({ key: "tags", element: "crdt" })) // no-op
 *   return yield* GSet.read(set, "tags") // Some(["crdt"])
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make: STM.STM<GSet> = STM.gen(function* () {
  const set: Mutable<GSet> = Object.create(ProtoGSet)
  set.accepts = "SetAdd"
  set.members = yield* TMap.empty<string, ReadonlyArray<string>>()
  set.apply = (op) => applyOperation(set, op)
  set.read = (key) => TMap.get(set.members, key)
  set.keys = TMap.keys(set.members)
  return set
})

// =============================================================================
// Operations
// =============================================================================

/**
 * Add an element to its key's members, unless already present.
 *
 * @since 0.1.0
 * @category operations
 */
export const apply: {
  (op: Operation): (self: GSet) => STM.STM<GSet, InvalidOperation>
  (self: GSet, op: Operation): STM.STM<GSet, InvalidOperation>
} = dual(
  2,
  (self: GSet, op: Operation): STM.STM<GSet, InvalidOperation> =>
    self.apply(op).pipe(STM.as(self))
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Members of a key in local insertion order.
 *
 * @since 0.1.0
 * @category getters
 */
export const read: {
  (key: string): (self: GSet) => STM.STM<Option.Option<ReadonlyArray<string>>>
  (self: GSet, key: string): STM.STM<Option.Option<ReadonlyArray<string>>>
} = dual(
  2,
  (self: GSet, key: string): STM.STM<Option.Option<ReadonlyArray<string>>> => self.read(key)
)

/**
 * Check if a key's members contain an element.
 *
 * @since 0.1.0
 * @category getters
 */
export const has: {
  (key: string, element: string): (self: GSet) => STM.STM<boolean>
  (self: GSet, key: string, element: string): STM.STM<boolean>
} = dual(
  3,
  (self: GSet, key: string, element: string): STM.STM<boolean> =>
    self.read(key).pipe(
      STM.map((members) => Option.exists(members, (listed) => listed.includes(element)))
    )
)

/**
 * Snapshot of every key's members.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = (self: GSet): STM.STM<ReadonlyMap<string, ReadonlyArray<string>>> =>
  TMap.toMap(self.members)
