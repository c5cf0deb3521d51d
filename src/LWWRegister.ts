/**
 * LWW-Register (Last-Writer-Wins Register) replicated type.
 *
 * Holds one `(value, timestamp)` entry per key. An incoming `RegisterSet`
 * replaces the stored entry only when its timestamp is strictly greater than
 * the stored one, so the stored timestamp is always the maximum ever applied
 * for that key.
 *
 * Properties:
 * - Commutative for operations with distinct timestamps
 * - Idempotent: re-applying an operation leaves the entry unchanged
 * - On an exact timestamp tie the entry already present wins, whatever the
 *   values. Two replicas that receive tied writes in different orders keep
 *   different values; this divergence is known and left as is.
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
 * LWW-Register type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const LWWRegisterTypeId: unique symbol = Symbol.for("broadcast-crdt/LWWRegister")

/**
 * LWW-Register type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type LWWRegisterTypeId = typeof LWWRegisterTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * Value stored for one key, with the timestamp of the write that produced it.
 *
 * @since 0.1.0
 * @category models
 */
export interface RegisterEntry {
  readonly value: string
  readonly timestamp: number
}

/**
 * LWW-Register data structure.
 *
 * @since 0.1.0
 * @category models
 */
export interface LWWRegister extends ReplicatedType<string> {
  readonly [LWWRegisterTypeId]: LWWRegisterTypeId
  readonly entries: TMap.TMap<string, RegisterEntry>
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is an LWWRegister.
 *
 * @since 0.1.0
 * @category guards
 */
export const isLWWRegister = (u: unknown): u is LWWRegister =>
  Predicate.hasProperty(u, LWWRegisterTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoLWWRegister = makeProtoBase(LWWRegisterTypeId)

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Merge rule: strictly greater timestamp wins, ties keep the current entry.
 *
 * @internal
 */
const supersedes = (incoming: RegisterEntry, current: Option.Option<RegisterEntry>): boolean =>
  Option.match(current, {
    onNone: () => true,
    onSome: (stored) => incoming.timestamp > stored.timestamp
  })

/** @internal */
const applyOperation = (self: LWWRegister, op: Operation): STM.STM<void, InvalidOperation> => {
  if (op._tag !== "RegisterSet") {
    return STM.fail(new InvalidOperation({ message: `LWW-Register cannot apply a ${op._tag} operation` }))
  }
  if (!Number.isSafeInteger(op.timestamp) || op.timestamp < 0) {
    return STM.fail(
      new InvalidOperation({ message: `Register timestamp must be a non-negative integer, got ${op.timestamp}` })
    )
  }
  const incoming: RegisterEntry = { value: op.value, timestamp: op.timestamp }
  return pipe(
    TMap.get(self.entries, op.key),
    STM.flatMap((current) => supersedes(incoming, current) ? TMap.set(self.entries, op.key, incoming) : STM.void)
  )
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates an empty LWW-Register.
 *
 * @example
 * ```ts
 * import * as LWWRegister from "broadcast-crdt/LWWRegister"
 * import * as Operation from "broadcast-crdt/Operation"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const register = yield* LWWRegister.make
 *   yield* LWWRegister.apply(register, Operation.RegisterSet({ key: "username", value: "ada", timestamp: 100 }))
 *   return yield* LWWRegister.read(register, "username") // Some("ada")
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make: STM.STM<LWWRegister> = STM.gen(function* () {
  const register: Mutable<LWWRegister> = Object.create(ProtoLWWRegister)
  register.accepts = "RegisterSet"
  register.entries = yield* TMap.empty<string, RegisterEntry>()
  register.apply = (op) => applyOperation(register, op)
  register.read = (key) => TMap.get(register.entries, key).pipe(STM.map(Option.map((entry) => entry.value)))
  register.keys = TMap.keys(register.entries)
  return register
})

// =============================================================================
// Operations
// =============================================================================

/**
 * Merge an operation into the register.
 *
 * Fails with `InvalidOperation`, leaving the register untouched, when the
 * operation is not a `RegisterSet` or its timestamp is not a non-negative
 * integer.
 *
 * @example
 * ```ts
 * import * as LWWRegister from "broadcast-crdt/LWWRegister"
 * import * as Operation from "broadcast-crdt/Operation"
 * import * as Effect from "effect/Effect"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const register = yield* LWWRegister.make
 *
 *   // Data-first
 *   yield* LWWRegister.apply(register, Operation.RegisterSet({ key: "k", value: "b", timestamp: 200 }))
 *
 *   // Data-last, ignored: older timestamp
 *   yield* pipe(register, LWWRegister.apply(Operation.RegisterSet({ key: "k", value: "a", timestamp: 100 })))
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const apply: {
  (op: Operation): (self: LWWRegister) => STM.STM<LWWRegister, InvalidOperation>
  (self: LWWRegister, op: Operation): STM.STM<LWWRegister, InvalidOperation>
} = dual(
  2,
  (self: LWWRegister, op: Operation): STM.STM<LWWRegister, InvalidOperation> =>
    self.apply(op).pipe(STM.as(self))
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Current value for a key.
 *
 * @since 0.1.0
 * @category getters
 */
export const read: {
  (key: string): (self: LWWRegister) => STM.STM<Option.Option<string>>
  (self: LWWRegister, key: string): STM.STM<Option.Option<string>>
} = dual(2, (self: LWWRegister, key: string): STM.STM<Option.Option<string>> => self.read(key))

/**
 * Current value and timestamp for a key.
 *
 * @since 0.1.0
 * @category getters
 */
export const entry: {
  (key: string): (self: LWWRegister) => STM.STM<Option.Option<RegisterEntry>>
  (self: LWWRegister, key: string): STM.STM<Option.Option<RegisterEntry>>
} = dual(
  2,
  (self: LWWRegister, key: string): STM.STM<Option.Option<RegisterEntry>> => TMap.get(self.entries, key)
)

/**
 * Snapshot of every entry in the register.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = (self: LWWRegister): STM.STM<ReadonlyMap<string, RegisterEntry>> =>
  TMap.toMap(self.entries)
