/**
 * Core replicated type interface.
 *
 * A replicated type owns a key → state mapping and merges operations into
 * it. All three implementations (LWW-Register, G-Counter, G-Set) share this
 * shape, which lets the manager dispatch an inbound operation without knowing
 * which concrete type it lands in.
 *
 * @since 0.1.0
 */
import type * as Option from "effect/Option"
import type { Pipeable } from "effect/Pipeable"
import * as Predicate from "effect/Predicate"
import type * as STM from "effect/STM"
import type { Operation, OperationTag } from "./Operation.js"
import type { InvalidOperation } from "./ReplicationError.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * Replicated type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const ReplicatedTypeId: unique symbol = Symbol.for("broadcast-crdt/ReplicatedType")

/**
 * @since 0.1.0
 * @category symbols
 */
export type ReplicatedTypeId = typeof ReplicatedTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * Capability shared by every replicated type.
 *
 * `apply` runs as one transaction on the type's own state: it either merges
 * the operation completely or fails with `InvalidOperation` without touching
 * state.
 *
 * @since 0.1.0
 * @category models
 */
export interface ReplicatedType<Read> extends Pipeable {
  readonly [ReplicatedTypeId]: ReplicatedTypeId

  /**
   * The operation variant this type accepts.
   */
  readonly accepts: OperationTag

  readonly apply: (op: Operation) => STM.STM<void, InvalidOperation>

  readonly read: (key: string) => STM.STM<Option.Option<Read>>

  readonly keys: STM.STM<ReadonlyArray<string>>
}

// =============================================================================
// Guards
// =============================================================================

/**
 * @since 0.1.0
 * @category guards
 */
export const isReplicatedType = (u: unknown): u is ReplicatedType<unknown> =>
  Predicate.hasProperty(u, ReplicatedTypeId)
