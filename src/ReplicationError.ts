/**
 * Error taxonomy of the replication engine.
 *
 * Mutation calls surface these in their error channel. The ingestion path
 * absorbs them at its boundary (see `ReplicaManager.listen`).
 *
 * @since 0.1.0
 */
import * as Data from "effect/Data"

// =============================================================================
// Errors
// =============================================================================

/**
 * An operation was handed to a replicated type that cannot apply it, either
 * because its variant belongs to another type or because its payload is
 * malformed. Never retried.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidOperation extends Data.TaggedError("InvalidOperation")<{
  readonly message: string
}> { }

/**
 * A payload could not be encoded, encrypted, decrypted or decoded.
 *
 * Inbound messages failing with this error are dropped and never retried.
 *
 * @since 0.1.0
 * @category errors
 */
export class SerializationError extends Data.TaggedError("SerializationError")<{
  readonly message: string
  readonly cause?: unknown
}> { }

/**
 * Publication failed on every attempt of the retry budget.
 *
 * Local state was already mutated when this error is raised; callers treat it
 * as provisional until a later publish succeeds.
 *
 * @since 0.1.0
 * @category errors
 */
export class TransportError extends Data.TaggedError("TransportError")<{
  readonly message: string
  readonly attempts: number
  readonly cause?: unknown
}> { }

/**
 * Identity or signing material is unavailable for this session.
 *
 * @since 0.1.0
 * @category errors
 */
export class KeysNotAvailable extends Data.TaggedError("KeysNotAvailable")<{
  readonly message: string
}> { }

// =============================================================================
// Models
// =============================================================================

/**
 * Every error a mutation call can fail with.
 *
 * @since 0.1.0
 * @category models
 */
export type MutationError =
  | InvalidOperation
  | SerializationError
  | TransportError
  | KeysNotAvailable

/**
 * Every error the ingestion of a single inbound message can fail with.
 *
 * @since 0.1.0
 * @category models
 */
export type IngestionError = InvalidOperation | SerializationError
