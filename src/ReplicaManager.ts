/**
 * Replica manager.
 *
 * Holds one LWW-Register, one G-Counter and one G-Set for the lifetime of a
 * session and connects them to the broadcast channel:
 *
 * - mutations apply locally first (read-your-writes), then encode, encrypt
 *   and publish with a bounded retry policy;
 * - inbound messages are filtered by kind and marker, decrypted, decoded and
 *   merged into the replicated type their variant selects.
 *
 * A mutation whose publish exhausts its attempts fails with `TransportError`
 * although its local apply has already happened. That local state is
 * provisional: peers have not seen it.
 *
 * Each replicated type's state lives in its own transactional map and every
 * apply is a single transaction on one of them. Publication happens outside
 * any transaction.
 *
 * @since 0.1.0
 */
import * as Context from "effect/Context"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import type * as Option from "effect/Option"
import type * as Scope from "effect/Scope"
import * as STM from "effect/STM"
import * as Stream from "effect/Stream"
import { Cipher } from "./Cipher.js"
import * as GCounter from "./GCounter.js"
import * as GSet from "./GSet.js"
import { Identity } from "./Identity.js"
import * as LWWRegister from "./LWWRegister.js"
import { ManagerConfig } from "./ManagerConfig.js"
import * as Operation from "./Operation.js"
import type { IngestionError, MutationError } from "./ReplicationError.js"
import { SerializationError, TransportError } from "./ReplicationError.js"
import * as RetryPolicy from "./RetryPolicy.js"
import type { MessageId, OutboundMessage, RawMessage, SubscriptionFilter } from "./Transport.js"
import { hasHashtag, Transport } from "./Transport.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Outcome of ingesting one inbound message.
 *
 * @since 0.1.0
 * @category models
 */
export type InboundResult = Data.TaggedEnum<{
  Applied: { readonly operation: Operation.Operation }
  Ignored: { readonly reason: string }
}>

/**
 * @since 0.1.0
 * @category constructors
 */
export const InboundResult = Data.taggedEnum<InboundResult>()

/**
 * @since 0.1.0
 * @category models
 */
export interface ReplicaManager {
  readonly registers: LWWRegister.LWWRegister
  readonly counters: GCounter.GCounter
  readonly sets: GSet.GSet

  /**
   * Subscription criteria matching the messages this manager publishes.
   */
  readonly filter: SubscriptionFilter

  /**
   * Set a register value, timestamped with the current wall-clock second.
   */
  readonly updateRegister: (key: string, value: string) => Effect.Effect<MessageId, MutationError>

  readonly incrementCounter: (key: string, amount: number) => Effect.Effect<MessageId, MutationError>

  readonly addToSet: (key: string, element: string) => Effect.Effect<MessageId, MutationError>

  /**
   * Ingest one message from the transport.
   *
   * Messages of another kind or without the marker are `Ignored`. Payloads
   * that fail to decrypt or decode fail with `SerializationError` and leave
   * state untouched.
   */
  readonly processInbound: (message: RawMessage) => Effect.Effect<InboundResult, IngestionError>

  /**
   * Subscribe to the transport and ingest every matching message in the
   * background until the scope closes. Returns once the subscription is open.
   * Ingestion errors are logged and the message dropped.
   */
  readonly listen: Effect.Effect<void, never, Scope.Scope>

  readonly getRegisterValue: (key: string) => Effect.Effect<Option.Option<string>>
  readonly getCounterValue: (key: string) => Effect.Effect<Option.Option<number>>
  readonly getSetValue: (key: string) => Effect.Effect<Option.Option<ReadonlyArray<string>>>
}

/**
 * @since 0.1.0
 * @category tags
 */
export const ReplicaManager: Context.Tag<ReplicaManager, ReplicaManager> = Context.GenericTag<ReplicaManager>(
  "broadcast-crdt/ReplicaManager"
)

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a manager from the session's transport, cipher, identity and
 * configuration.
 *
 * @example
 * ```ts
 * import * as ReplicaManager from "broadcast-crdt/ReplicaManager"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const manager = yield* ReplicaManager.ReplicaManager
 *   yield* manager.incrementCounter("visitors", 1)
 *   return yield* manager.getCounterValue("visitors")
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make: Effect.Effect<
  ReplicaManager,
  never,
  Transport | Cipher | Identity | ManagerConfig
> = Effect.gen(function* () {
  const transport = yield* Transport
  const cipher = yield* Cipher
  const identity = yield* Identity
  const config = yield* ManagerConfig

  const registers = yield* STM.commit(LWWRegister.make)
  const counters = yield* STM.commit(GCounter.make)
  const sets = yield* STM.commit(GSet.make)

  const filter: SubscriptionFilter = { kinds: [config.kind], hashtags: [config.marker] }

  const targetOf = (op: Operation.Operation) =>
    Operation.$match(op, {
      RegisterSet: () => registers,
      CounterIncrement: () => counters,
      SetAdd: () => sets
    })

  const publish = (op: Operation.Operation): Effect.Effect<MessageId, MutationError> =>
    Effect.gen(function* () {
      const recipient = yield* identity.publicKey
      const plaintext = yield* Operation.encode(op)
      const content = yield* cipher.encrypt(plaintext, recipient).pipe(
        Effect.mapError((cause) => new SerializationError({ message: `Cannot encrypt ${op._tag} operation`, cause }))
      )
      const message: OutboundMessage = {
        kind: config.kind,
        content,
        tags: [Operation.routingTag(op), ["t", config.marker]]
      }
      const id = yield* transport.publish(message).pipe(
        Effect.tapError((failure) => Effect.logWarning(`Publish attempt failed: ${failure.message}`)),
        RetryPolicy.retry(config.retry),
        Effect.mapError((cause) => {
          const attempts = RetryPolicy.retries(config.retry) + 1
          return new TransportError({
            message: `Failed to publish ${op._tag} operation after ${attempts} attempts`,
            attempts,
            cause
          })
        })
      )
      yield* Effect.logDebug("Published operation").pipe(Effect.annotateLogs("messageId", id))
      return id
    })

  const mutate = (op: Operation.Operation): Effect.Effect<MessageId, MutationError> =>
    STM.commit(targetOf(op).apply(op)).pipe(
      Effect.zipRight(publish(op)),
      Effect.annotateLogs({ operation: op._tag, key: op.key }),
      Effect.withLogSpan("mutation")
    )

  const processInbound = (message: RawMessage): Effect.Effect<InboundResult, IngestionError> =>
    Effect.gen(function* () {
      if (message.kind !== config.kind) {
        return InboundResult.Ignored({ reason: `Unexpected message kind ${message.kind}` })
      }
      if (!hasHashtag(message, config.marker)) {
        return InboundResult.Ignored({ reason: `Missing "${config.marker}" marker` })
      }
      const plaintext = cipher.isEncrypted(message.content)
        ? yield* cipher.decrypt(message.content, message.sender).pipe(
          Effect.mapError((cause) =>
            new SerializationError({ message: `Cannot decrypt message from ${message.sender}`, cause })
          )
        )
        : message.content
      const operation = yield* Operation.decode(plaintext)
      yield* STM.commit(targetOf(operation).apply(operation))
      yield* Effect.logDebug(`Applied inbound ${operation._tag} operation`).pipe(
        Effect.annotateLogs("key", operation.key)
      )
      return InboundResult.Applied({ operation })
    }).pipe(Effect.annotateLogs("messageId", message.id))

  const listen: Effect.Effect<void, never, Scope.Scope> = Effect.gen(function* () {
    const inbound = yield* transport.subscribe(filter)
    yield* inbound.pipe(
      Stream.runForEach((message) =>
        processInbound(message).pipe(
          Effect.catchAll((error) =>
            Effect.logWarning(`Dropped inbound message: ${error.message}`).pipe(
              Effect.annotateLogs({ messageId: message.id, error: error._tag })
            )
          )
        )
      ),
      Effect.forkScoped
    )
    yield* Effect.logDebug("Listening for replicated operations")
  })

  return ReplicaManager.of({
    registers,
    counters,
    sets,
    filter,
    updateRegister: (key, value) =>
      Operation.timestampNow.pipe(
        Effect.flatMap((timestamp) => mutate(Operation.RegisterSet({ key, value, timestamp })))
      ),
    incrementCounter: (key, amount) => mutate(Operation.CounterIncrement({ key, amount })),
    addToSet: (key, element) => mutate(Operation.SetAdd({ key, element })),
    processInbound,
    listen,
    getRegisterValue: (key) => STM.commit(registers.read(key)),
    getCounterValue: (key) => STM.commit(counters.read(key)),
    getSetValue: (key) => STM.commit(sets.read(key))
  })
})

// =============================================================================
// Layers
// =============================================================================

/**
 * @since 0.1.0
 * @category layers
 */
export const layer: Layer.Layer<ReplicaManager, never, Transport | Cipher | Identity | ManagerConfig> = Layer.effect(
  ReplicaManager,
  make
)
