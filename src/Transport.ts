/**
 * Broadcast transport boundary.
 *
 * The transport delivers opaque payloads to every subscribed peer with
 * at-least-once semantics: messages may arrive in any order, more than once,
 * or late. Connection management and socket-level retries live behind this
 * interface; the manager only owns the publish retry policy.
 *
 * @since 0.1.0
 */
import * as Context from "effect/Context"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as PubSub from "effect/PubSub"
import * as Ref from "effect/Ref"
import type * as Scope from "effect/Scope"
import * as Stream from "effect/Stream"

// =============================================================================
// Models
// =============================================================================

/**
 * Identifier a transport assigns to a published message.
 *
 * @since 0.1.0
 * @category models
 */
export type MessageId = string

/**
 * List of tags, each one a name followed by its values, e.g. `["t", "crdt"]`.
 *
 * @since 0.1.0
 * @category models
 */
export type Tags = ReadonlyArray<ReadonlyArray<string>>

/**
 * A message as delivered by the transport.
 *
 * @since 0.1.0
 * @category models
 */
export interface RawMessage {
  readonly id: MessageId
  readonly kind: number
  /**
   * Public key of the author, used as the decryption counterpart.
   */
  readonly sender: string
  readonly content: string
  readonly tags: Tags
}

/**
 * A message handed to the transport for broadcast. The transport adds the id
 * and the sender.
 *
 * @since 0.1.0
 * @category models
 */
export interface OutboundMessage {
  readonly kind: number
  readonly content: string
  readonly tags: Tags
}

/**
 * Subscription criteria: a message matches when its kind is listed and it
 * carries at least one of the hashtags (any message of a listed kind when
 * `hashtags` is empty).
 *
 * @since 0.1.0
 * @category models
 */
export interface SubscriptionFilter {
  readonly kinds: ReadonlyArray<number>
  readonly hashtags: ReadonlyArray<string>
}

/**
 * A single publish attempt failed.
 *
 * @since 0.1.0
 * @category errors
 */
export class PublishFailure extends Data.TaggedError("PublishFailure")<{
  readonly message: string
  readonly cause?: unknown
}> { }

/**
 * @since 0.1.0
 * @category models
 */
export interface Transport {
  /**
   * One publish attempt. A multi-relay fan-out counts as one request.
   */
  readonly publish: (message: OutboundMessage) => Effect.Effect<MessageId, PublishFailure>

  /**
   * Opens a subscription for the lifetime of the scope. Messages published
   * after this effect completes are delivered on the returned stream.
   */
  readonly subscribe: (filter: SubscriptionFilter) => Effect.Effect<Stream.Stream<RawMessage>, never, Scope.Scope>
}

/**
 * @since 0.1.0
 * @category tags
 */
export const Transport: Context.Tag<Transport, Transport> = Context.GenericTag<Transport>(
  "broadcast-crdt/Transport"
)

// =============================================================================
// Filters
// =============================================================================

/**
 * Check whether a message carries `["t", hashtag]`.
 *
 * @since 0.1.0
 * @category filters
 */
export const hasHashtag = (message: { readonly tags: Tags }, hashtag: string): boolean =>
  message.tags.some((tag) => tag[0] === "t" && tag[1] === hashtag)

/**
 * @since 0.1.0
 * @category filters
 */
export const matches = (filter: SubscriptionFilter) => (message: RawMessage): boolean =>
  filter.kinds.includes(message.kind) &&
  (filter.hashtags.length === 0 || filter.hashtags.some((hashtag) => hasHashtag(message, hashtag)))

// =============================================================================
// In-memory hub
// =============================================================================

/**
 * In-process broadcast hub shared by several memory transports.
 *
 * @since 0.1.0
 * @category models
 */
export interface MemoryHub {
  readonly pubsub: PubSub.PubSub<Delivery>
  readonly sequence: Ref.Ref<number>
}

/**
 * A message on the hub, tagged with the endpoint that published it.
 *
 * @since 0.1.0
 * @category models
 */
export interface Delivery {
  readonly endpoint: number
  readonly message: RawMessage
}

/**
 * @since 0.1.0
 * @category constructors
 */
export const makeMemoryHub: Effect.Effect<MemoryHub> = Effect.gen(function* () {
  const pubsub = yield* PubSub.unbounded<Delivery>()
  const sequence = yield* Ref.make(0)
  return { pubsub, sequence }
})

/**
 * A transport endpoint on a memory hub, publishing as `sender`.
 *
 * Every subscription on the hub receives each message once, in publish order,
 * except the subscriptions of the publishing endpoint itself.
 *
 * @since 0.1.0
 * @category constructors
 */
export const makeMemory = (hub: MemoryHub, sender: string): Effect.Effect<Transport> =>
  Effect.gen(function* () {
    const endpoint = yield* Ref.updateAndGet(hub.sequence, (n) => n + 1)

    const publish = (message: OutboundMessage): Effect.Effect<MessageId, PublishFailure> =>
      Effect.gen(function* () {
        const n = yield* Ref.updateAndGet(hub.sequence, (current) => current + 1)
        const id = `${sender}-${n}`
        yield* PubSub.publish(hub.pubsub, { endpoint, message: { ...message, id, sender } })
        return id
      })

    const subscribe = (filter: SubscriptionFilter) =>
      PubSub.subscribe(hub.pubsub).pipe(
        Effect.map((queue) =>
          Stream.fromQueue(queue).pipe(
            Stream.filter((delivery) => delivery.endpoint !== endpoint),
            Stream.map((delivery) => delivery.message),
            Stream.filter(matches(filter))
          )
        )
      )

    return Transport.of({ publish, subscribe })
  })

/**
 * @since 0.1.0
 * @category layers
 */
export const layerMemory = (hub: MemoryHub, sender: string): Layer.Layer<Transport> =>
  Layer.effect(Transport, makeMemory(hub, sender))
