/**
 * Replica manager configuration.
 *
 * Loaded from the environment through `effect/Config`, or built explicitly
 * with {@link layer}.
 *
 * | Variable                    | Default      |
 * |-----------------------------|--------------|
 * | `CRDT_EVENT_KIND`           | `1`          |
 * | `CRDT_MARKER`               | `nostr-crdt` |
 * | `CRDT_PUBLISH_MAX_ATTEMPTS` | `3`          |
 * | `CRDT_PUBLISH_RETRY_DELAY`  | `1 second`   |
 *
 * @since 0.1.0
 */
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Duration from "effect/Duration"
import * as Layer from "effect/Layer"
import * as RetryPolicy from "./RetryPolicy.js"

/**
 * @since 0.1.0
 * @category models
 */
export interface ManagerConfig {
  /**
   * Message kind carrying replicated operations.
   */
  readonly kind: number
  /**
   * Hashtag every outbound message carries, so receivers can filter the
   * broadcast stream before decrypting or decoding.
   */
  readonly marker: string
  readonly retry: RetryPolicy.RetryPolicy
}

/**
 * @since 0.1.0
 * @category tags
 */
export const ManagerConfig: Context.Tag<ManagerConfig, ManagerConfig> = Context.GenericTag<ManagerConfig>(
  "broadcast-crdt/ManagerConfig"
)

/**
 * @since 0.1.0
 * @category constants
 */
export const defaults: ManagerConfig = {
  kind: 1,
  marker: "nostr-crdt",
  retry: RetryPolicy.defaultPolicy
}

/**
 * @since 0.1.0
 * @category config
 */
export const config: Config.Config<ManagerConfig> = Config.all({
  kind: Config.integer("CRDT_EVENT_KIND").pipe(
    Config.validate({ message: "Expected a non-negative event kind", validation: (kind) => kind >= 0 }),
    Config.withDefault(defaults.kind)
  ),
  marker: Config.string("CRDT_MARKER").pipe(
    Config.validate({ message: "Expected a non-empty marker", validation: (marker) => marker.length > 0 }),
    Config.withDefault(defaults.marker)
  ),
  maxAttempts: Config.integer("CRDT_PUBLISH_MAX_ATTEMPTS").pipe(
    Config.validate({ message: "Expected at least one publish attempt", validation: (attempts) => attempts >= 1 }),
    Config.withDefault(defaults.retry.maxAttempts)
  ),
  retryDelay: Config.duration("CRDT_PUBLISH_RETRY_DELAY").pipe(
    Config.withDefault(defaults.retry.delay)
  )
}).pipe(
  Config.map(({ kind, marker, maxAttempts, retryDelay }) => ({
    kind,
    marker,
    retry: RetryPolicy.make({ maxAttempts, delay: retryDelay })
  }))
)

/**
 * @since 0.1.0
 * @category layers
 */
export const layer = (options: Partial<ManagerConfig> = {}): Layer.Layer<ManagerConfig> =>
  Layer.succeed(ManagerConfig, { ...defaults, ...options })

/**
 * @since 0.1.0
 * @category layers
 */
export const layerFromEnv: Layer.Layer<ManagerConfig, ConfigError.ConfigError> = Layer.effect(
  ManagerConfig,
  config
)

/**
 * Shorthand for a retry policy in {@link layer} options.
 *
 * @since 0.1.0
 * @category constructors
 */
export const retry = (maxAttempts: number, delay: Duration.DurationInput): RetryPolicy.RetryPolicy =>
  RetryPolicy.make({ maxAttempts, delay })
