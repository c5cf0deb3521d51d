/**
 * Session identity.
 *
 * Holds the public key the session encrypts its own operations for. Built
 * once per session and provided to the manager as a service.
 *
 * @since 0.1.0
 */
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import { KeysNotAvailable } from "./ReplicationError.js"

/**
 * @since 0.1.0
 * @category models
 */
export interface Identity {
  readonly publicKey: Effect.Effect<string, KeysNotAvailable>
}

/**
 * @since 0.1.0
 * @category tags
 */
export const Identity: Context.Tag<Identity, Identity> = Context.GenericTag<Identity>("broadcast-crdt/Identity")

/**
 * @since 0.1.0
 * @category constructors
 */
export const make = (publicKey: string): Identity => Identity.of({ publicKey: Effect.succeed(publicKey) })

/**
 * An identity whose keys are missing. Every publish fails with
 * `KeysNotAvailable`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const unavailable: Identity = Identity.of({
  publicKey: Effect.fail(new KeysNotAvailable({ message: "No public key is configured for this session" }))
})

/**
 * @since 0.1.0
 * @category layers
 */
export const layer = (publicKey: string): Layer.Layer<Identity> => Layer.succeed(Identity, make(publicKey))

/**
 * @since 0.1.0
 * @category layers
 */
export const layerUnavailable: Layer.Layer<Identity> = Layer.succeed(Identity, unavailable)

/**
 * Reads the public key from `CRDT_PUBLIC_KEY`. A missing variable yields an
 * unavailable identity rather than a configuration error.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerFromConfig: Layer.Layer<Identity, ConfigError.ConfigError> = Layer.effect(
  Identity,
  Config.option(Config.string("CRDT_PUBLIC_KEY")).pipe(
    Effect.map(Option.match({
      onNone: () => unavailable,
      onSome: make
    }))
  )
)
