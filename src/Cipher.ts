/**
 * Payload confidentiality boundary.
 *
 * The manager encrypts every outbound operation for the session's own public
 * key and decrypts inbound payloads that the cipher recognizes as encrypted,
 * using the sender's key. The algorithm itself lives behind this interface.
 *
 * @since 0.1.0
 */
import * as Context from "effect/Context"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"

/**
 * @since 0.1.0
 * @category errors
 */
export class CipherError extends Data.TaggedError("CipherError")<{
  readonly message: string
  readonly cause?: unknown
}> { }

/**
 * @since 0.1.0
 * @category models
 */
export interface Cipher {
  /**
   * Whether inbound content is ciphertext this cipher should decrypt.
   */
  readonly isEncrypted: (content: string) => boolean
  readonly encrypt: (plaintext: string, recipientKey: string) => Effect.Effect<string, CipherError>
  readonly decrypt: (ciphertext: string, senderKey: string) => Effect.Effect<string, CipherError>
}

/**
 * @since 0.1.0
 * @category tags
 */
export const Cipher: Context.Tag<Cipher, Cipher> = Context.GenericTag<Cipher>("broadcast-crdt/Cipher")

/**
 * Separator between ciphertext and initialization vector in NIP-04 style
 * content (`<base64 ciphertext>?iv=<base64 iv>`).
 *
 * @since 0.1.0
 * @category constants
 */
export const IvSeparator = "?iv="

/**
 * @since 0.1.0
 * @category predicates
 */
export const hasIvSeparator = (content: string): boolean => content.includes(IvSeparator)

/**
 * Pass-through cipher for sessions that publish in the clear. Nothing it
 * receives is treated as encrypted.
 *
 * @since 0.1.0
 * @category constructors
 */
export const plaintext: Cipher = Cipher.of({
  isEncrypted: () => false,
  encrypt: (content) => Effect.succeed(content),
  decrypt: (content) => Effect.succeed(content)
})

/**
 * @since 0.1.0
 * @category layers
 */
export const layerPlaintext: Layer.Layer<Cipher> = Layer.succeed(Cipher, plaintext)
