/**
 * Bounded publish retry policy.
 *
 * A fixed number of attempts separated by a fixed delay. Delays are measured
 * with Effect's `Clock`, so `TestClock` drives them in tests.
 *
 * @since 0.1.0
 */
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import { dual } from "effect/Function"
import * as Schedule from "effect/Schedule"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface RetryPolicy {
  /**
   * Total attempts, the first one included. Values below 1 behave as 1.
   */
  readonly maxAttempts: number
  readonly delay: Duration.Duration
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * @since 0.1.0
 * @category constructors
 */
export const make = (options: {
  readonly maxAttempts: number
  readonly delay: Duration.DurationInput
}): RetryPolicy => ({
  maxAttempts: options.maxAttempts,
  delay: Duration.decode(options.delay)
})

/**
 * Three attempts, one second apart.
 *
 * @since 0.1.0
 * @category constructors
 */
export const defaultPolicy: RetryPolicy = make({ maxAttempts: 3, delay: Duration.seconds(1) })

// =============================================================================
// Combinators
// =============================================================================

/**
 * Number of retries the policy allows after the first attempt.
 *
 * @since 0.1.0
 * @category getters
 */
export const retries = (policy: RetryPolicy): number =>
  Math.max(0, Math.floor(policy.maxAttempts) - 1)

/**
 * The policy as a `Schedule`: `retries(policy)` recurrences, each one
 * `policy.delay` after the previous failure.
 *
 * @since 0.1.0
 * @category combinators
 */
export const schedule = (policy: RetryPolicy): Schedule.Schedule<[number, number]> =>
  Schedule.intersect(Schedule.spaced(policy.delay), Schedule.recurs(retries(policy)))

/**
 * Retry an effect under the policy. The last failure is returned once the
 * attempts are exhausted.
 *
 * @example
 * ```ts
 * import * as RetryPolicy from "broadcast-crdt/RetryPolicy"
 * import * as Effect from "effect/Effect"
 *
 * const publish = Effect.fail("relay unreachable")
 * const program = RetryPolicy.retry(publish, RetryPolicy.make({ maxAttempts: 3, delay: "1 second" }))
 * ```
 *
 * @since 0.1.0
 * @category combinators
 */
export const retry: {
  (policy: RetryPolicy): <A, E, R>(self: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>
  <A, E, R>(self: Effect.Effect<A, E, R>, policy: RetryPolicy): Effect.Effect<A, E, R>
} = dual(
  2,
  <A, E, R>(self: Effect.Effect<A, E, R>, policy: RetryPolicy): Effect.Effect<A, E, R> =>
    Effect.retry(self, schedule(policy))
)
