/**
 * Unit tests for the publish retry policy.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Fiber from "effect/Fiber"
import * as Option from "effect/Option"
import * as Ref from "effect/Ref"
import * as TestClock from "effect/TestClock"
import * as TestContext from "effect/TestContext"
import * as RetryPolicy from "./RetryPolicy.js"

const failingAttempt = (attempts: Ref.Ref<number>) =>
  Ref.updateAndGet(attempts, (n) => n + 1).pipe(Effect.flatMap((n) => Effect.fail(`attempt ${n} failed`)))

describe("RetryPolicy", () => {
  it("should default to three attempts one second apart", () => {
    expect(RetryPolicy.defaultPolicy.maxAttempts).toBe(3)
    expect(Duration.toMillis(RetryPolicy.defaultPolicy.delay)).toBe(1000)
  })

  it.each([
    [3, 2],
    [1, 0],
    [0, 0],
    [2.7, 1]
  ])("should allow %s attempts as %s retries", (maxAttempts, expected) => {
    expect(RetryPolicy.retries(RetryPolicy.make({ maxAttempts, delay: 0 }))).toBe(expected)
  })

  it("should stop after the last attempt and return its failure", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const attempts = yield* Ref.make(0)
        const outcome = yield* failingAttempt(attempts).pipe(
          RetryPolicy.retry(RetryPolicy.make({ maxAttempts: 3, delay: 0 })),
          Effect.either
        )
        return { outcome, attempts: yield* Ref.get(attempts) }
      })
    )
    expect(result.attempts).toBe(3)
    expect(result.outcome).toEqual(Either.left("attempt 3 failed"))
  })

  it("should stop retrying once an attempt succeeds", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const attempts = yield* Ref.make(0)
        const attempt = Ref.updateAndGet(attempts, (n) => n + 1).pipe(
          Effect.flatMap((n) => n < 2 ? Effect.fail("not yet") : Effect.succeed(n))
        )
        const value = yield* RetryPolicy.retry(attempt, RetryPolicy.make({ maxAttempts: 5, delay: 0 }))
        return { value, attempts: yield* Ref.get(attempts) }
      })
    )
    expect(result).toEqual({ value: 2, attempts: 2 })
  })

  it("should wait the configured delay between attempts", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const attempts = yield* Ref.make(0)
        const fiber = yield* failingAttempt(attempts).pipe(
          RetryPolicy.retry(RetryPolicy.make({ maxAttempts: 3, delay: "1 second" })),
          Effect.either,
          Effect.fork
        )
        yield* TestClock.adjust("1500 millis")
        const early = yield* Fiber.poll(fiber)
        yield* TestClock.adjust("500 millis")
        const outcome = yield* Fiber.join(fiber)
        return { early, outcome, attempts: yield* Ref.get(attempts) }
      }).pipe(Effect.provide(TestContext.TestContext))
    )
    expect(Option.isNone(result.early)).toBe(true)
    expect(result.outcome).toEqual(Either.left("attempt 3 failed"))
    expect(result.attempts).toBe(3)
  })
})
