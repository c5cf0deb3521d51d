/**
 * Property-based tests for the convergence laws of the replicated types.
 *
 * Two replicas that merge the same operations in any order end in the same
 * state. G-Set and LWW-Register (with distinct timestamps) additionally
 * tolerate redelivery.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Effect from "effect/Effect"
import * as FastCheck from "effect/FastCheck"
import * as STM from "effect/STM"
import * as GCounter from "../../src/GCounter.js"
import * as GSet from "../../src/GSet.js"
import * as LWWRegister from "../../src/LWWRegister.js"
import * as Operation from "../../src/Operation.js"
import type { ReplicatedType } from "../../src/ReplicatedType.js"

const applyAll = <Read>(target: ReplicatedType<Read>, ops: ReadonlyArray<Operation.Operation>) =>
  STM.commit(STM.forEach(ops, (op) => target.apply(op), { discard: true }))

const key = FastCheck.constantFrom("alpha", "beta", "gamma")

/**
 * Operations paired with a random reordering of themselves.
 */
const withPermutation = <A>(ops: FastCheck.Arbitrary<ReadonlyArray<A>>) =>
  ops.chain((original) =>
    FastCheck.shuffledSubarray([...original], { minLength: original.length, maxLength: original.length }).map(
      (permuted) => ({ original, permuted })
    )
  )

const increments = FastCheck.array(
  FastCheck.record({ key, amount: FastCheck.nat({ max: 1000 }) }).map(Operation.CounterIncrement),
  { maxLength: 20 }
)

const adds = FastCheck.array(
  FastCheck.record({ key, element: FastCheck.string({ minLength: 1, maxLength: 4 }) }).map(Operation.SetAdd),
  { maxLength: 20 }
)

const writes = FastCheck.uniqueArray(
  FastCheck.record({ key, value: FastCheck.string(), timestamp: FastCheck.nat({ max: 1_000_000 }) }),
  { maxLength: 20, selector: (write) => `${write.key}:${write.timestamp}` }
).map((records) => records.map(Operation.RegisterSet))

const sortedMembers = (members: ReadonlyMap<string, ReadonlyArray<string>>) =>
  new Map([...members].map(([k, listed]) => [k, [...listed].sort()]))

describe("Replicated type laws", () => {
  describe("G-Counter", () => {
    it("converges under any delivery order", async () =>
      FastCheck.assert(
        FastCheck.asyncProperty(withPermutation(increments), async ({ original, permuted }) => {
          const [first, second] = await Effect.runPromise(
            Effect.gen(function* () {
              const a = yield* GCounter.make
              const b = yield* GCounter.make
              yield* applyAll(a, original)
              yield* applyAll(b, permuted)
              return [yield* GCounter.query(a), yield* GCounter.query(b)] as const
            })
          )
          expect(first).toEqual(second)
        }),
        { numRuns: 50 }
      ))

    it("totals the sum of every increment per key", async () =>
      FastCheck.assert(
        FastCheck.asyncProperty(increments, async (ops) => {
          const totals = await Effect.runPromise(
            Effect.gen(function* () {
              const counter = yield* GCounter.make
              yield* applyAll(counter, ops)
              return yield* GCounter.query(counter)
            })
          )
          const expected = new Map<string, number>()
          for (const op of ops) {
            expected.set(op.key, (expected.get(op.key) ?? 0) + op.amount)
          }
          expect(totals).toEqual(expected)
        }),
        { numRuns: 50 }
      ))
  })

  describe("G-Set", () => {
    it("converges under any delivery order", async () =>
      FastCheck.assert(
        FastCheck.asyncProperty(withPermutation(adds), async ({ original, permuted }) => {
          const [first, second] = await Effect.runPromise(
            Effect.gen(function* () {
              const a = yield* GSet.make
              const b = yield* GSet.make
              yield* applyAll(a, original)
              yield* applyAll(b, permuted)
              return [yield* GSet.query(a), yield* GSet.query(b)] as const
            })
          )
          expect(sortedMembers(first)).toEqual(sortedMembers(second))
        }),
        { numRuns: 50 }
      ))

    it("ignores redelivery", async () =>
      FastCheck.assert(
        FastCheck.asyncProperty(adds, async (ops) => {
          const [once, twice] = await Effect.runPromise(
            Effect.gen(function* () {
              const a = yield* GSet.make
              const b = yield* GSet.make
              yield* applyAll(a, ops)
              yield* applyAll(b, [...ops, ...ops])
              return [yield* GSet.query(a), yield* GSet.query(b)] as const
            })
          )
          expect(twice).toEqual(once)
        }),
        { numRuns: 50 }
      ))
  })

  describe("LWW-Register", () => {
    it("converges under any delivery order when timestamps are distinct", async () =>
      FastCheck.assert(
        FastCheck.asyncProperty(withPermutation(writes), async ({ original, permuted }) => {
          const [first, second] = await Effect.runPromise(
            Effect.gen(function* () {
              const a = yield* LWWRegister.make
              const b = yield* LWWRegister.make
              yield* applyAll(a, original)
              yield* applyAll(b, permuted)
              return [yield* LWWRegister.query(a), yield* LWWRegister.query(b)] as const
            })
          )
          expect(first).toEqual(second)
        }),
        { numRuns: 50 }
      ))

    it("keeps the highest timestamp per key and ignores redelivery", async () =>
      FastCheck.assert(
        FastCheck.asyncProperty(writes, async (ops) => {
          const entries = await Effect.runPromise(
            Effect.gen(function* () {
              const register = yield* LWWRegister.make
              yield* applyAll(register, [...ops, ...ops])
              return yield* LWWRegister.query(register)
            })
          )
          for (const [k, entry] of entries) {
            const latest = Math.max(...ops.filter((op) => op.key === k).map((op) => op.timestamp))
            expect(entry.timestamp).toBe(latest)
          }
          expect(entries.size).toBe(new Set(ops.map((op) => op.key)).size)
        }),
        { numRuns: 50 }
      ))
  })
})
