/**
 * Example: two replicas converging over an in-memory broadcast hub.
 *
 * Each replica applies its own mutations locally, publishes them, and merges
 * what the other one publishes.
 *
 * @since 0.1.0
 */

import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Schedule from "effect/Schedule"
import * as Cipher from "../src/Cipher.js"
import * as Identity from "../src/Identity.js"
import * as ManagerConfig from "../src/ManagerConfig.js"
import * as ReplicaManager from "../src/ReplicaManager.js"
import * as Transport from "../src/Transport.js"

const makeReplica = (hub: Transport.MemoryHub, publicKey: string) =>
  ReplicaManager.ReplicaManager.pipe(
    Effect.provide(
      ReplicaManager.layer.pipe(
        Layer.provide(
          Layer.mergeAll(
            Transport.layerMemory(hub, publicKey),
            Cipher.layerPlaintext,
            Identity.layer(publicKey),
            ManagerConfig.layer()
          )
        )
      )
    ),
    Effect.tap((manager) => manager.listen)
  )

const settle = <A>(read: Effect.Effect<A>, settled: (a: A) => boolean) =>
  read.pipe(
    Effect.filterOrFail(settled, () => "pending"),
    Effect.retry(Schedule.spaced("10 millis"))
  )

const program = Effect.gen(function* () {
  const hub = yield* Transport.makeMemoryHub
  const laptop = yield* makeReplica(hub, "laptop")
  const phone = yield* makeReplica(hub, "phone")

  yield* laptop.incrementCounter("visitors", 3)
  yield* phone.incrementCounter("visitors", 2)
  yield* laptop.addToSet("tags", "crdt")
  yield* phone.addToSet("tags", "nostr")
  yield* phone.updateRegister("status", "online")

  // Each replica settles once it has merged the other's operations
  const visitors = yield* settle(phone.getCounterValue("visitors"), (total) => Option.contains(total, 5))
  const status = yield* settle(laptop.getRegisterValue("status"), Option.isSome)
  const tags = yield* laptop.getSetValue("tags")

  yield* Effect.log(`Phone sees ${Option.getOrElse(visitors, () => 0)} visitors`)
  yield* Effect.log(`Laptop sees status ${Option.getOrElse(status, () => "unknown")}`)
  yield* Effect.log(`Laptop sees tags ${Option.getOrElse(tags, (): ReadonlyArray<string> => []).join(", ")}`)
})

Effect.runFork(Effect.scoped(program))
