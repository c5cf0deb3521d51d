/**
 * Replicated operations and their wire format.
 *
 * An operation is an immutable description of one state mutation. It is the
 * unit of replication: peers exchange operations, never state.
 *
 * The JSON shape produced by {@link encode} is externally tagged by variant
 * name and shared with existing peers, so its field names and discriminants
 * must not change:
 *
 * ```json
 * {"LWWRegister":{"key":"k","value":"v","timestamp":1700000000}}
 * {"GCounter":{"key":"k","increment":3}}
 * {"GSet":{"key":"k","value":"e","action":"Add"}}
 * ```
 *
 * @since 0.1.0
 */
import * as Clock from "effect/Clock"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import * as Schema from "effect/Schema"
import { SerializationError } from "./ReplicationError.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Closed set of operation variants.
 *
 * - `RegisterSet` targets the LWW-Register; `timestamp` is in wall-clock seconds
 * - `CounterIncrement` targets the G-Counter; `amount` is a non-negative integer
 * - `SetAdd` targets the G-Set
 *
 * @since 0.1.0
 * @category models
 */
export type Operation = Data.TaggedEnum<{
  RegisterSet: {
    readonly key: string
    readonly value: string
    readonly timestamp: number
  }
  CounterIncrement: {
    readonly key: string
    readonly amount: number
  }
  SetAdd: {
    readonly key: string
    readonly element: string
  }
}>

/**
 * @since 0.1.0
 * @category models
 */
export type RegisterSet = Data.TaggedEnum.Value<Operation, "RegisterSet">

/**
 * @since 0.1.0
 * @category models
 */
export type CounterIncrement = Data.TaggedEnum.Value<Operation, "CounterIncrement">

/**
 * @since 0.1.0
 * @category models
 */
export type SetAdd = Data.TaggedEnum.Value<Operation, "SetAdd">

/**
 * Variant names, as found in `Operation["_tag"]`.
 *
 * @since 0.1.0
 * @category models
 */
export type OperationTag = Operation["_tag"]

// =============================================================================
// Constructors
// =============================================================================

/**
 * Constructors, guards and the exhaustive matcher for {@link Operation}.
 *
 * @example
 * ```ts
 * import * as Operation from "broadcast-crdt/Operation"
 *
 * const op = Operation.CounterIncrement({ key: "visitors", amount: 1 })
 * Operation.$is("CounterIncrement")(op) // true
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const { $is, $match, CounterIncrement, RegisterSet, SetAdd } = Data.taggedEnum<Operation>()

/**
 * Current wall-clock time in whole seconds, read from Effect's `Clock`.
 *
 * Register writes issued within the same second share a timestamp, so the
 * later one loses locally and remotely.
 *
 * @since 0.1.0
 * @category constructors
 */
export const timestampNow: Effect.Effect<number> = Effect.map(
  Clock.currentTimeMillis,
  (millis) => Math.floor(millis / 1000)
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Routing tag attached to an outbound message carrying the operation.
 *
 * @since 0.1.0
 * @category getters
 */
export const routingTag = (op: Operation): ReadonlyArray<string> =>
  [
    "c",
    "crdt",
    $match(op, {
      RegisterSet: () => "lww",
      CounterIncrement: () => "gcounter",
      SetAdd: () => "gset"
    })
  ]

// =============================================================================
// Schemas
// =============================================================================

/**
 * Wire schema of an operation, before JSON text encoding.
 *
 * An object carries exactly one variant key. Unknown fields inside the
 * variant payload are ignored.
 *
 * @since 0.1.0
 * @category schemas
 */
export const OperationWire = Schema.Union(
  Schema.Struct({
    LWWRegister: Schema.Struct({
      key: Schema.String,
      value: Schema.String,
      timestamp: Schema.NonNegativeInt
    }).annotations({ parseOptions: { onExcessProperty: "ignore" } })
  }).annotations({ parseOptions: { onExcessProperty: "error" } }),
  Schema.Struct({
    GCounter: Schema.Struct({
      key: Schema.String,
      increment: Schema.NonNegativeInt
    }).annotations({ parseOptions: { onExcessProperty: "ignore" } })
  }).annotations({ parseOptions: { onExcessProperty: "error" } }),
  Schema.Struct({
    GSet: Schema.Struct({
      key: Schema.String,
      value: Schema.String,
      action: Schema.Literal("Add")
    }).annotations({ parseOptions: { onExcessProperty: "ignore" } })
  }).annotations({ parseOptions: { onExcessProperty: "error" } })
).pipe(
  Schema.annotations({
    identifier: "OperationWire",
    title: "Operation",
    description: "Externally tagged replicated operation"
  })
)

/**
 * @since 0.1.0
 * @category models
 */
export type OperationWire = Schema.Schema.Type<typeof OperationWire>

const OperationJson = Schema.parseJson(OperationWire)

const toWire = (op: Operation): OperationWire =>
  $match(op, {
    RegisterSet: ({ key, timestamp, value }) => ({ LWWRegister: { key, value, timestamp } }),
    CounterIncrement: ({ amount, key }) => ({ GCounter: { key, increment: amount } }),
    SetAdd: ({ element, key }) => ({ GSet: { key, value: element, action: "Add" as const } })
  })

const fromWire = (wire: OperationWire): Operation => {
  if ("LWWRegister" in wire) {
    return RegisterSet(wire.LWWRegister)
  }
  if ("GCounter" in wire) {
    return CounterIncrement({ key: wire.GCounter.key, amount: wire.GCounter.increment })
  }
  return SetAdd({ key: wire.GSet.key, element: wire.GSet.value })
}

// =============================================================================
// Codec
// =============================================================================

/**
 * Encode an operation to its JSON wire text.
 *
 * @since 0.1.0
 * @category codec
 */
export const encode = (op: Operation): Effect.Effect<string, SerializationError> =>
  Schema.encode(OperationJson)(toWire(op)).pipe(
    Effect.mapError((cause) =>
      new SerializationError({ message: `Cannot encode ${op._tag} operation: ${cause.message}`, cause })
    )
  )

/**
 * Decode JSON wire text into an operation.
 *
 * @since 0.1.0
 * @category codec
 */
export const decode = (text: string): Effect.Effect<Operation, SerializationError> =>
  Schema.decodeUnknown(OperationJson)(text).pipe(
    Effect.map(fromWire),
    Effect.mapError((cause) =>
      new SerializationError({ message: `Malformed operation payload: ${cause.message}`, cause })
    )
  )
