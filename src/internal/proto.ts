/**
 * Shared Proto object utilities for replicated types.
 *
 * @since 0.1.0
 * @internal
 */

import { format, NodeInspectSymbol } from "effect/Inspectable"
import { pipeArguments } from "effect/Pipeable"
import { ReplicatedTypeId } from "../ReplicatedType.js"

/**
 * Creates the common Proto object of a replicated type.
 *
 * Carries the shared `ReplicatedTypeId` plus the type's own identifier, and
 * consistent `NodeInspectSymbol`, `toString` and `pipe` implementations.
 *
 * @internal
 */
export const makeProtoBase = (typeId: symbol) => ({
  [ReplicatedTypeId]: ReplicatedTypeId,
  [typeId]: typeId,
  [NodeInspectSymbol](this: object) {
    return format(this)
  },
  toString(this: object) {
    return format(this)
  },
  pipe() {
    return pipeArguments(this, arguments)
  }
})
