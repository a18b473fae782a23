/**
 * Eager decoding of a finished buffer into a plain value tree.
 *
 * @module
 */
import * as Effect from "effect/Effect"
import { attempt } from "../core/attempt.ts"
import { type DecodeError, isDecodeError } from "../core/errors.ts"
import { activeSlots } from "../descriptor/descriptor.ts"
import * as Registry from "../descriptor/registry.ts"
import type { TableDescriptor } from "../descriptor/types.ts"
import { Table, type VectorElement } from "../table/table.ts"
import type { ElementValue, FieldValue, TableValue } from "./values.ts"

export interface DeserializeOptions {
  readonly registry?: Registry.TypeRegistry
  readonly sizePrefixed?: boolean
}

const elementValue = (element: VectorElement): ElementValue => element instanceof Table ? toValue(element) : element

/**
 * Reads every non-deprecated field of `table`. Scalars always have a value;
 * absent strings, tables, structs, vectors and unions are `null`. Union
 * discriminant slots are folded into their union's `{ type, value }`.
 */
export const toValue = (table: Table): TableValue => {
  const value: Record<string, FieldValue> = {}
  for (const slot of activeSlots(table.descriptor)) {
    switch (slot.type._tag) {
      case "UnionTag":
        break
      case "Scalar":
        value[slot.name] = table.get(slot.index)
        break
      case "String":
        value[slot.name] = table.string(slot.index)
        break
      case "Struct":
        value[slot.name] = table.struct(slot.index)
        break
      case "Table": {
        const child = table.table(slot.index)
        value[slot.name] = child === null ? null : toValue(child)
        break
      }
      case "Vector": {
        const vector = table.vector(slot.index)
        value[slot.name] = vector === null ? null : Array.from(vector, elementValue)
        break
      }
      case "Union": {
        const union = table.union(slot.index)
        value[slot.name] = union === null ? null : { type: union.member.name, value: toValue(union.table) }
        break
      }
    }
  }
  return value
}

/**
 * Decodes the root table of `bytes`. Throws decode errors synchronously.
 */
export const decode = (
  bytes: Uint8Array,
  descriptor: TableDescriptor,
  options: DeserializeOptions = {}
): TableValue => {
  const registry = options.registry ?? Registry.empty
  const root = options.sizePrefixed === true
    ? Table.sizePrefixedRoot(bytes, descriptor, registry)
    : Table.root(bytes, descriptor, registry)
  return toValue(root)
}

/**
 * Deserializes a finished buffer against its root table descriptor.
 */
export const deserialize: (
  bytes: Uint8Array,
  descriptor: TableDescriptor,
  options?: DeserializeOptions
) => Effect.Effect<TableValue, DecodeError> = Effect.fn("FlatBuffers.deserialize")(
  function*(bytes: Uint8Array, descriptor: TableDescriptor, options: DeserializeOptions = {}) {
    const value = yield* attempt(() => decode(bytes, descriptor, options), isDecodeError)
    yield* Effect.logDebug(`Deserialized ${descriptor.name}`).pipe(
      Effect.annotateLogs({ type: descriptor.name, bytes: bytes.byteLength })
    )
    return value
  }
)
