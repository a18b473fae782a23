/**
 * The plain value trees accepted by `serialize` and produced by
 * `deserialize`.
 *
 * @module
 */
import * as Predicate from "effect/Predicate"
import type { Builder } from "../builder/builder.ts"
import type { AnyScalarValue } from "../core/scalars.ts"
import type { TableOffset } from "../core/types.ts"
import type { StructValue } from "../descriptor/struct.ts"

/**
 * A value that writes itself into a builder, in place of the generic
 * descriptor-driven walk. `pack` must leave the builder idle and return the
 * offset of the finished table.
 */
export interface Serializable {
  readonly pack: (builder: Builder) => TableOffset
}

/**
 * The selected member of a union field, by member name.
 */
export interface UnionValue {
  readonly type: string
  readonly value: TableValue | Serializable
}

export type ElementValue = AnyScalarValue | string | StructValue | TableValue | Serializable

export type FieldValue =
  | AnyScalarValue
  | string
  | Uint8Array
  | StructValue
  | TableValue
  | UnionValue
  | Serializable
  | ReadonlyArray<ElementValue>
  | null
  | undefined

/**
 * A table as a plain object keyed by field name. Missing keys, `undefined`
 * and `null` all mean the field is absent.
 */
export interface TableValue {
  readonly [field: string]: FieldValue
}

export const isSerializable = (u: unknown): u is Serializable =>
  Predicate.hasProperty(u, "pack") && Predicate.isFunction(u.pack)

export const isScalarValue = (u: unknown): u is AnyScalarValue =>
  Predicate.isBoolean(u) || Predicate.isNumber(u) || Predicate.isBigInt(u)
