/**
 * Descriptor-driven serialization of plain value trees.
 *
 * The walk is depth-first and child-before-parent: every string, vector and
 * sub-table of a table is finished before the table itself is started, which
 * is the only order the builder accepts.
 *
 * @module
 */
import * as Effect from "effect/Effect"
import * as Predicate from "effect/Predicate"
import { Builder, type BuilderOptions } from "../builder/builder.ts"
import { attempt } from "../core/attempt.ts"
import { InvalidValueError, isSerializeError, type SerializeError } from "../core/errors.ts"
import { type AnyScalarValue, checkScalar, type ScalarKind, zeroScalar } from "../core/scalars.ts"
import type { ReferenceOffset, StringOffset, TableOffset, VectorOffset } from "../core/types.ts"
import { activeSlots, slotByName } from "../descriptor/descriptor.ts"
import * as Registry from "../descriptor/registry.ts"
import type { StructValue } from "../descriptor/struct.ts"
import type { ElementType, StructDescriptor, TableDescriptor, UnionDescriptor } from "../descriptor/types.ts"
import * as Union from "../descriptor/union.ts"
import { isScalarValue, isSerializable, type Serializable, type TableValue } from "./values.ts"

export interface SerializeOptions extends BuilderOptions {
  /**
   * Resolves tables referenced by name. Defaults to an empty registry.
   */
  readonly registry?: Registry.TypeRegistry
  /**
   * Overrides the descriptor's file identifier.
   */
  readonly fileIdentifier?: string
  readonly sizePrefixed?: boolean
}

interface EncodeContext {
  readonly builder: Builder
  readonly registry: Registry.TypeRegistry
}

// =============================================================================
// Validation
// =============================================================================

const invalid = (typeName: string, field: string, reason: string) => new InvalidValueError({ typeName, field, reason })

/**
 * Reads an own property of a value record. Inherited members such as
 * `constructor` count as absent.
 */
const ownField = (value: { readonly [key: string]: unknown }, name: string): unknown =>
  Object.hasOwn(value, name) ? value[name] : undefined

const scalarValue = (typeName: string, field: string, kind: ScalarKind, value: unknown): AnyScalarValue => {
  const reason = checkScalar(kind, value)
  if (reason !== undefined || !isScalarValue(value)) {
    throw invalid(typeName, field, reason ?? "expected a scalar")
  }
  return value
}

/**
 * Validates a struct value, requiring every field.
 */
const structValue = (typeName: string, field: string, struct: StructDescriptor, value: unknown): StructValue => {
  if (!Predicate.isRecord(value)) {
    throw invalid(typeName, field, `expected a ${struct.name} struct`)
  }
  for (const key of Object.keys(value)) {
    if (!struct.fields.some((f) => f.name === key)) {
      throw invalid(struct.name, key, "unknown struct field")
    }
  }
  const result: Record<string, AnyScalarValue | StructValue> = {}
  for (const structField of struct.fields) {
    const fieldValue = ownField(value, structField.name)
    if (fieldValue === undefined || fieldValue === null) {
      throw invalid(struct.name, structField.name, "struct fields are required")
    }
    result[structField.name] = structField.type._tag === "Scalar"
      ? scalarValue(struct.name, structField.name, structField.type.kind, fieldValue)
      : structValue(struct.name, structField.name, structField.type.struct, fieldValue)
  }
  return result
}

// =============================================================================
// Walk
// =============================================================================

const encodeString = (ctx: EncodeContext, typeName: string, field: string, value: unknown): StringOffset => {
  if (Predicate.isString(value) || value instanceof Uint8Array) {
    return ctx.builder.createString(value)
  }
  throw invalid(typeName, field, "expected a string")
}

const encodeVector = (
  ctx: EncodeContext,
  typeName: string,
  field: string,
  element: ElementType,
  value: unknown
): VectorOffset => {
  if (value instanceof Uint8Array && element._tag === "Scalar" && element.kind === "uint8") {
    return ctx.builder.createByteVector(value)
  }
  if (!Array.isArray(value)) {
    throw invalid(typeName, field, "expected an array")
  }
  const items: ReadonlyArray<unknown> = value
  switch (element._tag) {
    case "Scalar": {
      const kind = element.kind
      return ctx.builder.createScalarVector(
        kind,
        items.map((item, i) => scalarValue(typeName, `${field}[${i}]`, kind, item))
      )
    }
    case "Struct": {
      const struct = element.struct
      return ctx.builder.createStructVector(
        struct,
        items.map((item, i) => structValue(typeName, `${field}[${i}]`, struct, item))
      )
    }
    case "String": {
      const offsets: Array<ReferenceOffset> = items.map((item, i) => encodeString(ctx, typeName, `${field}[${i}]`, item))
      return ctx.builder.createOffsetVector(offsets)
    }
    case "Table": {
      const descriptor = ctx.registry.resolve(element.type)
      const offsets: Array<ReferenceOffset> = items.map((item, i) =>
        encodeTable(ctx, descriptor, item, typeName, `${field}[${i}]`)
      )
      return ctx.builder.createOffsetVector(offsets)
    }
  }
}

const encodeUnion = (
  ctx: EncodeContext,
  typeName: string,
  field: string,
  union: UnionDescriptor,
  value: unknown
): readonly [tag: number, offset: TableOffset] => {
  if (!Predicate.hasProperty(value, "type") || !Predicate.isString(value.type)) {
    throw invalid(typeName, field, `expected a ${union.name} union value`)
  }
  const member = Union.memberByName(union, value.type)
  if (member === undefined) {
    throw invalid(typeName, field, `'${value.type}' is not a member of ${union.name}`)
  }
  const memberValue = Predicate.hasProperty(value, "value") ? value.value : undefined
  return [member.tag, encodeTable(ctx, ctx.registry.resolve(member.type), memberValue, typeName, field)]
}

const encodeTable = (
  ctx: EncodeContext,
  descriptor: TableDescriptor,
  value: unknown,
  ownerName: string,
  ownerField: string
): TableOffset => {
  if (isSerializable(value)) {
    return value.pack(ctx.builder)
  }
  if (!Predicate.isRecord(value) || value instanceof Uint8Array) {
    throw invalid(ownerName, ownerField, `expected a ${descriptor.name} table`)
  }
  const typeName = descriptor.name
  for (const key of Object.keys(value)) {
    const slot = slotByName(descriptor, key)
    if (slot === undefined) {
      throw invalid(typeName, key, "unknown field")
    }
    if (slot.deprecated && Predicate.isNotNullable(value[key])) {
      throw invalid(typeName, key, "field is deprecated")
    }
  }

  const slots = activeSlots(descriptor)
  const offsets = new Map<number, ReferenceOffset>()
  const unionTags = new Map<number, number>()

  // Children first
  for (const slot of slots) {
    const fieldValue = ownField(value, slot.name)
    if (Predicate.isNullable(fieldValue)) {
      continue
    }
    switch (slot.type._tag) {
      case "String":
        offsets.set(slot.index, encodeString(ctx, typeName, slot.name, fieldValue))
        break
      case "Table":
        offsets.set(slot.index, encodeTable(ctx, ctx.registry.resolve(slot.type.type), fieldValue, typeName, slot.name))
        break
      case "Vector":
        offsets.set(slot.index, encodeVector(ctx, typeName, slot.name, slot.type.element, fieldValue))
        break
      case "Union": {
        const [tag, offset] = encodeUnion(ctx, typeName, slot.name, slot.type.union, fieldValue)
        unionTags.set(slot.index - 1, tag)
        offsets.set(slot.index, offset)
        break
      }
    }
  }

  ctx.builder.startObject(descriptor)
  // Largest fields first keeps alignment padding to a minimum
  const bySize = [...slots].sort((a, b) => b.size - a.size)
  for (const slot of bySize) {
    const fieldValue = ownField(value, slot.name)
    switch (slot.type._tag) {
      case "Scalar": {
        if (Predicate.isNullable(fieldValue)) {
          break
        }
        const kind = slot.type.kind
        ctx.builder.addField(
          slot.index,
          kind,
          scalarValue(typeName, slot.name, kind, fieldValue),
          slot.defaultValue ?? zeroScalar(kind)
        )
        break
      }
      case "UnionTag": {
        const tag = unionTags.get(slot.index)
        if (tag !== undefined) {
          ctx.builder.addField(slot.index, "uint8", tag, Union.NONE)
        }
        break
      }
      case "Struct": {
        if (Predicate.isNullable(fieldValue)) {
          break
        }
        ctx.builder.addStruct(slot.index, slot.type.struct, structValue(typeName, slot.name, slot.type.struct, fieldValue))
        break
      }
      default: {
        const offset = offsets.get(slot.index)
        if (offset !== undefined) {
          ctx.builder.addOffset(slot.index, offset)
        }
      }
    }
  }
  return ctx.builder.endObject()
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Writes `value` as the root table of a fresh builder and finishes the
 * buffer. Throws the builder's and the validator's errors synchronously.
 */
export const encode = (
  value: TableValue | Serializable,
  descriptor: TableDescriptor,
  options: SerializeOptions = {}
): Uint8Array => {
  const builder = new Builder(options)
  const ctx: EncodeContext = { builder, registry: options.registry ?? Registry.empty }
  const root = encodeTable(ctx, descriptor, value, descriptor.name, "(root)")
  return builder.finish(root, options.fileIdentifier ?? descriptor.fileIdentifier, options.sizePrefixed ?? false)
}

/**
 * Serializes a value tree against its table descriptor.
 *
 * @example
 * ```typescript
 * const bytes = yield* serialize({ hp: 80, name: "orc" }, Monster)
 * ```
 */
export const serialize: (
  value: TableValue | Serializable,
  descriptor: TableDescriptor,
  options?: SerializeOptions
) => Effect.Effect<Uint8Array, SerializeError> = Effect.fn("FlatBuffers.serialize")(
  function*(value: TableValue | Serializable, descriptor: TableDescriptor, options: SerializeOptions = {}) {
    const bytes = yield* attempt(() => encode(value, descriptor, options), isSerializeError)
    yield* Effect.logDebug(`Serialized ${descriptor.name}`).pipe(
      Effect.annotateLogs({ type: descriptor.name, bytes: bytes.byteLength })
    )
    return bytes
  }
)
