/**
 * Struct descriptors and their inline layout.
 *
 * Struct layout follows the FlatBuffers rules: fields are stored in
 * declaration order, each aligned to its own alignment, and the total size is
 * padded to the largest field alignment.
 *
 * @module
 */
import type { FlatBufferReader } from "../core/flatbuffer-reader.ts"
import { type AnyScalarValue, SCALAR_SIZES, type ScalarKind, writeScalar } from "../core/scalars.ts"
import type { StructDescriptor, StructField } from "./types.ts"

/**
 * The in-memory representation of a struct value.
 */
export interface StructValue {
  readonly [field: string]: AnyScalarValue | StructValue
}

const alignUp = (n: number, alignment: number): number => (n + alignment - 1) & ~(alignment - 1)

/**
 * Creates a struct descriptor from its fields in declaration order.
 *
 * @example
 * ```typescript
 * const Vec3 = Struct.make("Vec3", [["x", "float32"], ["y", "float32"], ["z", "float32"]])
 * ```
 */
export const make = (
  name: string,
  fields: ReadonlyArray<readonly [string, ScalarKind | StructDescriptor]>
): StructDescriptor => {
  let cursor = 0
  let alignment = 1
  const laidOut: Array<StructField> = []
  for (const [fieldName, type] of fields) {
    const [fieldType, size, fieldAlignment]: readonly [StructField["type"], number, number] = typeof type === "string"
      ? [{ _tag: "Scalar", kind: type }, SCALAR_SIZES[type], SCALAR_SIZES[type]]
      : [{ _tag: "Struct", struct: type }, type.size, type.alignment]
    cursor = alignUp(cursor, fieldAlignment)
    laidOut.push({ name: fieldName, type: fieldType, offset: cursor, size })
    cursor += size
    alignment = Math.max(alignment, fieldAlignment)
  }
  return {
    _tag: "StructDescriptor",
    name,
    fields: laidOut,
    size: alignUp(cursor, alignment),
    alignment
  }
}

/**
 * Encodes `value` into `view` at `position`. Fields missing from `value` are
 * written as zero; padding bytes are left untouched.
 */
export const write = (view: DataView, position: number, struct: StructDescriptor, value: StructValue): void => {
  for (const field of struct.fields) {
    const fieldValue = value[field.name]
    if (field.type._tag === "Scalar") {
      writeScalar(
        view,
        position + field.offset,
        field.type.kind,
        fieldValue === undefined || typeof fieldValue === "object" ? 0 : fieldValue
      )
    } else {
      write(
        view,
        position + field.offset,
        field.type.struct,
        fieldValue !== undefined && typeof fieldValue === "object" ? fieldValue : {}
      )
    }
  }
}

/**
 * Encodes `value` into a fresh, zero-padded byte array of `struct.size` bytes.
 */
export const encode = (struct: StructDescriptor, value: StructValue): Uint8Array => {
  const bytes = new Uint8Array(struct.size)
  write(new DataView(bytes.buffer), 0, struct, value)
  return bytes
}

/**
 * Decodes the struct stored at `position`.
 */
export const read = (reader: FlatBufferReader, position: number, struct: StructDescriptor): StructValue => {
  reader.check(struct.name, position, struct.size)
  const value: Record<string, AnyScalarValue | StructValue> = {}
  for (const field of struct.fields) {
    value[field.name] = field.type._tag === "Scalar"
      ? reader.readScalar(position + field.offset, field.type.kind, `${struct.name}.${field.name}`)
      : read(reader, position + field.offset, field.type.struct)
  }
  return value
}
