/**
 * Offset types shared by the builder and the reader.
 *
 * All offsets are plain numbers on the wire. The brands only exist so that a
 * string offset cannot be passed where a table offset is expected.
 *
 * @module
 */
import * as Brand from "effect/Brand"

// =============================================================================
// Builder Offsets
// =============================================================================

/**
 * The offset of a finished table, measured as the number of bytes written to
 * the builder when the table was completed.
 */
export type TableOffset = number & Brand.Brand<"FlatBuffers/TableOffset">
export const TableOffset = Brand.nominal<TableOffset>()

/**
 * The offset of a finished string.
 */
export type StringOffset = number & Brand.Brand<"FlatBuffers/StringOffset">
export const StringOffset = Brand.nominal<StringOffset>()

/**
 * The offset of a finished vector.
 */
export type VectorOffset = number & Brand.Brand<"FlatBuffers/VectorOffset">
export const VectorOffset = Brand.nominal<VectorOffset>()

/**
 * The offset of a committed vtable.
 */
export type VTableOffset = number & Brand.Brand<"FlatBuffers/VTableOffset">
export const VTableOffset = Brand.nominal<VTableOffset>()

/**
 * The end position of an inline struct. Only meaningful immediately after the
 * struct has been written, since structs are stored in place.
 */
export type StructOffset = number & Brand.Brand<"FlatBuffers/StructOffset">
export const StructOffset = Brand.nominal<StructOffset>()

/**
 * Any offset that may be stored in a table field or an offset vector as a
 * `uoffset_t`.
 */
export type ReferenceOffset = TableOffset | StringOffset | VectorOffset

// =============================================================================
// Builder States
// =============================================================================

export const BuilderState = {
  IDLE: "Idle",
  BUILDING_OBJECT: "BuildingObject",
  BUILDING_VECTOR: "BuildingVector",
  FINISHED: "Finished"
} as const
export type BuilderState = typeof BuilderState[keyof typeof BuilderState]
