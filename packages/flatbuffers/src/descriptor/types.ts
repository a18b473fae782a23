/**
 * The static type metadata consumed by both the builder and the reader.
 *
 * A `TableDescriptor` plays the role of the per-type code a schema compiler
 * would generate: it lists the type's slots in schema order, with the wire
 * type, width, alignment, default and deprecation state of each one.
 *
 * @module
 */
import type { AnyScalarValue, ScalarKind } from "../core/scalars.ts"

// =============================================================================
// Type References
// =============================================================================

/**
 * A reference to a table type, either directly or by the name under which it
 * is registered in a `TypeRegistry`. Named references are resolved lazily,
 * which allows mutually recursive tables.
 */
export type TypeRef = TableDescriptor | string

// =============================================================================
// Field Types
// =============================================================================

export interface ScalarType {
  readonly _tag: "Scalar"
  readonly kind: ScalarKind
}

export interface StringType {
  readonly _tag: "String"
}

export interface TableType {
  readonly _tag: "Table"
  readonly type: TypeRef
}

export interface StructType {
  readonly _tag: "Struct"
  readonly struct: StructDescriptor
}

/**
 * The element type of a vector. Vectors of vectors and of unions are not part
 * of the format.
 */
export type ElementType = ScalarType | StringType | TableType | StructType

export interface VectorType {
  readonly _tag: "Vector"
  readonly element: ElementType
}

/**
 * The `uint8` discriminant slot generated for a union field.
 */
export interface UnionTagType {
  readonly _tag: "UnionTag"
  readonly union: UnionDescriptor
}

/**
 * The offset slot of a union field. It always directly follows its
 * `UnionTag` slot.
 */
export interface UnionType {
  readonly _tag: "Union"
  readonly union: UnionDescriptor
}

export type FieldType = ScalarType | StringType | TableType | StructType | VectorType | UnionTagType | UnionType

// =============================================================================
// Slots
// =============================================================================

/**
 * One slot of a table. Slot indices are stable: deprecated slots keep their
 * index and are never written or read.
 */
export interface Slot {
  readonly name: string
  readonly index: number
  readonly type: FieldType
  /**
   * Inline byte width of the field inside the table.
   */
  readonly size: number
  readonly alignment: number
  /**
   * The default of a scalar slot. Indirect and struct slots default to
   * absent, represented as `null`.
   */
  readonly defaultValue: AnyScalarValue | null
  readonly deprecated: boolean
  readonly required: boolean
}

// =============================================================================
// Descriptors
// =============================================================================

export interface TableDescriptor {
  readonly _tag: "TableDescriptor"
  readonly name: string
  readonly slots: ReadonlyArray<Slot>
  /**
   * Four ASCII characters written after the root offset when this type is
   * the root of a buffer.
   */
  readonly fileIdentifier: string | undefined
  readonly fileExtension: string | undefined
}

export interface StructField {
  readonly name: string
  readonly type: ScalarType | StructType
  /**
   * Byte offset of the field from the start of the struct.
   */
  readonly offset: number
  readonly size: number
}

/**
 * A fixed-layout record stored inline in tables and vectors.
 */
export interface StructDescriptor {
  readonly _tag: "StructDescriptor"
  readonly name: string
  readonly fields: ReadonlyArray<StructField>
  readonly size: number
  readonly alignment: number
}

export interface UnionMember {
  /**
   * The discriminant value. `0` is reserved for `NONE`.
   */
  readonly tag: number
  readonly name: string
  readonly type: TypeRef
}

export interface UnionDescriptor {
  readonly _tag: "UnionDescriptor"
  readonly name: string
  readonly members: ReadonlyArray<UnionMember>
}
