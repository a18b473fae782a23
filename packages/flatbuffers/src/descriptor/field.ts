/**
 * Constructors for the fields of a table descriptor.
 *
 * Every scalar field takes an explicit default; a value equal to it is elided
 * from the buffer and read back from the descriptor.
 *
 * @module
 */
import { type AnyScalarValue, normalizeScalar, type ScalarKind, type ScalarValue, zeroScalar } from "../core/scalars.ts"
import type {
  ElementType,
  ScalarType,
  StringType,
  StructDescriptor,
  StructType,
  TableType,
  TypeRef,
  UnionDescriptor,
  UnionType,
  VectorType
} from "./types.ts"

// =============================================================================
// Types
// =============================================================================

/**
 * A field as declared in a schema. Union fields expand into two slots when
 * the descriptor is assembled.
 */
export interface FieldSpec {
  readonly name: string
  readonly type: ScalarType | StringType | TableType | StructType | VectorType | UnionType
  readonly defaultValue: AnyScalarValue | null
  readonly deprecated: boolean
  readonly required: boolean
}

export interface FieldOptions {
  readonly deprecated?: boolean
  /**
   * When set, the builder refuses to end a table in which the field is absent.
   */
  readonly required?: boolean
}

export interface ScalarFieldOptions<K extends ScalarKind> {
  readonly default?: ScalarValue<K>
  readonly deprecated?: boolean
}

// =============================================================================
// Constructors
// =============================================================================

export const scalar = <K extends ScalarKind>(
  name: string,
  kind: K,
  options: ScalarFieldOptions<K> = {}
): FieldSpec => ({
  name,
  type: { _tag: "Scalar", kind },
  defaultValue: options.default === undefined ? zeroScalar(kind) : normalizeScalar(kind, options.default),
  deprecated: options.deprecated ?? false,
  required: false
})

export const bool = (name: string, options?: ScalarFieldOptions<"bool">) => scalar(name, "bool", options)
export const int8 = (name: string, options?: ScalarFieldOptions<"int8">) => scalar(name, "int8", options)
export const uint8 = (name: string, options?: ScalarFieldOptions<"uint8">) => scalar(name, "uint8", options)
export const int16 = (name: string, options?: ScalarFieldOptions<"int16">) => scalar(name, "int16", options)
export const uint16 = (name: string, options?: ScalarFieldOptions<"uint16">) => scalar(name, "uint16", options)
export const int32 = (name: string, options?: ScalarFieldOptions<"int32">) => scalar(name, "int32", options)
export const uint32 = (name: string, options?: ScalarFieldOptions<"uint32">) => scalar(name, "uint32", options)
export const int64 = (name: string, options?: ScalarFieldOptions<"int64">) => scalar(name, "int64", options)
export const uint64 = (name: string, options?: ScalarFieldOptions<"uint64">) => scalar(name, "uint64", options)
export const float32 = (name: string, options?: ScalarFieldOptions<"float32">) => scalar(name, "float32", options)
export const float64 = (name: string, options?: ScalarFieldOptions<"float64">) => scalar(name, "float64", options)

const indirect = (name: string, type: FieldSpec["type"], options: FieldOptions): FieldSpec => ({
  name,
  type,
  defaultValue: null,
  deprecated: options.deprecated ?? false,
  required: options.required ?? false
})

export const string = (name: string, options: FieldOptions = {}): FieldSpec =>
  indirect(name, { _tag: "String" }, options)

export const table = (name: string, type: TypeRef, options: FieldOptions = {}): FieldSpec =>
  indirect(name, { _tag: "Table", type }, options)

export const struct = (name: string, struct: StructDescriptor, options: FieldOptions = {}): FieldSpec =>
  indirect(name, { _tag: "Struct", struct }, options)

export const vector = (name: string, element: ElementType, options: FieldOptions = {}): FieldSpec =>
  indirect(name, { _tag: "Vector", element }, options)

export const union = (name: string, union: UnionDescriptor, options: FieldOptions = {}): FieldSpec =>
  indirect(name, { _tag: "Union", union }, options)

/**
 * Marks a field as deprecated. The field keeps its slot but is never written
 * or read.
 */
export const deprecated = (spec: FieldSpec): FieldSpec => ({ ...spec, deprecated: true })
