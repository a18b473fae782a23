/**
 * Constructors for vector element types.
 *
 * @module
 */
import type { ScalarKind } from "../core/scalars.ts"
import type { ScalarType, StringType, StructDescriptor, StructType, TableType, TypeRef } from "./types.ts"

export const scalar = (kind: ScalarKind): ScalarType => ({ _tag: "Scalar", kind })

export const string: StringType = { _tag: "String" }

export const table = (type: TypeRef): TableType => ({ _tag: "Table", type })

export const struct = (struct: StructDescriptor): StructType => ({ _tag: "Struct", struct })
