/**
 * Scalar kinds of the FlatBuffers type system and their little-endian
 * encodings.
 *
 * @module
 */

// =============================================================================
// Types
// =============================================================================

export type ScalarKind =
  | "bool"
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "int32"
  | "uint32"
  | "int64"
  | "uint64"
  | "float32"
  | "float64"

export type LongKind = "int64" | "uint64"
export type FloatKind = "float32" | "float64"
export type IntKind = Exclude<ScalarKind, "bool" | LongKind | FloatKind>

/**
 * The JavaScript representation of a scalar of kind `K`. 64-bit integers are
 * represented as `bigint` so that no precision is lost.
 */
export type ScalarValue<K extends ScalarKind> = K extends "bool" ? boolean
  : K extends LongKind ? bigint
  : number

export type AnyScalarValue = boolean | number | bigint

/** Byte width of each scalar kind. Scalars are aligned to their width. */
export const SCALAR_SIZES: Readonly<Record<ScalarKind, 1 | 2 | 4 | 8>> = {
  bool: 1,
  int8: 1,
  uint8: 1,
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  int64: 8,
  uint64: 8,
  float32: 4,
  float64: 8
}

const INT_RANGES: Readonly<Record<IntKind, readonly [number, number]>> = {
  int8: [-0x80, 0x7f],
  uint8: [0, 0xff],
  int16: [-0x8000, 0x7fff],
  uint16: [0, 0xffff],
  int32: [-0x80000000, 0x7fffffff],
  uint32: [0, 0xffffffff]
}

const LONG_RANGES: Readonly<Record<LongKind, readonly [bigint, bigint]>> = {
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint64: [0n, 2n ** 64n - 1n]
}

// =============================================================================
// Predicates
// =============================================================================

export const isLongKind = (kind: ScalarKind): kind is LongKind => kind === "int64" || kind === "uint64"

export const isFloatKind = (kind: ScalarKind): kind is FloatKind => kind === "float32" || kind === "float64"

/**
 * Returns a description of why `value` cannot be stored as a scalar of the
 * given kind, or `undefined` when it can.
 */
export const checkScalar = (kind: ScalarKind, value: unknown): string | undefined => {
  if (kind === "bool") {
    return typeof value === "boolean" ? undefined : "expected a boolean"
  }
  if (isLongKind(kind)) {
    if (typeof value !== "bigint") {
      return "expected a bigint"
    }
    const [min, max] = LONG_RANGES[kind]
    return value < min || value > max ? `${value} is outside the ${kind} range` : undefined
  }
  if (typeof value !== "number") {
    return "expected a number"
  }
  if (isFloatKind(kind)) {
    return undefined
  }
  if (!Number.isInteger(value)) {
    return `${value} is not an integer`
  }
  const [min, max] = INT_RANGES[kind]
  return value < min || value > max ? `${value} is outside the ${kind} range` : undefined
}

/**
 * Normalizes a value to the representation used for scalars of `kind`, so
 * that defaults can be compared with `===`.
 */
export const normalizeScalar = (kind: ScalarKind, value: AnyScalarValue): AnyScalarValue => {
  if (kind === "bool") {
    return typeof value === "boolean" ? value : value !== 0 && value !== 0n
  }
  if (isLongKind(kind)) {
    return typeof value === "bigint" ? value : BigInt(value)
  }
  return typeof value === "number" ? value : Number(value)
}

/**
 * Returns the zero value of the given kind.
 */
export const zeroScalar = (kind: ScalarKind): AnyScalarValue => normalizeScalar(kind, 0)

// =============================================================================
// Encoding
// =============================================================================

/**
 * Reads a little-endian scalar. The caller is responsible for bounds checks.
 */
export const readScalar = (view: DataView, position: number, kind: ScalarKind): AnyScalarValue => {
  switch (kind) {
    case "bool":
      return view.getUint8(position) !== 0
    case "int8":
      return view.getInt8(position)
    case "uint8":
      return view.getUint8(position)
    case "int16":
      return view.getInt16(position, true)
    case "uint16":
      return view.getUint16(position, true)
    case "int32":
      return view.getInt32(position, true)
    case "uint32":
      return view.getUint32(position, true)
    case "int64":
      return view.getBigInt64(position, true)
    case "uint64":
      return view.getBigUint64(position, true)
    case "float32":
      return view.getFloat32(position, true)
    case "float64":
      return view.getFloat64(position, true)
  }
}

/**
 * Writes a little-endian scalar. The caller is responsible for bounds checks.
 */
export const writeScalar = (view: DataView, position: number, kind: ScalarKind, value: AnyScalarValue): void => {
  const normalized = normalizeScalar(kind, value)
  const number = typeof normalized === "number" ? normalized : Number(normalized)
  const long = typeof normalized === "bigint" ? normalized : 0n
  switch (kind) {
    case "bool":
    case "int8":
    case "uint8":
      return view.setUint8(position, number & 0xff)
    case "int16":
    case "uint16":
      return view.setUint16(position, number & 0xffff, true)
    case "int32":
      return view.setInt32(position, number, true)
    case "uint32":
      return view.setUint32(position, number >>> 0, true)
    case "int64":
      return view.setBigInt64(position, BigInt.asIntN(64, long), true)
    case "uint64":
      return view.setBigUint64(position, BigInt.asUintN(64, long), true)
    case "float32":
      return view.setFloat32(position, number, true)
    case "float64":
      return view.setFloat64(position, number, true)
  }
}
