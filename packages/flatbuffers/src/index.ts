/**
 * The back-to-front FlatBuffers builder.
 */
export * as Builder from "./builder/builder.ts"

/**
 * Serialization of plain value trees against table descriptors.
 */
export * as Codec from "./codec.ts"

/**
 * Builder options and the `FlatBuffers` service.
 */
export * as Config from "./config.ts"

/**
 * Format constants.
 */
export * as Constants from "./core/constants.ts"

/**
 * Tagged errors raised by the builder, the codec and the reader.
 */
export * as Errors from "./core/errors.ts"

/**
 * Bounds-checked primitive reads over a finished buffer.
 */
export * as FlatBufferReader from "./core/flatbuffer-reader.ts"

/**
 * Scalar kinds and their little-endian encoding.
 */
export * as Scalars from "./core/scalars.ts"

/**
 * Branded offsets and the builder state machine.
 */
export * as Types from "./core/types.ts"

/**
 * Table descriptors, the static type metadata of a schema.
 */
export * as Descriptor from "./descriptor/descriptor.ts"

export * as Element from "./descriptor/element.ts"

export * as Field from "./descriptor/field.ts"

/**
 * Name-to-descriptor resolution for recursive tables.
 */
export * as Registry from "./descriptor/registry.ts"

export * as Struct from "./descriptor/struct.ts"

export * as Union from "./descriptor/union.ts"

/**
 * Descriptor and buffer metadata queries.
 */
export * as Metadata from "./metadata.ts"

/**
 * Zero-copy table and vector views.
 */
export * as Table from "./table/table.ts"

export * as Vector from "./table/vector.ts"
