/**
 * This module contains the error definitions for the FlatBuffers engine.
 *
 * Errors are organized into three categories:
 * - BuilderError: misuse of the builder state machine, always a programming error
 * - SerializeError: a value tree that cannot be encoded against its descriptor
 * - DecodeError: a buffer whose offsets or vtables do not describe valid data
 *
 * @module
 */
import * as Schema from "effect/Schema"
import { MAX_VOFFSET } from "./constants.ts"

// =============================================================================
// Builder Errors
// =============================================================================

/**
 * Represents an attempt to start an object, string or vector while another
 * object or vector is still under construction.
 *
 * Children must be completely built before their parent is started.
 */
export class NestingError extends Schema.TaggedError<NestingError>(
  "FlatBuffers/NestingError"
)("NestingError", {
  /**
   * The builder operation that was attempted.
   */
  operation: Schema.String,
  /**
   * The construction that was already in progress.
   */
  inProgress: Schema.String
}) {
  override get message(): string {
    return `Cannot ${this.operation} while ${this.inProgress} is under construction`
  }
}

/**
 * Represents a call that requires an open object (or vector) when none was
 * started.
 */
export class ObjectNotStartedError extends Schema.TaggedError<ObjectNotStartedError>(
  "FlatBuffers/ObjectNotStartedError"
)("ObjectNotStartedError", {
  operation: Schema.String,
  /**
   * The call that should have preceded the operation.
   */
  expected: Schema.String
}) {
  override get message(): string {
    return `Cannot ${this.operation} without a preceding ${this.expected}`
  }
}

/**
 * Represents a second call to `finish` on the same builder session.
 */
export class AlreadyFinishedError extends Schema.TaggedError<AlreadyFinishedError>(
  "FlatBuffers/AlreadyFinishedError"
)("AlreadyFinishedError", {
  operation: Schema.String
}) {
  override get message(): string {
    return `Cannot ${this.operation}: the buffer has already been finished`
  }
}

/**
 * Represents an attempt to finish, or read the result of, a builder that still
 * has an object or vector under construction.
 */
export class OpenObjectError extends Schema.TaggedError<OpenObjectError>(
  "FlatBuffers/OpenObjectError"
)("OpenObjectError", {
  operation: Schema.String,
  inProgress: Schema.String
}) {
  override get message(): string {
    return `Cannot ${this.operation} while ${this.inProgress} is still open`
  }
}

/**
 * Represents a reference to an object that has not been finalized yet, such as
 * an offset that points past the current write head.
 */
export class UnfinalizedOffsetError extends Schema.TaggedError<UnfinalizedOffsetError>(
  "FlatBuffers/UnfinalizedOffsetError"
)("UnfinalizedOffsetError", {
  /**
   * The offset that was referenced.
   */
  offset: Schema.Number,
  /**
   * The number of bytes written when the reference was made.
   */
  head: Schema.Number
}) {
  override get message(): string {
    return `Offset ${this.offset} does not refer to a finalized object (bytes written: ${this.head})`
  }
}

/**
 * Represents a field write to a slot that the open object cannot hold.
 */
export class InvalidSlotError extends Schema.TaggedError<InvalidSlotError>(
  "FlatBuffers/InvalidSlotError"
)("InvalidSlotError", {
  slot: Schema.Number,
  slotCount: Schema.Number,
  reason: Schema.String
}) {
  override get message(): string {
    return `Invalid slot ${this.slot} (slot count: ${this.slotCount}): ${this.reason}`
  }
}

/**
 * Represents a file identifier that is not exactly four bytes long.
 */
export class InvalidFileIdentifierError extends Schema.TaggedError<InvalidFileIdentifierError>(
  "FlatBuffers/InvalidFileIdentifierError"
)("InvalidFileIdentifierError", {
  identifier: Schema.String
}) {
  override get message(): string {
    return `File identifier must be exactly 4 bytes, received '${this.identifier}'`
  }
}

/**
 * Represents a buffer that would have to grow beyond the format's 2 GiB limit.
 */
export class BufferOverflowError extends Schema.TaggedError<BufferOverflowError>(
  "FlatBuffers/BufferOverflowError"
)("BufferOverflowError", {
  requested: Schema.Number
}) {
  override get message(): string {
    return `Cannot grow buffer to ${this.requested} bytes: FlatBuffers are limited to 2 GiB`
  }
}

/**
 * Represents a table or vtable too large for the 16-bit entries of a vtable.
 */
export class VOffsetOverflowError extends Schema.TaggedError<VOffsetOverflowError>(
  "FlatBuffers/VOffsetOverflowError"
)("VOffsetOverflowError", {
  subject: Schema.Literal("table", "vtable"),
  size: Schema.Number
}) {
  override get message(): string {
    return `Cannot write a ${this.subject} of ${this.size} bytes: vtable entries are limited to ${MAX_VOFFSET}`
  }
}

/**
 * Represents a required field that was not written to a finished table.
 */
export class RequiredFieldError extends Schema.TaggedError<RequiredFieldError>(
  "FlatBuffers/RequiredFieldError"
)("RequiredFieldError", {
  slot: Schema.Number,
  table: Schema.Number
}) {
  override get message(): string {
    return `Required field in slot ${this.slot} of table ${this.table} was not set`
  }
}

export type BuilderError =
  | NestingError
  | ObjectNotStartedError
  | AlreadyFinishedError
  | OpenObjectError
  | UnfinalizedOffsetError
  | InvalidSlotError
  | InvalidFileIdentifierError
  | BufferOverflowError
  | VOffsetOverflowError
  | RequiredFieldError

export const isBuilderError = (u: unknown): u is BuilderError =>
  u instanceof NestingError ||
  u instanceof ObjectNotStartedError ||
  u instanceof AlreadyFinishedError ||
  u instanceof OpenObjectError ||
  u instanceof UnfinalizedOffsetError ||
  u instanceof InvalidSlotError ||
  u instanceof InvalidFileIdentifierError ||
  u instanceof BufferOverflowError ||
  u instanceof VOffsetOverflowError ||
  u instanceof RequiredFieldError

// =============================================================================
// Serialize Errors
// =============================================================================

/**
 * Represents a value that cannot be stored in the field it was supplied for.
 */
export class InvalidValueError extends Schema.TaggedError<InvalidValueError>(
  "FlatBuffers/InvalidValueError"
)("InvalidValueError", {
  /**
   * The name of the type that declares the field.
   */
  typeName: Schema.String,
  field: Schema.String,
  reason: Schema.String
}) {
  override get message(): string {
    return `Invalid value for ${this.typeName}.${this.field}: ${this.reason}`
  }
}

/**
 * Represents a type reference that is not present in the type registry.
 */
export class UnresolvedTypeError extends Schema.TaggedError<UnresolvedTypeError>(
  "FlatBuffers/UnresolvedTypeError"
)("UnresolvedTypeError", {
  name: Schema.String
}) {
  override get message(): string {
    return `Type '${this.name}' is not registered`
  }
}

export type SerializeError = BuilderError | InvalidValueError | UnresolvedTypeError

export const isSerializeError = (u: unknown): u is SerializeError =>
  isBuilderError(u) || u instanceof InvalidValueError || u instanceof UnresolvedTypeError

// =============================================================================
// Decode Errors
// =============================================================================

/**
 * Represents a computed position or length that falls outside of the buffer.
 */
export class BoundsViolationError extends Schema.TaggedError<BoundsViolationError>(
  "FlatBuffers/BoundsViolationError"
)("BoundsViolationError", {
  /**
   * What was being read when the violation was detected.
   */
  target: Schema.String,
  position: Schema.Number,
  length: Schema.Number,
  bufferLength: Schema.Number
}) {
  override get message(): string {
    return `Out of bounds read of ${this.target}: ${this.length} bytes at ${this.position} ` +
      `(buffer length: ${this.bufferLength})`
  }
}

/**
 * Represents a vtable whose declared size is not a valid vtable size.
 */
export class InvalidVTableError extends Schema.TaggedError<InvalidVTableError>(
  "FlatBuffers/InvalidVTableError"
)("InvalidVTableError", {
  position: Schema.Number,
  size: Schema.Number
}) {
  override get message(): string {
    return `Invalid vtable at ${this.position}: declared size ${this.size}`
  }
}

/**
 * Represents a field whose descriptor width does not fit inside the table size
 * declared by its vtable.
 */
export class SlotWidthMismatchError extends Schema.TaggedError<SlotWidthMismatchError>(
  "FlatBuffers/SlotWidthMismatchError"
)("SlotWidthMismatchError", {
  slot: Schema.Number,
  fieldOffset: Schema.Number,
  width: Schema.Number,
  objectSize: Schema.Number
}) {
  override get message(): string {
    return `Field in slot ${this.slot} at offset ${this.fieldOffset} needs ${this.width} bytes ` +
      `but the table is only ${this.objectSize} bytes long`
  }
}

/**
 * Represents a union discriminant that does not name a member of the union.
 */
export class UnknownUnionTagError extends Schema.TaggedError<UnknownUnionTagError>(
  "FlatBuffers/UnknownUnionTagError"
)("UnknownUnionTagError", {
  union: Schema.String,
  tag: Schema.Number
}) {
  override get message(): string {
    return `Unknown member ${this.tag} of union ${this.union}`
  }
}

export type DecodeError =
  | BoundsViolationError
  | InvalidVTableError
  | SlotWidthMismatchError
  | UnknownUnionTagError
  | UnresolvedTypeError

export const isDecodeError = (u: unknown): u is DecodeError =>
  u instanceof BoundsViolationError ||
  u instanceof InvalidVTableError ||
  u instanceof SlotWidthMismatchError ||
  u instanceof UnknownUnionTagError ||
  u instanceof UnresolvedTypeError
