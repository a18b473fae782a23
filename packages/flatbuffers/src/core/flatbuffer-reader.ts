import { FILE_IDENTIFIER_LENGTH, SIZEOF_INT, SIZEOF_SHORT, SIZEOF_UOFFSET, VTABLE_METADATA_SIZE } from "./constants.ts"
import { BoundsViolationError, InvalidVTableError } from "./errors.ts"
import { type AnyScalarValue, readScalar, SCALAR_SIZES, type ScalarKind } from "./scalars.ts"

/**
 * The resolved vtable of a table.
 */
export interface VTableView {
  /**
   * Absolute position of the vtable in the buffer.
   */
  readonly position: number
  /**
   * The vtable's own size in bytes, including the two metadata entries.
   */
  readonly size: number
  /**
   * The size in bytes of the table that owns this vtable.
   */
  readonly objectSize: number
}

const utf8 = new TextDecoder("utf-8", { fatal: false })

/**
 * A utility class for reading FlatBuffer-encoded data.
 *
 * Every read is validated against the extent of the underlying bytes before
 * it is performed; an invalid position raises a `BoundsViolationError`
 * rather than reading undefined memory.
 */
export class FlatBufferReader {
  readonly bytes: Uint8Array
  private readonly view: DataView

  constructor(bytes: Uint8Array) {
    this.bytes = bytes
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get length(): number {
    return this.bytes.byteLength
  }

  /**
   * Ensures that `length` bytes starting at `position` lie within the buffer.
   */
  check(target: string, position: number, length: number): void {
    if (
      !Number.isSafeInteger(position) ||
      position < 0 ||
      length < 0 ||
      position + length > this.bytes.byteLength
    ) {
      throw new BoundsViolationError({
        target,
        position,
        length,
        bufferLength: this.bytes.byteLength
      })
    }
  }

  readScalar(position: number, kind: ScalarKind, target: string = kind): AnyScalarValue {
    this.check(target, position, SCALAR_SIZES[kind])
    return readScalar(this.view, position, kind)
  }

  readUint8(offset: number): number {
    this.check("uint8", offset, 1)
    return this.view.getUint8(offset)
  }

  readInt16(offset: number): number {
    this.check("int16", offset, SIZEOF_SHORT)
    return this.view.getInt16(offset, true)
  }

  readUint16(offset: number): number {
    this.check("uint16", offset, SIZEOF_SHORT)
    return this.view.getUint16(offset, true)
  }

  readInt32(offset: number): number {
    this.check("int32", offset, SIZEOF_INT)
    return this.view.getInt32(offset, true)
  }

  readUint32(offset: number): number {
    this.check("uint32", offset, SIZEOF_INT)
    return this.view.getUint32(offset, true)
  }

  /**
   * Read offset to a table/vector/string (indirect offset). The result is the
   * absolute position of the referenced object.
   */
  readOffset(offset: number, target: string = "offset"): number {
    this.check(target, offset, SIZEOF_UOFFSET)
    const position = offset + this.view.getUint32(offset, true)
    // Tables, strings and vectors all begin with a 4-byte header
    this.check(`${target} target`, position, SIZEOF_UOFFSET)
    return position
  }

  /**
   * Read the UTF-8 bytes of the string whose length prefix is at `position`.
   * The trailing zero terminator is not included.
   */
  readStringBytesAt(position: number): Uint8Array {
    const length = this.readUint32(position)
    const start = position + SIZEOF_UOFFSET
    this.check("string", start, length)
    return this.bytes.subarray(start, start + length)
  }

  /**
   * Read a string from a FlatBuffer offset.
   */
  readString(offset: number): string {
    return utf8.decode(this.readStringBytesAt(this.readOffset(offset, "string")))
  }

  /**
   * Read the element count of the vector whose length prefix is at `position`
   * and ensure that `count * stride` payload bytes follow it.
   */
  readVectorLength(position: number, stride: number): number {
    const count = this.readUint32(position)
    this.check("vector", position + SIZEOF_UOFFSET, count * stride)
    return count
  }

  /**
   * Resolve the vtable of the table at `tablePosition` through its signed
   * back-reference.
   */
  readVTable(tablePosition: number): VTableView {
    const position = tablePosition - this.readInt32(tablePosition)
    this.check("vtable", position, VTABLE_METADATA_SIZE)
    const size = this.view.getUint16(position, true)
    if (size < VTABLE_METADATA_SIZE || size % SIZEOF_SHORT !== 0) {
      throw new InvalidVTableError({ position, size })
    }
    this.check("vtable", position, size)
    const objectSize = this.view.getUint16(position + SIZEOF_SHORT, true)
    this.check("table", tablePosition, objectSize)
    return { position, size, objectSize }
  }

  /**
   * Get table field offset using vtable. Returns 0 when the field is absent.
   */
  getFieldOffset(vtable: VTableView, fieldIndex: number): number {
    const fieldVtableOffset = VTABLE_METADATA_SIZE + fieldIndex * SIZEOF_SHORT
    if (fieldVtableOffset >= vtable.size) {
      return 0 // Field not present
    }
    return this.view.getUint16(vtable.position + fieldVtableOffset, true)
  }

  /**
   * Read the four identifier bytes that follow the root offset.
   */
  readIdentifier(sizePrefixed: boolean = false): string {
    const start = SIZEOF_UOFFSET + (sizePrefixed ? SIZEOF_INT : 0)
    this.check("file identifier", start, FILE_IDENTIFIER_LENGTH)
    return String.fromCharCode(...this.bytes.subarray(start, start + FILE_IDENTIFIER_LENGTH))
  }
}
