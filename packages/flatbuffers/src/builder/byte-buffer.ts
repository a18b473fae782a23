import { DEFAULT_INITIAL_SIZE, MAX_BUFFER_SIZE } from "../core/constants.ts"
import { BufferOverflowError } from "../core/errors.ts"
import { type AnyScalarValue, SCALAR_SIZES, type ScalarKind, writeScalar } from "../core/scalars.ts"
import { paddingFor } from "./alignment.ts"

/**
 * A growable byte store that is written from its high end downward.
 *
 * The write head (`space`) only ever decreases. Everything between the head
 * and the end of the store has been written, in its final relative order.
 * Offsets handed out by the builder are distances from the end of the store,
 * so growing (which copies the written bytes to the end of a larger store)
 * never invalidates them.
 */
export class ByteBuffer {
  private bytes: Uint8Array
  private view: DataView
  private space: number

  constructor(initialSize: number) {
    const size = Number.isFinite(initialSize) ? Math.max(1, Math.floor(initialSize)) : DEFAULT_INITIAL_SIZE
    this.bytes = new Uint8Array(size)
    this.view = new DataView(this.bytes.buffer)
    this.space = size
  }

  get capacity(): number {
    return this.bytes.byteLength
  }

  /**
   * The number of bytes written so far.
   */
  offset(): number {
    return this.bytes.byteLength - this.space
  }

  /**
   * Discards everything written, keeping the allocated store.
   */
  clear(): void {
    this.space = this.bytes.byteLength
  }

  /**
   * Doubles the size of the store and copies the written bytes to the end of
   * the new store.
   */
  grow(): void {
    const oldSize = this.bytes.byteLength
    const newSize = oldSize * 2
    if (newSize > MAX_BUFFER_SIZE) {
      throw new BufferOverflowError({ requested: newSize })
    }
    const next = new Uint8Array(newSize)
    next.set(this.bytes.subarray(this.space), newSize - oldSize + this.space)
    this.bytes = next
    this.view = new DataView(next.buffer)
    this.space += newSize - oldSize
  }

  /**
   * Grows until at least `byteSize` bytes are free below the write head.
   */
  ensureSpace(byteSize: number): void {
    while (this.space < byteSize) {
      this.grow()
    }
  }

  /**
   * Writes `byteSize` zero bytes.
   */
  pad(byteSize: number): void {
    this.ensureSpace(byteSize)
    this.bytes.fill(0, this.space - byteSize, this.space)
    this.space -= byteSize
  }

  /**
   * Prepares to write an element of `size` bytes after `additionalBytes` have
   * been written, e.g. a string whose length prefix must be 4-byte aligned
   * once its payload is in place. Returns the number of padding bytes that
   * were inserted.
   */
  prep(size: number, additionalBytes: number): number {
    const alignSize = paddingFor(this.offset(), additionalBytes, size)
    this.ensureSpace(alignSize + size + additionalBytes)
    this.pad(alignSize)
    return alignSize
  }

  /**
   * Writes a scalar at its natural alignment and returns the resulting offset.
   */
  place(kind: ScalarKind, value: AnyScalarValue): number {
    this.prep(SCALAR_SIZES[kind], 0)
    this.write(kind, value)
    return this.offset()
  }

  /**
   * Writes a scalar below the head without aligning. Space must have been
   * reserved with `prep`.
   */
  write(kind: ScalarKind, value: AnyScalarValue): void {
    this.space -= SCALAR_SIZES[kind]
    writeScalar(this.view, this.space, kind, value)
  }

  /**
   * Writes raw bytes below the head without aligning. Space must have been
   * reserved with `prep`.
   */
  writeBytes(source: Uint8Array): void {
    this.space -= source.byteLength
    this.bytes.set(source, this.space)
  }

  /**
   * Overwrites a previously written scalar located `offset` bytes from the
   * end of the store.
   */
  patch(offset: number, kind: ScalarKind, value: AnyScalarValue): void {
    writeScalar(this.view, this.bytes.byteLength - offset, kind, value)
  }

  /**
   * Reads a previously written `uint16` located `offset` bytes from the end
   * of the store.
   */
  readUint16(offset: number): number {
    return this.view.getUint16(this.bytes.byteLength - offset, true)
  }

  /**
   * Reads a previously written `int32` located `offset` bytes from the end
   * of the store.
   */
  readInt32(offset: number): number {
    return this.view.getInt32(this.bytes.byteLength - offset, true)
  }

  /**
   * Returns a copy of the written bytes.
   */
  asUint8Array(): Uint8Array {
    return this.bytes.slice(this.space)
  }
}
