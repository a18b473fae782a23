import { SIZEOF_UOFFSET } from "../core/constants.ts"
import { BoundsViolationError } from "../core/errors.ts"
import type { FlatBufferReader } from "../core/flatbuffer-reader.ts"

/**
 * A lazy view over a vector stored in a finished buffer.
 *
 * Elements are decoded on access; nothing is copied up front. Iterating is
 * finite and can be restarted any number of times.
 */
export class Vector<A> implements Iterable<A> {
  readonly length: number
  private readonly reader: FlatBufferReader
  private readonly start: number
  private readonly stride: number
  private readonly decode: (position: number) => A

  /**
   * @param position - absolute position of the vector's element count
   * @param stride - inline byte width of one element
   * @param decode - decodes the element stored at an absolute position
   */
  constructor(
    reader: FlatBufferReader,
    position: number,
    stride: number,
    decode: (position: number) => A
  ) {
    this.reader = reader
    this.stride = stride
    this.decode = decode
    this.length = reader.readVectorLength(position, stride)
    this.start = position + SIZEOF_UOFFSET
  }

  /**
   * Absolute position of the element at `index`.
   */
  position(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new BoundsViolationError({
        target: `vector element ${index}`,
        position: this.start + index * this.stride,
        length: this.stride,
        bufferLength: this.reader.length
      })
    }
    return this.start + index * this.stride
  }

  get(index: number): A {
    return this.decode(this.position(index))
  }

  *[Symbol.iterator](): Iterator<A> {
    for (let i = 0; i < this.length; i++) {
      yield this.decode(this.start + i * this.stride)
    }
  }

  toArray(): Array<A> {
    return Array.from(this)
  }
}
