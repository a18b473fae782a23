/**
 * Tests for the back-to-front byte store and alignment bookkeeping.
 *
 * @module
 */
import { AlignmentTracker, paddingFor } from "@flatwire/flatbuffers/builder/alignment"
import { ByteBuffer } from "@flatwire/flatbuffers/builder/byte-buffer"
import { describe, expect, it } from "vitest"

describe("ByteBuffer", () => {
  it("places scalars at their natural alignment from the end", () => {
    const buffer = new ByteBuffer(16)

    expect(buffer.place("uint8", 7)).toBe(1)
    expect(buffer.place("int32", 0x01020304)).toBe(8)
    expect(buffer.asUint8Array()).toEqual(Uint8Array.from([4, 3, 2, 1, 0, 0, 0, 7]))
  })

  it("grows by doubling and keeps the written bytes at the end", () => {
    const buffer = new ByteBuffer(1)
    buffer.place("uint8", 7)
    buffer.place("int32", 0x01020304)

    expect(buffer.capacity).toBe(8)
    expect(buffer.asUint8Array()).toEqual(Uint8Array.from([4, 3, 2, 1, 0, 0, 0, 7]))
  })

  it("keeps offsets valid across growth", () => {
    const buffer = new ByteBuffer(4)
    const offset = buffer.place("int32", 5)
    buffer.place("float64", 0.5)

    expect(buffer.readInt32(offset)).toBe(5)
    buffer.patch(offset, "int32", 9)
    expect(buffer.readInt32(offset)).toBe(9)
  })

  it("pads so that a write after additional bytes is aligned", () => {
    const buffer = new ByteBuffer(16)
    buffer.place("uint8", 1)

    expect(buffer.prep(4, 3)).toBe(0)
    expect(buffer.prep(4, 2)).toBe(1)
    expect(buffer.offset()).toBe(2)
  })

  it("uses the default capacity for a non-finite initial size", () => {
    expect(new ByteBuffer(Number.NaN).capacity).toBe(1024)
    expect(new ByteBuffer(Number.POSITIVE_INFINITY).capacity).toBe(1024)
  })

  it("keeps its store when cleared", () => {
    const buffer = new ByteBuffer(1)
    buffer.place("int64", 1n)
    buffer.clear()

    expect(buffer.offset()).toBe(0)
    expect(buffer.capacity).toBe(8)
  })
})

describe("Alignment", () => {
  it("computes padding relative to the buffer end", () => {
    expect(paddingFor(0, 0, 4)).toBe(0)
    expect(paddingFor(1, 0, 4)).toBe(3)
    expect(paddingFor(5, 2, 8)).toBe(1)
  })

  it("tracks the largest alignment requested", () => {
    const tracker = new AlignmentTracker()
    tracker.observe(4)
    tracker.observe(2)
    expect(tracker.minalign).toBe(4)

    tracker.reset()
    expect(tracker.minalign).toBe(1)
  })
})
