/**
 * The FlatBuffers builder.
 *
 * Buffers are built back to front: children are written before the tables
 * that reference them, and every reference is an offset measured from the
 * end of the buffer. A typical session looks like:
 *
 * ```typescript
 * const builder = new Builder()
 * const name = builder.createString("orc")
 * builder.startObject(Monster)
 * builder.addFieldInt16(0, 150, 100)
 * builder.addOffset(1, name)
 * const monster = builder.endObject()
 * const bytes = builder.finish(monster, "MONS")
 * ```
 *
 * @module
 */
import {
  DEFAULT_INITIAL_SIZE,
  FILE_IDENTIFIER_LENGTH,
  MAX_VOFFSET,
  SIZEOF_INT,
  SIZEOF_UOFFSET,
  SIZEOF_VOFFSET,
  SIZE_PREFIX_LENGTH,
  VTABLE_METADATA_FIELDS
} from "../core/constants.ts"
import {
  AlreadyFinishedError,
  InvalidFileIdentifierError,
  InvalidSlotError,
  NestingError,
  ObjectNotStartedError,
  OpenObjectError,
  RequiredFieldError,
  UnfinalizedOffsetError,
  VOffsetOverflowError
} from "../core/errors.ts"
import { type AnyScalarValue, normalizeScalar, SCALAR_SIZES, type ScalarKind } from "../core/scalars.ts"
import {
  BuilderState,
  type ReferenceOffset,
  StringOffset,
  StructOffset,
  TableOffset,
  VectorOffset,
  VTableOffset
} from "../core/types.ts"
import { isValidFileIdentifier } from "../descriptor/descriptor.ts"
import * as Struct from "../descriptor/struct.ts"
import type { StructDescriptor, TableDescriptor } from "../descriptor/types.ts"
import { AlignmentTracker } from "./alignment.ts"
import { ByteBuffer } from "./byte-buffer.ts"
import { VTableCache } from "./vtable-cache.ts"

export interface BuilderOptions {
  /**
   * The initial capacity of the backing store in bytes. The store doubles
   * whenever it runs out of space.
   */
  readonly initialSize?: number
  /**
   * When `true`, scalar fields equal to their default are written anyway.
   */
  readonly forceDefaults?: boolean
}

const utf8 = new TextEncoder()

export class Builder {
  private bb: ByteBuffer
  private readonly alignment = new AlignmentTracker()
  private readonly vtables = new VTableCache()
  private readonly sharedStrings: Map<string, StringOffset> = new Map()

  /**
   * Offsets of the fields recorded for the open object, one per slot. `0`
   * means the slot is absent.
   */
  private vtable: Array<number> = []
  private descriptor: TableDescriptor | undefined = undefined
  private objectStart = 0
  private vectorElementCount = 0
  private current: BuilderState = BuilderState.IDLE
  private writeDefaults: boolean

  constructor(options: BuilderOptions = {}) {
    this.bb = new ByteBuffer(options.initialSize ?? DEFAULT_INITIAL_SIZE)
    this.writeDefaults = options.forceDefaults ?? false
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  get state(): BuilderState {
    return this.current
  }

  /**
   * The largest alignment requested so far in this session.
   */
  get minalign(): number {
    return this.alignment.minalign
  }

  /**
   * The number of distinct vtables written in this session.
   */
  get vtableCount(): number {
    return this.vtables.size
  }

  /**
   * The number of bytes written so far. Offsets returned by the builder are
   * values of this counter at the time the object was completed.
   */
  offset(): number {
    return this.bb.offset()
  }

  /**
   * In order to save space, fields that are set to their default value
   * don't get serialized into the buffer. Forcing defaults provides a
   * way to manually disable this optimization.
   */
  forceDefaults(forceDefaults: boolean): void {
    this.writeDefaults = forceDefaults
  }

  /**
   * Returns the builder to its initial state so that it can be reused for a
   * new buffer. The backing store is kept.
   */
  reset(): void {
    this.bb.clear()
    this.alignment.reset()
    this.vtables.clear()
    this.sharedStrings.clear()
    this.vtable = []
    this.descriptor = undefined
    this.objectStart = 0
    this.vectorElementCount = 0
    this.current = BuilderState.IDLE
  }

  // ===========================================================================
  // Low-level Writes
  // ===========================================================================

  /**
   * Prepare to write an element of `size` after `additionalBytes` have been
   * written, tracking `size` as an alignment requirement of the buffer.
   */
  prep(size: number, additionalBytes: number): void {
    this.alignment.observe(size)
    this.bb.prep(size, additionalBytes)
  }

  /**
   * Writes a scalar at its natural alignment, outside of any field slot.
   */
  addScalar(kind: ScalarKind, value: AnyScalarValue): void {
    this.notFinished("add a scalar")
    this.place(kind, value)
  }

  private place(kind: ScalarKind, value: AnyScalarValue): number {
    this.alignment.observe(SCALAR_SIZES[kind])
    return this.bb.place(kind, value)
  }

  private writeUOffset(target: ReferenceOffset): void {
    this.prep(SIZEOF_UOFFSET, 0)
    this.bb.write("uint32", this.bb.offset() - target + SIZEOF_UOFFSET)
  }

  // ===========================================================================
  // Tables
  // ===========================================================================

  /**
   * Start encoding a new table. Accepts either the table's descriptor, which
   * enables slot and required-field checks, or a bare slot count.
   */
  startObject(descriptorOrSlotCount: TableDescriptor | number): void {
    this.notNested("startObject")
    this.descriptor = typeof descriptorOrSlotCount === "number" ? undefined : descriptorOrSlotCount
    const slotCount = typeof descriptorOrSlotCount === "number"
      ? descriptorOrSlotCount
      : descriptorOrSlotCount.slots.length
    this.vtable = new Array<number>(slotCount).fill(0)
    this.objectStart = this.bb.offset()
    this.current = BuilderState.BUILDING_OBJECT
  }

  /**
   * Adds a scalar field to the open table unless it equals `defaultValue`.
   * Eliding defaults is what keeps buffers compact; a reader that finds the
   * slot absent returns the default from its own descriptor.
   */
  addField(slot: number, kind: ScalarKind, value: AnyScalarValue, defaultValue: AnyScalarValue): void {
    this.checkSlot(slot, "addField")
    if (!this.writeDefaults && normalizeScalar(kind, value) === normalizeScalar(kind, defaultValue)) {
      return
    }
    this.vtable[slot] = this.place(kind, value)
  }

  addFieldBool(slot: number, value: boolean, defaultValue: boolean): void {
    this.addField(slot, "bool", value, defaultValue)
  }

  addFieldInt8(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "int8", value, defaultValue)
  }

  addFieldUint8(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "uint8", value, defaultValue)
  }

  addFieldInt16(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "int16", value, defaultValue)
  }

  addFieldUint16(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "uint16", value, defaultValue)
  }

  addFieldInt32(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "int32", value, defaultValue)
  }

  addFieldUint32(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "uint32", value, defaultValue)
  }

  addFieldInt64(slot: number, value: bigint, defaultValue: bigint): void {
    this.addField(slot, "int64", value, defaultValue)
  }

  addFieldUint64(slot: number, value: bigint, defaultValue: bigint): void {
    this.addField(slot, "uint64", value, defaultValue)
  }

  addFieldFloat32(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "float32", value, defaultValue)
  }

  addFieldFloat64(slot: number, value: number, defaultValue: number): void {
    this.addField(slot, "float64", value, defaultValue)
  }

  /**
   * Adds a reference to a finished table, string or vector to the open table.
   */
  addOffset(slot: number, target: ReferenceOffset): void {
    this.checkSlot(slot, "addOffset")
    // Anything written after the object started belongs to the open object
    if (target <= 0 || target > this.objectStart) {
      throw new UnfinalizedOffsetError({ offset: target, head: this.bb.offset() })
    }
    this.writeUOffset(target)
    this.vtable[slot] = this.bb.offset()
  }

  /**
   * Writes a struct inline into the open table.
   */
  addStruct(slot: number, struct: StructDescriptor, value: Struct.StructValue): void {
    this.checkSlot(slot, "addStruct")
    this.writeStruct(struct, value)
    this.vtable[slot] = this.bb.offset()
  }

  /**
   * Finish off writing the table that is under construction.
   */
  endObject(): TableOffset {
    if (this.current !== BuilderState.BUILDING_OBJECT) {
      throw new ObjectNotStartedError({ operation: "endObject", expected: "startObject" })
    }

    // Placeholder for the soffset to the vtable, patched below
    this.prep(SIZEOF_INT, 0)
    this.bb.write("int32", 0)
    const objectOffset = this.bb.offset()

    // Trim trailing absent slots
    let trimmed = this.vtable.length
    while (trimmed > 0 && this.vtable[trimmed - 1] === 0) {
      trimmed--
    }

    // Field offsets are bounded by the object size
    const objectSize = objectOffset - this.objectStart
    if (objectSize > MAX_VOFFSET) {
      throw new VOffsetOverflowError({ subject: "table", size: objectSize })
    }
    const vtableSize = (trimmed + VTABLE_METADATA_FIELDS) * SIZEOF_VOFFSET
    if (vtableSize > MAX_VOFFSET) {
      throw new VOffsetOverflowError({ subject: "vtable", size: vtableSize })
    }
    const candidate = new Uint8Array(vtableSize)
    const view = new DataView(candidate.buffer)
    view.setUint16(0, vtableSize, true)
    view.setUint16(SIZEOF_VOFFSET, objectSize, true)
    for (let i = 0; i < trimmed; i++) {
      const fieldOffset = this.vtable[i] ?? 0
      // Offset relative to the start of the table
      view.setUint16((i + VTABLE_METADATA_FIELDS) * SIZEOF_VOFFSET, fieldOffset !== 0 ? objectOffset - fieldOffset : 0, true)
    }

    const offset = this.vtables.lookupOrInsert(candidate, (bytes) => {
      this.prep(SIZEOF_VOFFSET, bytes.byteLength)
      this.bb.writeBytes(bytes)
      return VTableOffset(this.bb.offset())
    })

    // table position - vtable position, measured from the buffer end
    this.bb.patch(objectOffset, "int32", offset - objectOffset)

    const descriptor = this.descriptor
    this.vtable = []
    this.descriptor = undefined
    this.current = BuilderState.IDLE

    const table = TableOffset(objectOffset)
    if (descriptor !== undefined) {
      for (const slot of descriptor.slots) {
        if (slot.required && !slot.deprecated) {
          this.requiredField(table, slot.index)
        }
      }
    }
    return table
  }

  /**
   * Checks that a required field has been set in a table that has just been
   * constructed.
   */
  requiredField(table: TableOffset, slot: number): void {
    const vtable = table + this.bb.readInt32(table)
    const vtableSize = this.bb.readUint16(vtable)
    const entry = (slot + VTABLE_METADATA_FIELDS) * SIZEOF_VOFFSET
    if (entry >= vtableSize || this.bb.readUint16(vtable - entry) === 0) {
      throw new RequiredFieldError({ slot, table })
    }
  }

  // ===========================================================================
  // Strings & Vectors
  // ===========================================================================

  /**
   * Start a new vector. Elements must be written in reverse order with the
   * unaligned writers before calling `endVector`.
   */
  startVector(elementSize: number, elementCount: number, alignment: number): void {
    this.notNested("startVector")
    this.vectorElementCount = elementCount
    this.prep(SIZEOF_INT, elementSize * elementCount)
    // Just in case alignment > int
    this.prep(alignment, elementSize * elementCount)
    this.current = BuilderState.BUILDING_VECTOR
  }

  /**
   * Finish off the creation of a vector and all its elements.
   */
  endVector(): VectorOffset {
    if (this.current !== BuilderState.BUILDING_VECTOR) {
      throw new ObjectNotStartedError({ operation: "endVector", expected: "startVector" })
    }
    this.bb.write("uint32", this.vectorElementCount)
    this.current = BuilderState.IDLE
    return VectorOffset(this.bb.offset())
  }

  /**
   * Encode a string. A `Uint8Array` is assumed to already hold UTF-8 data.
   * A zero terminator follows the payload so that C consumers can use the
   * string in place.
   */
  createString(s: string | Uint8Array): StringOffset {
    this.notNested("createString")
    const bytes = typeof s === "string" ? utf8.encode(s) : s
    this.addScalar("uint8", 0)
    this.startVector(1, bytes.byteLength, 1)
    this.bb.writeBytes(bytes)
    return StringOffset(this.endVector())
  }

  /**
   * Encode a string, reusing the offset of an identical string previously
   * created with this method in the same session.
   */
  createSharedString(s: string): StringOffset {
    const existing = this.sharedStrings.get(s)
    if (existing !== undefined) {
      return existing
    }
    const offset = this.createString(s)
    this.sharedStrings.set(s, offset)
    return offset
  }

  createByteVector(bytes: Uint8Array): VectorOffset {
    this.startVector(1, bytes.byteLength, 1)
    this.bb.writeBytes(bytes)
    return this.endVector()
  }

  createScalarVector(kind: ScalarKind, values: ReadonlyArray<AnyScalarValue>): VectorOffset {
    const size = SCALAR_SIZES[kind]
    this.startVector(size, values.length, size)
    for (let i = values.length - 1; i >= 0; i--) {
      this.bb.write(kind, values[i] ?? 0)
    }
    return this.endVector()
  }

  /**
   * Creates a vector of references to finished tables or strings.
   */
  createOffsetVector(offsets: ReadonlyArray<ReferenceOffset>): VectorOffset {
    this.startVector(SIZEOF_UOFFSET, offsets.length, SIZEOF_UOFFSET)
    for (let i = offsets.length - 1; i >= 0; i--) {
      const target = offsets[i] ?? 0
      if (target <= 0 || target > this.bb.offset()) {
        throw new UnfinalizedOffsetError({ offset: target, head: this.bb.offset() })
      }
      this.bb.write("uint32", this.bb.offset() - target + SIZEOF_UOFFSET)
    }
    return this.endVector()
  }

  createStructVector(struct: StructDescriptor, values: ReadonlyArray<Struct.StructValue>): VectorOffset {
    this.startVector(struct.size, values.length, struct.alignment)
    for (let i = values.length - 1; i >= 0; i--) {
      this.bb.writeBytes(Struct.encode(struct, values[i] ?? {}))
    }
    return this.endVector()
  }

  /**
   * Writes a struct outside of any table, e.g. as a vector element written
   * between `startVector` and `endVector`.
   */
  createStruct(struct: StructDescriptor, value: Struct.StructValue): StructOffset {
    this.writeStruct(struct, value)
    return StructOffset(this.bb.offset())
  }

  private writeStruct(struct: StructDescriptor, value: Struct.StructValue): void {
    this.prep(struct.alignment, struct.size)
    this.bb.writeBytes(Struct.encode(struct, value))
  }

  // ===========================================================================
  // Finishing
  // ===========================================================================

  /**
   * Finalize a buffer, pointing to the given `root` table, and return the
   * finished bytes.
   */
  finish(root: TableOffset, fileIdentifier?: string, sizePrefix: boolean = false): Uint8Array {
    if (this.current === BuilderState.FINISHED) {
      throw new AlreadyFinishedError({ operation: "finish" })
    }
    if (this.current !== BuilderState.IDLE) {
      throw new OpenObjectError({ operation: "finish", inProgress: this.describeInProgress() })
    }
    if (root <= 0 || root > this.bb.offset()) {
      throw new UnfinalizedOffsetError({ offset: root, head: this.bb.offset() })
    }
    const prefixSize = sizePrefix ? SIZE_PREFIX_LENGTH : 0
    if (fileIdentifier !== undefined) {
      if (!isValidFileIdentifier(fileIdentifier)) {
        throw new InvalidFileIdentifierError({ identifier: fileIdentifier })
      }
      this.prep(this.alignment.minalign, SIZEOF_UOFFSET + FILE_IDENTIFIER_LENGTH + prefixSize)
      for (let i = FILE_IDENTIFIER_LENGTH - 1; i >= 0; i--) {
        this.bb.write("uint8", fileIdentifier.charCodeAt(i))
      }
    }
    this.prep(this.alignment.minalign, SIZEOF_UOFFSET + prefixSize)
    this.writeUOffset(root)
    if (sizePrefix) {
      const size = this.bb.offset()
      this.prep(SIZEOF_INT, 0)
      this.bb.write("uint32", size)
    }
    this.current = BuilderState.FINISHED
    return this.bb.asUint8Array()
  }

  /**
   * Finalize a buffer whose first four bytes hold the length of the rest.
   */
  finishSizePrefixed(root: TableOffset, fileIdentifier?: string): Uint8Array {
    return this.finish(root, fileIdentifier, true)
  }

  /**
   * Get the bytes written so far. After `finish` these are the finished
   * buffer; the returned array is a copy.
   */
  asUint8Array(): Uint8Array {
    if (this.current === BuilderState.BUILDING_OBJECT || this.current === BuilderState.BUILDING_VECTOR) {
      throw new OpenObjectError({ operation: "asUint8Array", inProgress: this.describeInProgress() })
    }
    return this.bb.asUint8Array()
  }

  // ===========================================================================
  // Guards
  // ===========================================================================

  private describeInProgress(): string {
    switch (this.current) {
      case BuilderState.BUILDING_OBJECT:
        return this.descriptor === undefined ? "a table" : `table ${this.descriptor.name}`
      case BuilderState.BUILDING_VECTOR:
        return "a vector"
      default:
        return "nothing"
    }
  }

  private notFinished(operation: string): void {
    if (this.current === BuilderState.FINISHED) {
      throw new AlreadyFinishedError({ operation })
    }
  }

  /**
   * Should not be creating any other object, string or vector while an
   * object or vector is being constructed.
   */
  private notNested(operation: string): void {
    this.notFinished(operation)
    if (this.current !== BuilderState.IDLE) {
      throw new NestingError({ operation, inProgress: this.describeInProgress() })
    }
  }

  private checkSlot(slot: number, operation: string): void {
    this.notFinished(operation)
    if (this.current !== BuilderState.BUILDING_OBJECT) {
      throw new ObjectNotStartedError({ operation, expected: "startObject" })
    }
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.vtable.length) {
      throw new InvalidSlotError({ slot, slotCount: this.vtable.length, reason: "slot index out of range" })
    }
    if (this.descriptor?.slots[slot]?.deprecated === true) {
      throw new InvalidSlotError({ slot, slotCount: this.vtable.length, reason: "slot is deprecated" })
    }
    if (this.vtable[slot] !== 0) {
      throw new InvalidSlotError({ slot, slotCount: this.vtable.length, reason: "slot was already written" })
    }
  }
}

