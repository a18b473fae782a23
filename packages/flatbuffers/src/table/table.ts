/**
 * Zero-copy access to the tables of a finished buffer.
 *
 * A `Table` resolves its vtable once and reads fields on demand. Absent
 * scalar fields yield the default from the descriptor; absent strings,
 * tables, structs, vectors and unions yield `null`.
 *
 * @module
 */
import { SIZEOF_UOFFSET, SIZE_PREFIX_LENGTH } from "../core/constants.ts"
import { BoundsViolationError, InvalidSlotError, SlotWidthMismatchError, UnknownUnionTagError } from "../core/errors.ts"
import { FlatBufferReader, type VTableView } from "../core/flatbuffer-reader.ts"
import { type AnyScalarValue, SCALAR_SIZES, zeroScalar } from "../core/scalars.ts"
import { slotByName } from "../descriptor/descriptor.ts"
import * as Registry from "../descriptor/registry.ts"
import * as Struct from "../descriptor/struct.ts"
import type { ElementType, Slot, TableDescriptor, UnionMember } from "../descriptor/types.ts"
import * as Union from "../descriptor/union.ts"
import { Vector } from "./vector.ts"

/**
 * A slot index, or the name of a field in the table's descriptor.
 */
export type SlotRef = number | string

export type VectorElement = AnyScalarValue | string | Table | Struct.StructValue

/**
 * The resolved member of a union field.
 */
export interface UnionView {
  readonly member: UnionMember
  readonly table: Table
}

export class Table {
  readonly reader: FlatBufferReader
  /**
   * Absolute position of the table in the buffer.
   */
  readonly position: number
  readonly descriptor: TableDescriptor
  readonly registry: Registry.TypeRegistry
  private readonly vtable: VTableView

  constructor(
    reader: FlatBufferReader,
    position: number,
    descriptor: TableDescriptor,
    registry: Registry.TypeRegistry = Registry.empty
  ) {
    this.reader = reader
    this.position = position
    this.descriptor = descriptor
    this.registry = registry
    this.vtable = reader.readVTable(position)
  }

  /**
   * Opens the root table of a finished buffer.
   */
  static root(
    bytes: Uint8Array,
    descriptor: TableDescriptor,
    registry: Registry.TypeRegistry = Registry.empty
  ): Table {
    const reader = new FlatBufferReader(bytes)
    return new Table(reader, reader.readOffset(0, "root table"), descriptor, registry)
  }

  /**
   * Opens the root table of a buffer finished with a size prefix. The prefix
   * must not claim more bytes than the buffer holds.
   */
  static sizePrefixedRoot(
    bytes: Uint8Array,
    descriptor: TableDescriptor,
    registry: Registry.TypeRegistry = Registry.empty
  ): Table {
    const reader = new FlatBufferReader(bytes)
    const size = reader.readUint32(0)
    if (size > bytes.byteLength - SIZE_PREFIX_LENGTH) {
      throw new BoundsViolationError({
        target: "size prefix",
        position: SIZE_PREFIX_LENGTH,
        length: size,
        bufferLength: bytes.byteLength
      })
    }
    return new Table(reader, reader.readOffset(SIZE_PREFIX_LENGTH, "root table"), descriptor, registry)
  }

  /**
   * Returns `true` when the four bytes following the root offset equal
   * `identifier`.
   */
  static hasIdentifier(bytes: Uint8Array, identifier: string, sizePrefixed: boolean = false): boolean {
    const start = SIZEOF_UOFFSET + (sizePrefixed ? SIZE_PREFIX_LENGTH : 0)
    if (bytes.byteLength < start + identifier.length) {
      return false
    }
    return new FlatBufferReader(bytes).readIdentifier(sizePrefixed) === identifier
  }

  // ===========================================================================
  // Slots
  // ===========================================================================

  /**
   * The size in bytes of the table's inline data, as declared by its vtable.
   */
  get objectSize(): number {
    return this.vtable.objectSize
  }

  slot(ref: SlotRef): Slot {
    const slot = typeof ref === "number" ? this.descriptor.slots[ref] : slotByName(this.descriptor, ref)
    if (slot === undefined) {
      throw new InvalidSlotError({
        slot: typeof ref === "number" ? ref : -1,
        slotCount: this.descriptor.slots.length,
        reason: typeof ref === "number" ? "slot index out of range" : `${this.descriptor.name} has no field '${ref}'`
      })
    }
    return slot
  }

  /**
   * The offset of a field from the start of the table, or `0` when the vtable
   * records the field as absent.
   */
  fieldOffset(ref: SlotRef): number {
    return this.reader.getFieldOffset(this.vtable, this.slot(ref).index)
  }

  /**
   * Returns `true` when the field is present in the buffer.
   */
  has(ref: SlotRef): boolean {
    const slot = this.slot(ref)
    return !slot.deprecated && this.reader.getFieldOffset(this.vtable, slot.index) !== 0
  }

  /**
   * Absolute position of a present field, or `null` when it is absent.
   */
  private locate(slot: Slot): number | null {
    if (slot.deprecated) {
      return null
    }
    const fieldOffset = this.reader.getFieldOffset(this.vtable, slot.index)
    if (fieldOffset === 0) {
      return null
    }
    this.reader.check(`${this.descriptor.name}.${slot.name}`, this.position + fieldOffset, slot.size)
    if (fieldOffset + slot.size > this.vtable.objectSize) {
      throw new SlotWidthMismatchError({
        slot: slot.index,
        fieldOffset,
        width: slot.size,
        objectSize: this.vtable.objectSize
      })
    }
    return this.position + fieldOffset
  }

  private expect<T extends Slot["type"]["_tag"]>(
    ref: SlotRef,
    ...tags: ReadonlyArray<T>
  ): Slot & { readonly type: Extract<Slot["type"], { readonly _tag: T }> } {
    const slot = this.slot(ref)
    const type = slot.type
    if (!isOneOf(type, tags)) {
      throw new InvalidSlotError({
        slot: slot.index,
        slotCount: this.descriptor.slots.length,
        reason: `${this.descriptor.name}.${slot.name} is a ${type._tag} field, not a ${tags.join(" or ")} field`
      })
    }
    return { ...slot, type }
  }

  // ===========================================================================
  // Fields
  // ===========================================================================

  /**
   * Reads a scalar field (or a union discriminant), falling back to the
   * descriptor's default when the field is absent.
   */
  get(ref: SlotRef): AnyScalarValue {
    const slot = this.expect(ref, "Scalar", "UnionTag")
    const kind = slot.type._tag === "Scalar" ? slot.type.kind : "uint8"
    const position = this.locate(slot)
    if (position === null) {
      return slot.defaultValue ?? zeroScalar(kind)
    }
    return this.reader.readScalar(position, kind, `${this.descriptor.name}.${slot.name}`)
  }

  string(ref: SlotRef): string | null {
    const position = this.locate(this.expect(ref, "String"))
    return position === null ? null : this.reader.readString(position)
  }

  /**
   * The UTF-8 bytes of a string field, without copying.
   */
  stringBytes(ref: SlotRef): Uint8Array | null {
    const position = this.locate(this.expect(ref, "String"))
    return position === null ? null : this.reader.readStringBytesAt(this.reader.readOffset(position, "string"))
  }

  table(ref: SlotRef): Table | null {
    const slot = this.expect(ref, "Table")
    const position = this.locate(slot)
    if (position === null) {
      return null
    }
    const descriptor = this.registry.resolve(slot.type.type)
    return new Table(this.reader, this.reader.readOffset(position, descriptor.name), descriptor, this.registry)
  }

  struct(ref: SlotRef): Struct.StructValue | null {
    const slot = this.expect(ref, "Struct")
    const position = this.locate(slot)
    return position === null ? null : Struct.read(this.reader, position, slot.type.struct)
  }

  vector(ref: SlotRef): Vector<VectorElement> | null {
    const slot = this.expect(ref, "Vector")
    const position = this.locate(slot)
    if (position === null) {
      return null
    }
    const element = slot.type.element
    return new Vector(
      this.reader,
      this.reader.readOffset(position, "vector"),
      elementStride(element),
      (at): VectorElement => this.element(element, at)
    )
  }

  /**
   * The payload of a `uint8` or `int8` vector, without copying.
   */
  bytes(ref: SlotRef): Uint8Array | null {
    const slot = this.expect(ref, "Vector")
    const position = this.locate(slot)
    if (position === null) {
      return null
    }
    const element = slot.type.element
    if (element._tag !== "Scalar" || SCALAR_SIZES[element.kind] !== 1) {
      throw new InvalidSlotError({
        slot: slot.index,
        slotCount: this.descriptor.slots.length,
        reason: `${this.descriptor.name}.${slot.name} is not a byte vector`
      })
    }
    const start = this.reader.readOffset(position, "vector")
    const length = this.reader.readVectorLength(start, 1)
    return this.reader.bytes.subarray(start + SIZEOF_UOFFSET, start + SIZEOF_UOFFSET + length)
  }

  /**
   * Reads a union field. The discriminant is taken from the slot that
   * precedes the union's value slot.
   */
  union(ref: SlotRef): UnionView | null {
    const slot = this.expect(ref, "Union")
    const tag = this.get(slot.index - 1)
    if (tag === Union.NONE) {
      return null
    }
    const position = this.locate(slot)
    if (position === null) {
      return null
    }
    const member = typeof tag === "number" ? Union.memberByTag(slot.type.union, tag) : undefined
    if (member === undefined) {
      throw new UnknownUnionTagError({ union: slot.type.union.name, tag: Number(tag) })
    }
    const descriptor = this.registry.resolve(member.type)
    return {
      member,
      table: new Table(this.reader, this.reader.readOffset(position, descriptor.name), descriptor, this.registry)
    }
  }

  private element(element: ElementType, position: number): VectorElement {
    switch (element._tag) {
      case "Scalar":
        return this.reader.readScalar(position, element.kind)
      case "String":
        return this.reader.readString(position)
      case "Struct":
        return Struct.read(this.reader, position, element.struct)
      case "Table": {
        const descriptor = this.registry.resolve(element.type)
        return new Table(this.reader, this.reader.readOffset(position, descriptor.name), descriptor, this.registry)
      }
    }
  }
}

const isOneOf = <T extends Slot["type"]["_tag"]>(
  type: Slot["type"],
  tags: ReadonlyArray<T>
): type is Extract<Slot["type"], { readonly _tag: T }> => tags.some((tag) => tag === type._tag)

/**
 * The inline width of one element of a vector.
 */
export const elementStride = (element: ElementType): number => {
  switch (element._tag) {
    case "Scalar":
      return SCALAR_SIZES[element.kind]
    case "Struct":
      return element.struct.size
    case "String":
    case "Table":
      return SIZEOF_UOFFSET
  }
}
