/**
 * Assembly of table descriptors from field declarations.
 *
 * @module
 */
import { FILE_IDENTIFIER_LENGTH, SIZEOF_UOFFSET } from "../core/constants.ts"
import { InvalidFileIdentifierError } from "../core/errors.ts"
import { SCALAR_SIZES } from "../core/scalars.ts"
import type { FieldSpec } from "./field.ts"
import type { FieldType, Slot, TableDescriptor } from "./types.ts"

export interface DescriptorOptions {
  /**
   * Four ASCII characters identifying buffers whose root is this type.
   */
  readonly fileIdentifier?: string
  /**
   * The conventional file extension for such buffers, without the dot.
   */
  readonly fileExtension?: string
}

/**
 * Returns the inline width and alignment of a field of the given type.
 */
export const layoutOf = (type: FieldType): readonly [size: number, alignment: number] => {
  switch (type._tag) {
    case "Scalar":
      return [SCALAR_SIZES[type.kind], SCALAR_SIZES[type.kind]]
    case "Struct":
      return [type.struct.size, type.struct.alignment]
    case "UnionTag":
      return [1, 1]
    case "String":
    case "Table":
    case "Vector":
    case "Union":
      return [SIZEOF_UOFFSET, SIZEOF_UOFFSET]
  }
}

export const isValidFileIdentifier = (identifier: string): boolean =>
  identifier.length === FILE_IDENTIFIER_LENGTH && [...identifier].every((c) => c.charCodeAt(0) < 0x80)

/**
 * Creates a table descriptor. Slots are numbered in declaration order; a union
 * field takes two slots, its `<name>_type` discriminant followed by the value.
 *
 * @example
 * ```typescript
 * const Monster = Descriptor.make("Monster", [
 *   Field.int16("hp", { default: 100 }),
 *   Field.string("name", { required: true }),
 *   Field.vector("inventory", Element.scalar("uint8"))
 * ], { fileIdentifier: "MONS", fileExtension: "mon" })
 * ```
 */
export const make = (
  name: string,
  fields: ReadonlyArray<FieldSpec>,
  options: DescriptorOptions = {}
): TableDescriptor => {
  if (options.fileIdentifier !== undefined && !isValidFileIdentifier(options.fileIdentifier)) {
    throw new InvalidFileIdentifierError({ identifier: options.fileIdentifier })
  }
  const slots: Array<Slot> = []
  const push = (
    slotName: string,
    type: FieldType,
    spec: Pick<FieldSpec, "defaultValue" | "deprecated" | "required">
  ) => {
    const [size, alignment] = layoutOf(type)
    slots.push({
      name: slotName,
      index: slots.length,
      type,
      size,
      alignment,
      defaultValue: spec.defaultValue,
      deprecated: spec.deprecated,
      required: spec.required
    })
  }
  for (const field of fields) {
    if (field.type._tag === "Union") {
      push(`${field.name}_type`, { _tag: "UnionTag", union: field.type.union }, {
        defaultValue: 0,
        deprecated: field.deprecated,
        required: false
      })
    }
    push(field.name, field.type, field)
  }
  return {
    _tag: "TableDescriptor",
    name,
    slots,
    fileIdentifier: options.fileIdentifier,
    fileExtension: options.fileExtension
  }
}

export const slotByName = (descriptor: TableDescriptor, name: string): Slot | undefined =>
  descriptor.slots.find((slot) => slot.name === name)

/**
 * Returns the slots that are written and read, in slot order.
 */
export const activeSlots = (descriptor: TableDescriptor): ReadonlyArray<Slot> =>
  descriptor.slots.filter((slot) => !slot.deprecated)
