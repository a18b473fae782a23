/**
 * Static queries over table descriptors and finished buffers.
 *
 * @module
 */
import { SIZEOF_VOFFSET, VTABLE_METADATA_SIZE } from "./core/constants.ts"
import type { TableDescriptor } from "./descriptor/types.ts"
import { Table } from "./table/table.ts"

export const fileExtension = (descriptor: TableDescriptor): string | undefined => descriptor.fileExtension

export const fileIdentifier = (descriptor: TableDescriptor): string | undefined => descriptor.fileIdentifier

/**
 * Returns `true` when `bytes` carries the descriptor's file identifier. A
 * descriptor without an identifier matches no buffer.
 */
export const hasIdentifier = (
  descriptor: TableDescriptor,
  bytes: Uint8Array,
  sizePrefixed: boolean = false
): boolean =>
  descriptor.fileIdentifier !== undefined && Table.hasIdentifier(bytes, descriptor.fileIdentifier, sizePrefixed)

/**
 * The byte offset of each slot's entry within a vtable, keyed by field name.
 * Generated code exposes these as `VT_*` constants.
 */
export const slotOffsets = (descriptor: TableDescriptor): ReadonlyMap<string, number> =>
  new Map(descriptor.slots.map((slot) => [slot.name, VTABLE_METADATA_SIZE + SIZEOF_VOFFSET * slot.index]))
