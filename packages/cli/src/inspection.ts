/**
 * Structural inspection of a finished buffer without a descriptor.
 *
 * @module
 */
import { attempt } from "@flatwire/flatbuffers/core/attempt"
import {
  FILE_IDENTIFIER_LENGTH,
  SIZE_PREFIX_LENGTH,
  SIZEOF_UOFFSET,
  SIZEOF_VOFFSET,
  VTABLE_METADATA_SIZE
} from "@flatwire/flatbuffers/core/constants"
import { type DecodeError, isDecodeError } from "@flatwire/flatbuffers/core/errors"
import { FlatBufferReader, type VTableView } from "@flatwire/flatbuffers/core/flatbuffer-reader"
import type * as Effect from "effect/Effect"
import * as Option from "effect/Option"

export interface Inspection {
  readonly byteLength: number
  readonly sizePrefix: Option.Option<number>
  /**
   * The value of the root uoffset.
   */
  readonly rootOffset: number
  readonly tablePosition: number
  /**
   * The four bytes after the root offset, when they are printable ASCII.
   */
  readonly identifier: Option.Option<string>
  readonly vtable: VTableView
  /**
   * The offset recorded for each slot of the root vtable; `0` for absent
   * fields.
   */
  readonly slotOffsets: ReadonlyArray<number>
}

const isPrintable = (s: string): boolean => /^[\x20-\x7e]*$/.test(s)

const readInspection = (bytes: Uint8Array, sizePrefixed: boolean): Inspection => {
  const reader = new FlatBufferReader(bytes)
  const base = sizePrefixed ? SIZE_PREFIX_LENGTH : 0
  const tablePosition = reader.readOffset(base, "root table")
  const vtable = reader.readVTable(tablePosition)
  const slotCount = (vtable.size - VTABLE_METADATA_SIZE) / SIZEOF_VOFFSET
  const hasIdentifierBytes = bytes.byteLength >= base + SIZEOF_UOFFSET + FILE_IDENTIFIER_LENGTH
  return {
    byteLength: bytes.byteLength,
    sizePrefix: sizePrefixed ? Option.some(reader.readUint32(0)) : Option.none(),
    rootOffset: tablePosition - base,
    tablePosition,
    identifier: hasIdentifierBytes
      ? Option.liftPredicate(reader.readIdentifier(sizePrefixed), isPrintable)
      : Option.none(),
    vtable,
    slotOffsets: Array.from({ length: slotCount }, (_, slot) => reader.getFieldOffset(vtable, slot))
  }
}

/**
 * Resolves the root table and its vtable.
 */
export const inspect = (bytes: Uint8Array, sizePrefixed: boolean): Effect.Effect<Inspection, DecodeError> =>
  attempt(() => readInspection(bytes, sizePrefixed), isDecodeError)

export const format = (inspection: Inspection): ReadonlyArray<string> => [
  `bytes:           ${inspection.byteLength}`,
  ...Option.match(inspection.sizePrefix, {
    onNone: () => [],
    onSome: (size) => [`size prefix:     ${size}`]
  }),
  `root offset:     ${inspection.rootOffset}`,
  `file identifier: ${Option.getOrElse(inspection.identifier, () => "(none)")}`,
  `root table:      ${inspection.tablePosition}`,
  `vtable:          ${inspection.vtable.position} ` +
  `(size ${inspection.vtable.size}, object size ${inspection.vtable.objectSize})`,
  ...inspection.slotOffsets.map((offset, slot) => `  slot ${slot}: ${offset === 0 ? "absent" : offset}`)
]
