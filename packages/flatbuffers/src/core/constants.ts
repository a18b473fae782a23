/**
 * Fixed sizes of the FlatBuffers wire format.
 *
 * References:
 * - FlatBuffer encoding: https://flatbuffers.dev/flatbuffers_internals.html
 *
 * @module
 */

export const SIZEOF_SHORT = 2
export const SIZEOF_INT = 4

/**
 * Size of a `uoffset_t` (forward reference to a table, string or vector).
 */
export const SIZEOF_UOFFSET = SIZEOF_INT

/**
 * Size of a `voffset_t` (a single vtable entry).
 */
export const SIZEOF_VOFFSET = SIZEOF_SHORT

export const FILE_IDENTIFIER_LENGTH = 4
export const SIZE_PREFIX_LENGTH = 4

/**
 * The two leading vtable entries: the vtable's own byte size and the byte
 * size of the table that owns it.
 */
export const VTABLE_METADATA_FIELDS = 2
export const VTABLE_METADATA_SIZE = VTABLE_METADATA_FIELDS * SIZEOF_VOFFSET

/**
 * The largest value a vtable entry can hold. Bounds both the vtable's own
 * size and the size of the table it describes.
 */
export const MAX_VOFFSET = 0xffff

/**
 * The largest buffer a builder may grow to. FlatBuffers offsets are signed
 * 32-bit on some platforms, so buffers are capped at 2 GiB.
 */
export const MAX_BUFFER_SIZE = 0x80000000

export const DEFAULT_INITIAL_SIZE = 1024
