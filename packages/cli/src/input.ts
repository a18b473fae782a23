import * as FileSystem from "@effect/platform/FileSystem"
import type { PlatformError } from "@effect/platform/Error"
import { FILE_IDENTIFIER_LENGTH, SIZE_PREFIX_LENGTH, SIZEOF_UOFFSET } from "@flatwire/flatbuffers/core/constants"
import * as Effect from "effect/Effect"
import { TruncatedInputError } from "./errors.ts"

export interface HeaderOptions {
  readonly sizePrefixed: boolean
  /**
   * Whether the header must include a file identifier.
   */
  readonly identifier: boolean
}

/**
 * The number of leading bytes a buffer needs for its root offset, and
 * optionally its size prefix and file identifier.
 */
export const headerLength = (options: HeaderOptions): number =>
  SIZEOF_UOFFSET +
  (options.sizePrefixed ? SIZE_PREFIX_LENGTH : 0) +
  (options.identifier ? FILE_IDENTIFIER_LENGTH : 0)

/**
 * Reads a finished buffer from disk, failing with `TruncatedInputError` when
 * the file cannot hold the requested header.
 */
export const readBuffer = Effect.fn("Input.readBuffer")(
  function*(path: string, options: HeaderOptions): Effect.fn.Return<
    Uint8Array,
    PlatformError | TruncatedInputError,
    FileSystem.FileSystem
  > {
    const fs = yield* FileSystem.FileSystem
    const bytes = yield* fs.readFile(path)
    const minimum = headerLength(options)
    if (bytes.byteLength < minimum) {
      return yield* new TruncatedInputError({ path, length: bytes.byteLength, minimum })
    }
    yield* Effect.logDebug(`Read ${bytes.byteLength} bytes`).pipe(Effect.annotateLogs({ path }))
    return bytes
  }
)
