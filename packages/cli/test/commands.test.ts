/**
 * Tests for the inspection commands, reading files through an in-memory
 * FileSystem.
 *
 * @module
 */
import * as PlatformError from "@effect/platform/Error"
import * as FileSystem from "@effect/platform/FileSystem"
import { describe, it } from "@effect/vitest"
import { identifyFile } from "@flatwire/cli/commands/identify"
import { inspectFile } from "@flatwire/cli/commands/inspect"
import * as Inspection from "@flatwire/cli/inspection"
import { Builder } from "@flatwire/flatbuffers/builder/builder"
import * as Descriptor from "@flatwire/flatbuffers/descriptor/descriptor"
import * as Field from "@flatwire/flatbuffers/descriptor/field"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

// =============================================================================
// Test Helpers
// =============================================================================

const Example = Descriptor.make("Example", [Field.int32("x", { default: 1 })])

const example = (fileIdentifier?: string, sizePrefix?: boolean): Uint8Array => {
  const builder = new Builder()
  builder.startObject(Example)
  builder.addFieldInt32(0, 2, 1)
  return builder.finish(builder.endObject(), fileIdentifier, sizePrefix)
}

const files: ReadonlyMap<string, Uint8Array> = new Map([
  ["plain.bin", example()],
  ["identified.bin", example("TEST")],
  ["prefixed.bin", example("TEST", true)],
  ["short.bin", Uint8Array.of(8, 0, 0, 0, 0, 0)]
])

const InMemoryFileSystem = FileSystem.layerNoop({
  readFile: (path) => {
    const bytes = files.get(path)
    return bytes === undefined
      ? Effect.fail(
        new PlatformError.SystemError({
          reason: "NotFound",
          module: "FileSystem",
          method: "readFile",
          pathOrDescriptor: path
        })
      )
      : Effect.succeed(bytes)
  }
})

// =============================================================================
// inspect
// =============================================================================

describe("inspect", () => {
  it.effect("resolves the root table and its vtable", ({ expect }) =>
    Effect.gen(function*() {
      const inspection = yield* inspectFile("plain.bin", false)

      expect(inspection.rootOffset).toBe(12)
      expect(inspection.tablePosition).toBe(12)
      expect(inspection.vtable).toEqual({ position: 6, size: 6, objectSize: 8 })
      expect(inspection.slotOffsets).toEqual([4])
      expect(Option.isNone(inspection.identifier)).toBe(true)
    }).pipe(Effect.provide(InMemoryFileSystem)))

  it.effect("formats the inspection as aligned lines", ({ expect }) =>
    Effect.gen(function*() {
      const inspection = yield* inspectFile("plain.bin", false)

      expect(Inspection.format(inspection)).toEqual([
        "bytes:           20",
        "root offset:     12",
        "file identifier: (none)",
        "root table:      12",
        "vtable:          6 (size 6, object size 8)",
        "  slot 0: 4"
      ])
    }).pipe(Effect.provide(InMemoryFileSystem)))

  it.effect("reads the identifier and size prefix", ({ expect }) =>
    Effect.gen(function*() {
      const inspection = yield* inspectFile("prefixed.bin", true)

      expect(inspection.sizePrefix).toEqual(Option.some(24))
      expect(inspection.identifier).toEqual(Option.some("TEST"))
      expect(inspection.rootOffset).toBe(16)
      expect(inspection.tablePosition).toBe(20)
    }).pipe(Effect.provide(InMemoryFileSystem)))

  it.effect("fails on a file shorter than the root offset", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(inspectFile("short.bin", true))

      expect(error._tag).toBe("TruncatedInputError")
      expect(error.message).toBe("short.bin is 6 bytes long, shorter than the 8-byte header")
    }).pipe(Effect.provide(InMemoryFileSystem)))

  it.effect("fails with a bounds violation on a corrupted buffer", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(inspectFile("short.bin", false))

      expect(error._tag).toBe("BoundsViolationError")
    }).pipe(Effect.provide(InMemoryFileSystem)))

  it.effect("fails on a missing file", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(inspectFile("missing.bin", false))

      expect(error._tag).toBe("SystemError")
    }).pipe(Effect.provide(InMemoryFileSystem)))
})

// =============================================================================
// identify
// =============================================================================

describe("identify", () => {
  it.effect("matches the identifier written at finish", ({ expect }) =>
    Effect.gen(function*() {
      expect(yield* identifyFile("identified.bin", "TEST", false)).toBe(true)
      expect(yield* identifyFile("identified.bin", "NOPE", false)).toBe(false)
      expect(yield* identifyFile("prefixed.bin", "TEST", true)).toBe(true)
    }).pipe(Effect.provide(InMemoryFileSystem)))

  it.effect("fails on a file too short to hold an identifier", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(identifyFile("short.bin", "TEST", false))

      expect(error.message).toBe("short.bin is 6 bytes long, shorter than the 8-byte header")
    }).pipe(Effect.provide(InMemoryFileSystem)))
})
