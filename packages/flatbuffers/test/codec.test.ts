/**
 * Round-trip and validation tests for the descriptor-driven codec.
 *
 * @module
 */
import { describe, it } from "@effect/vitest"
import type { Builder } from "@flatwire/flatbuffers/builder/builder"
import { deserialize } from "@flatwire/flatbuffers/codec/decoder"
import { serialize } from "@flatwire/flatbuffers/codec/encoder"
import type { Serializable } from "@flatwire/flatbuffers/codec/values"
import type { AnyScalarValue, ScalarKind } from "@flatwire/flatbuffers/core/scalars"
import * as Descriptor from "@flatwire/flatbuffers/descriptor/descriptor"
import * as Field from "@flatwire/flatbuffers/descriptor/field"
import * as Struct from "@flatwire/flatbuffers/descriptor/struct"
import { Table } from "@flatwire/flatbuffers/table/table"
import * as Effect from "effect/Effect"
import { Example, Mixed, Monster, TreeNode, TreeRegistry, Vec3, Weapon } from "./harness/schemas.ts"

// =============================================================================
// Test Helpers
// =============================================================================

const scalarCases: ReadonlyArray<readonly [ScalarKind, ReadonlyArray<AnyScalarValue>]> = [
  ["bool", [false, true]],
  ["int8", [0, -1, -128, 127]],
  ["uint8", [0, 1, 255]],
  ["int16", [0, -1, -32768, 32767]],
  ["uint16", [0, 1, 65535]],
  ["int32", [0, -1, -2147483648, 2147483647]],
  ["uint32", [0, 1, 4294967295]],
  ["int64", [0n, -1n, -(2n ** 63n), 2n ** 63n - 1n]],
  ["uint64", [0n, 1n, 2n ** 64n - 1n]],
  ["float32", [0, -1, 1.5, 3.4028234663852886e38, -3.4028234663852886e38]],
  ["float64", [0, -1, 0.1, Number.MAX_VALUE, -Number.MAX_VALUE]]
]

const dagger: Serializable = {
  pack: (builder: Builder) => {
    const name = builder.createString("dagger")
    builder.startObject(Weapon)
    builder.addOffset(0, name)
    builder.addFieldInt16(1, 7, 0)
    return builder.endObject()
  }
}

// =============================================================================
// Round Trips
// =============================================================================

describe("Codec scalars", () => {
  for (const [kind, values] of scalarCases) {
    const Holder = Descriptor.make("Holder", [Field.scalar("v", kind)])

    it.effect(`round-trips ${kind} values`, ({ expect }) =>
      Effect.gen(function*() {
        for (const v of values) {
          const bytes = yield* serialize({ v }, Holder)
          const decoded = yield* deserialize(bytes, Holder)
          expect(decoded).toEqual({ v })
        }
      }))
  }
})

describe("Codec tables", () => {
  it.effect("round-trips a table with every field kind", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize({
        pos: { x: 1, y: 2, z: 3 },
        hp: 300,
        name: "orc",
        inventory: [0, 1, 2, 3, 4],
        weapons: [{ name: "sword", damage: 3 }, { name: "axe", damage: 5 }],
        equipped: { type: "Weapon", value: { name: "axe", damage: 5 } },
        path: [{ x: 1, y: 2, z: 3 }, { x: 4, y: 5, z: 6 }],
        tags: ["a", "b"]
      }, Monster)

      const decoded = yield* deserialize(bytes, Monster)
      expect(decoded).toEqual({
        pos: { x: 1, y: 2, z: 3 },
        mana: 150,
        hp: 300,
        name: "orc",
        inventory: [0, 1, 2, 3, 4],
        weapons: [{ name: "sword", damage: 3 }, { name: "axe", damage: 5 }],
        equipped: { type: "Weapon", value: { name: "axe", damage: 5 } },
        path: [{ x: 1, y: 2, z: 3 }, { x: 4, y: 5, z: 6 }],
        tags: ["a", "b"]
      })
    }))

  it.effect("decodes absent fields as defaults and null", ({ expect }) =>
    Effect.gen(function*() {
      const decoded = yield* deserialize(yield* serialize({ name: "bare" }, Monster), Monster)

      expect(decoded).toEqual({
        pos: null,
        mana: 150,
        hp: 100,
        name: "bare",
        inventory: null,
        weapons: null,
        equipped: null,
        path: null,
        tags: null
      })
    }))

  it.effect("round-trips empty vectors", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize({ name: "e", inventory: [], weapons: [], path: [], tags: [] }, Monster)
      const decoded = yield* deserialize(bytes, Monster)

      expect(decoded["inventory"]).toEqual([])
      expect(decoded["weapons"]).toEqual([])
      expect(decoded["path"]).toEqual([])
      expect(decoded["tags"]).toEqual([])
    }))

  it.effect("accepts byte arrays for uint8 vectors", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize({ name: "b", inventory: Uint8Array.of(9, 8) }, Monster)

      expect((yield* deserialize(bytes, Monster))["inventory"]).toEqual([9, 8])
    }))

  it.effect("resolves recursive tables through the registry", ({ expect }) =>
    Effect.gen(function*() {
      const tree = {
        value: 1,
        children: [
          { value: 2, children: [{ value: 4 }] },
          { value: 3 }
        ]
      }
      const bytes = yield* serialize(tree, TreeNode, { registry: TreeRegistry })
      const decoded = yield* deserialize(bytes, TreeNode, { registry: TreeRegistry })

      expect(decoded).toEqual({
        value: 1,
        children: [
          { value: 2, children: [{ value: 4, children: null }] },
          { value: 3, children: null }
        ]
      })
    }))

  it.effect("round-trips size-prefixed buffers", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize({ x: 5 }, Example, { sizePrefixed: true })

      expect(bytes[0]).toBe(bytes.byteLength - 4)
      expect(yield* deserialize(bytes, Example, { sizePrefixed: true })).toEqual({ x: 5 })
    }))

  it.effect("writes the descriptor's file identifier", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize({ name: "orc" }, Monster)

      expect(Table.hasIdentifier(bytes, "MONS")).toBe(true)
    }))

  it.effect("encodes a scalar equal to its default in a smaller buffer", ({ expect }) =>
    Effect.gen(function*() {
      const explicit = yield* serialize({ x: 2 }, Example)
      const defaulted = yield* serialize({ x: 1 }, Example)

      expect(explicit.byteLength).toBe(20)
      expect(defaulted.byteLength).toBeLessThan(explicit.byteLength)
      expect(Table.root(defaulted, Example).fieldOffset("x")).toBe(0)
    }))

  it.effect("aligns every scalar to its width", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize({ a: true, b: 2n, c: 3, d: 4.5, e: 5, f: 6, g: 7n, h: 8.5 }, Mixed)
      const table = Table.root(bytes, Mixed)

      expect(bytes.byteLength % 8).toBe(0)
      for (const slot of Mixed.slots) {
        const fieldOffset = table.fieldOffset(slot.index)
        expect(fieldOffset).not.toBe(0)
        expect((table.position + fieldOffset) % slot.size).toBe(0)
      }
    }))
})

// =============================================================================
// Serializable Values
// =============================================================================

describe("Codec serializable values", () => {
  it.effect("packs a root value with its own logic", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize(dagger, Weapon)

      expect(yield* deserialize(bytes, Weapon)).toEqual({ name: "dagger", damage: 7 })
    }))

  it.effect("packs nested values with their own logic", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = yield* serialize({ name: "orc", weapons: [dagger, { name: "club", damage: 1 }] }, Monster)
      const decoded = yield* deserialize(bytes, Monster)

      expect(decoded["weapons"]).toEqual([{ name: "dagger", damage: 7 }, { name: "club", damage: 1 }])
    }))
})

// =============================================================================
// Validation
// =============================================================================

describe("Codec validation", () => {
  it.effect("rejects non-integer values for integer fields", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ name: "x", hp: 1.5 }, Monster))

      expect(error._tag).toBe("InvalidValueError")
      expect(error.message).toBe("Invalid value for Monster.hp: 1.5 is not an integer")
    }))

  it.effect("rejects integers outside the field's range", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ name: "x", hp: 40000 }, Monster))

      expect(error.message).toBe("Invalid value for Monster.hp: 40000 is outside the int16 range")
    }))

  it.effect("rejects numbers for 64-bit fields", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ b: 1 }, Mixed))

      expect(error.message).toBe("Invalid value for Mixed.b: expected a bigint")
    }))

  it.effect("rejects values of the wrong type for strings", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ name: 5 }, Monster))

      expect(error.message).toBe("Invalid value for Monster.name: expected a string")
    }))

  it.effect("rejects unknown fields", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ name: "x", speed: 1 }, Monster))

      expect(error.message).toBe("Invalid value for Monster.speed: unknown field")
    }))

  it.effect("rejects values for deprecated fields", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ name: "x", friendly: true }, Monster))

      expect(error.message).toBe("Invalid value for Monster.friendly: field is deprecated")
    }))

  it.effect("rejects incomplete structs", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ name: "x", pos: { x: 1, y: 2 } }, Monster))

      expect(error.message).toBe("Invalid value for Vec3.z: struct fields are required")
    }))

  it.effect("rejects unknown union members", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ name: "x", equipped: { type: "Shield", value: {} } }, Monster))

      expect(error.message).toBe("Invalid value for Monster.equipped: 'Shield' is not a member of Equipment")
    }))

  it.effect("ignores inherited members when a field shares their name", ({ expect }) =>
    Effect.gen(function*() {
      const Named = Descriptor.make("Named", [
        Field.int32("constructor"),
        Field.int32("valueOf"),
        Field.struct("toString", Vec3)
      ])

      expect(yield* deserialize(yield* serialize({}, Named), Named)).toEqual({
        constructor: 0,
        valueOf: 0,
        toString: null
      })
    }))

  it.effect("requires struct fields named like inherited members", ({ expect }) =>
    Effect.gen(function*() {
      const Pair = Struct.make("Pair", [["constructor", "int32"], ["y", "int32"]])
      const Holder = Descriptor.make("Holder", [Field.struct("pair", Pair)])
      const error = yield* Effect.flip(serialize({ pair: { y: 1 } }, Holder))

      expect(error.message).toBe("Invalid value for Pair.constructor: struct fields are required")
    }))

  it.effect("fails when a required field is missing", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ hp: 10 }, Monster))

      expect(error._tag).toBe("RequiredFieldError")
    }))

  it.effect("fails when a named type is not registered", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(serialize({ value: 1, children: [] }, TreeNode))

      expect(error._tag).toBe("UnresolvedTypeError")
      expect(error.message).toBe("Type 'TreeNode' is not registered")
    }))
})

// =============================================================================
// Decode Failures
// =============================================================================

describe("Codec decode failures", () => {
  it.effect("fails with a bounds violation for a corrupted root offset", ({ expect }) =>
    Effect.gen(function*() {
      const bytes = (yield* serialize({ x: 2 }, Example)).slice()
      bytes[0] = 200

      const error = yield* Effect.flip(deserialize(bytes, Example))
      expect(error._tag).toBe("BoundsViolationError")
    }))

  it.effect("fails with a bounds violation for an empty buffer", ({ expect }) =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(deserialize(new Uint8Array(0), Example))

      expect(error._tag).toBe("BoundsViolationError")
    }))
})
