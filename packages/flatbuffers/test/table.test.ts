/**
 * Tests for zero-copy table access and bounds checking.
 *
 * @module
 */
import { encode } from "@flatwire/flatbuffers/codec/encoder"
import {
  BoundsViolationError,
  InvalidSlotError,
  InvalidVTableError,
  SlotWidthMismatchError,
  UnknownUnionTagError
} from "@flatwire/flatbuffers/core/errors"
import { Table } from "@flatwire/flatbuffers/table/table"
import { describe, expect, it } from "vitest"
import { Example, Monster, Weapon } from "./harness/schemas.ts"

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * `{ x: 2 }` encoded against `Example`: root offset at 0, vtable at 6,
 * table at 12, x at 16.
 */
const example = (): Uint8Array => encode({ x: 2 }, Example)

const corrupt = (bytes: Uint8Array, position: number, ...values: ReadonlyArray<number>): Uint8Array => {
  const copy = bytes.slice()
  copy.set(values, position)
  return copy
}

const orc = () =>
  encode({
    pos: { x: 1, y: 2, z: 3 },
    hp: 300,
    name: "orc",
    inventory: [0, 1, 2, 3, 4],
    weapons: [{ name: "sword", damage: 3 }, { name: "axe", damage: 5 }],
    equipped: { type: "Weapon", value: { name: "axe", damage: 5 } },
    tags: []
  }, Monster)

// =============================================================================
// Field Access
// =============================================================================

describe("Table fields", () => {
  it("reads present scalars and defaults for absent ones", () => {
    const monster = Table.root(orc(), Monster)

    expect(monster.get("hp")).toBe(300)
    expect(monster.get("mana")).toBe(150)
    expect(monster.has("hp")).toBe(true)
    expect(monster.has("mana")).toBe(false)
  })

  it("reads strings and their raw bytes", () => {
    const monster = Table.root(orc(), Monster)

    expect(monster.string("name")).toBe("orc")
    expect(Array.from(monster.stringBytes("name") ?? [])).toEqual([111, 114, 99])
  })

  it("reads structs inline", () => {
    expect(Table.root(orc(), Monster).struct("pos")).toEqual({ x: 1, y: 2, z: 3 })
  })

  it("returns null for absent indirect fields", () => {
    const monster = Table.root(encode({ name: "bare" }, Monster), Monster)

    expect(monster.struct("pos")).toBeNull()
    expect(monster.vector("weapons")).toBeNull()
    expect(monster.bytes("inventory")).toBeNull()
    expect(monster.union("equipped")).toBeNull()
    expect(monster.get("equipped_type")).toBe(0)
  })

  it("reads vectors lazily and restartably", () => {
    const inventory = Table.root(orc(), Monster).vector("inventory")

    expect(inventory?.length).toBe(5)
    expect(inventory?.get(3)).toBe(3)
    expect(inventory === null ? [] : [...inventory]).toEqual([0, 1, 2, 3, 4])
    expect(inventory?.toArray()).toEqual([0, 1, 2, 3, 4])
  })

  it("reads empty vectors", () => {
    const tags = Table.root(orc(), Monster).vector("tags")

    expect(tags?.length).toBe(0)
    expect(tags?.toArray()).toEqual([])
  })

  it("exposes byte vectors without copying", () => {
    const bytes = orc()
    const inventory = Table.root(bytes, Monster).bytes("inventory")

    expect(inventory?.buffer).toBe(bytes.buffer)
    expect(Array.from(inventory ?? [])).toEqual([0, 1, 2, 3, 4])
  })

  it("reads vectors of tables", () => {
    const weapons = Table.root(orc(), Monster).vector("weapons")?.toArray() ?? []

    expect(weapons.map((w) => w instanceof Table ? w.string("name") : null)).toEqual(["sword", "axe"])
  })

  it("resolves union members", () => {
    const equipped = Table.root(orc(), Monster).union("equipped")

    expect(equipped?.member.name).toBe("Weapon")
    expect(equipped?.table.string("name")).toBe("axe")
    expect(equipped?.table.get("damage")).toBe(5)
  })

  it("rejects accessors that do not match the field type", () => {
    const monster = Table.root(orc(), Monster)

    expect(() => monster.string("hp")).toThrow(InvalidSlotError)
    expect(() => monster.get("speed")).toThrow("Monster has no field 'speed'")
  })

  it("rejects vector indices out of range", () => {
    const inventory = Table.root(orc(), Monster).vector("inventory")

    expect(() => inventory?.get(5)).toThrow(BoundsViolationError)
  })
})

// =============================================================================
// Identifiers
// =============================================================================

describe("Table.hasIdentifier", () => {
  it("matches the identifier written at finish", () => {
    const bytes = orc()

    expect(Table.hasIdentifier(bytes, "MONS")).toBe(true)
    expect(Table.hasIdentifier(bytes, "WEAP")).toBe(false)
  })

  it("returns false for buffers too short to hold an identifier", () => {
    expect(Table.hasIdentifier(Uint8Array.of(4, 0, 0, 0), "MONS")).toBe(false)
  })
})

// =============================================================================
// Bounds
// =============================================================================

describe("Table bounds checking", () => {
  it("rejects a root offset beyond the buffer", () => {
    expect(() => Table.root(corrupt(example(), 0, 200), Example)).toThrow(BoundsViolationError)
  })

  it("rejects a corrupted back-reference to the vtable", () => {
    const bytes = corrupt(example(), 12, 0xff, 0xff, 0xff, 0x7f)

    expect(() => Table.root(bytes, Example)).toThrow(BoundsViolationError)
  })

  it("rejects an object size beyond the buffer", () => {
    expect(() => Table.root(corrupt(example(), 8, 200), Example)).toThrow(BoundsViolationError)
  })

  it("rejects a field offset pointing outside the buffer", () => {
    const table = Table.root(corrupt(example(), 10, 40), Example)

    expect(() => table.get("x")).toThrow(BoundsViolationError)
  })

  it("rejects a field wider than the object its vtable declares", () => {
    const table = Table.root(corrupt(example(), 8, 4), Example)

    expect(table.objectSize).toBe(4)
    expect(() => table.get("x")).toThrow(SlotWidthMismatchError)
  })

  it("rejects a corrupted string offset", () => {
    const bytes = encode({ name: "sword" }, Weapon)
    const weapon = Table.root(bytes, Weapon)
    const position = weapon.position + weapon.fieldOffset("name")

    const tampered = Table.root(corrupt(bytes, position, 0xff, 0xff, 0xff, 0x7f), Weapon)
    expect(() => tampered.string("name")).toThrow(BoundsViolationError)
  })

  it("rejects a vtable with an odd size", () => {
    expect(() => Table.root(corrupt(example(), 6, 5), Example)).toThrow(InvalidVTableError)
  })

  it("rejects a truncated buffer", () => {
    expect(() => Table.root(example().subarray(0, 14), Example)).toThrow(BoundsViolationError)
  })

  it("rejects a size prefix larger than the buffer", () => {
    const bytes = Uint8Array.of(64, 0, 0, 0, ...example())

    expect(() => Table.sizePrefixedRoot(bytes, Example)).toThrow(BoundsViolationError)
  })

  it("rejects unknown union discriminants", () => {
    const bytes = orc()
    const monster = Table.root(bytes, Monster)
    const tagPosition = monster.position + monster.fieldOffset("equipped_type")

    const tampered = Table.root(corrupt(bytes, tagPosition, 9), Monster)
    expect(() => tampered.union("equipped")).toThrow(UnknownUnionTagError)
  })
})
