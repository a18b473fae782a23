/**
 * Union descriptors.
 *
 * A union field occupies two consecutive slots: a `uint8` discriminant and an
 * offset to a table of the selected member type. The discriminant `0`
 * (`NONE`) means the union is absent.
 *
 * @module
 */
import type { TypeRef, UnionDescriptor, UnionMember } from "./types.ts"

export const NONE = 0

/**
 * Creates a union descriptor. Members are assigned discriminants `1..n` in
 * declaration order, matching the schema compiler's numbering.
 *
 * @example
 * ```typescript
 * const Shape = Union.make("Shape", [["Circle", "Circle"], ["Square", SquareDescriptor]])
 * ```
 */
export const make = (
  name: string,
  members: ReadonlyArray<readonly [string, TypeRef]>
): UnionDescriptor => ({
  _tag: "UnionDescriptor",
  name,
  members: members.map(([memberName, type], index) => ({ tag: index + 1, name: memberName, type }))
})

export const memberByTag = (union: UnionDescriptor, tag: number): UnionMember | undefined =>
  union.members.find((member) => member.tag === tag)

export const memberByName = (union: UnionDescriptor, name: string): UnionMember | undefined =>
  union.members.find((member) => member.name === name)
