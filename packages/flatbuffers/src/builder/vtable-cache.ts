import type { VTableOffset } from "../core/types.ts"

/**
 * Deduplicates byte-identical vtables within a single build session.
 *
 * Candidates are compared on their serialized content, so two objects of
 * different types that happen to share a field layout also share a vtable,
 * exactly as other FlatBuffers implementations do.
 */
export class VTableCache {
  private readonly vtables: Map<string, VTableOffset> = new Map()

  /**
   * The number of distinct vtables committed in this session.
   */
  get size(): number {
    return this.vtables.size
  }

  /**
   * Returns the offset of a previously committed vtable with the same content
   * as `candidate`, or commits the candidate through `commit` and registers it.
   */
  lookupOrInsert(candidate: Uint8Array, commit: (candidate: Uint8Array) => VTableOffset): VTableOffset {
    const key = Array.from(candidate).join(",")
    const existing = this.vtables.get(key)
    if (existing !== undefined) {
      return existing
    }
    const offset = commit(candidate)
    this.vtables.set(key, offset)
    return offset
  }

  clear(): void {
    this.vtables.clear()
  }
}
