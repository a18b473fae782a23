/**
 * Alignment bookkeeping for a build session.
 *
 * @module
 */

/**
 * Returns the number of padding bytes needed so that, after `additionalBytes`
 * more bytes have been written on top of `written` bytes, the next write of
 * `size` bytes lands on a multiple of `size` measured from the buffer end.
 *
 * `size` must be a power of two.
 */
export const paddingFor = (written: number, additionalBytes: number, size: number): number =>
  (~(written + additionalBytes) + 1) & (size - 1)

/**
 * Tracks the largest alignment requested during a build session (the
 * "minalign"). The finished buffer's start is aligned to it, so a consumer
 * that maps the buffer at an address aligned to `minalign` sees every scalar
 * at its natural alignment.
 */
export class AlignmentTracker {
  private current = 1

  get minalign(): number {
    return this.current
  }

  observe(alignment: number): void {
    if (alignment > this.current) {
      this.current = alignment
    }
  }

  reset(): void {
    this.current = 1
  }
}
