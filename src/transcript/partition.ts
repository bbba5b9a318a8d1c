import { IndexRangeError } from "../errors.js"

/**
 * Sequence of chunk sizes stored as cumulative offsets, so that "which chunk holds position P"
 * is a binary search. `locs[0]` is always 0 and `locs` never decreases.
 *
 * Mutations shift every offset after the touched chunk; chunk counts follow transcript records,
 * not characters, so the suffix walk stays short.
 */
export class Partition {
  private readonly locs: number[] = [0]

  /** Number of chunks. */
  get length(): number {
    return this.locs.length - 1
  }

  /** Sum of all chunk sizes. */
  get total(): number {
    return this.locs[this.locs.length - 1]
  }

  get(index: number): number {
    const i = this.checkIndex(index)
    return this.locs[i + 1] - this.locs[i]
  }

  set(index: number, size: number): void {
    const i = this.checkIndex(index)
    assertSize(size)
    this.shift(i + 1, size - (this.locs[i + 1] - this.locs[i]))
  }

  delete(index: number): void {
    const i = this.checkIndex(index)
    const size = this.locs[i + 1] - this.locs[i]
    this.locs.splice(i + 1, 1)
    this.shift(i + 1, -size)
  }

  append(size: number): void {
    assertSize(size)
    this.locs.push(this.total + size)
  }

  /** Insert a chunk before chunk `index`. */
  insert(index: number, size: number): void {
    const i = this.checkIndex(index)
    assertSize(size)
    this.locs.splice(i, 0, this.locs[i])
    this.shift(i + 1, size)
  }

  /**
   * Leftmost chunk index whose start offset is at or past `pos`. A position strictly inside a
   * chunk resolves to the chunk after it; callers wanting the containing chunk look one back.
   */
  findLoc(pos: number): number {
    let lo = 0
    let hi = this.locs.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (this.locs[mid] < pos) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }
    return lo
  }

  first(index: number): number {
    return this.locs[this.checkIndex(index)]
  }

  /** Inclusive end offset; `first - 1` for an empty chunk. */
  last(index: number): number {
    return this.locs[this.checkIndex(index) + 1] - 1
  }

  offsets(): number[] {
    return [...this.locs]
  }

  private checkIndex(index: number): number {
    const length = this.length
    if (!Number.isInteger(index) || index < -length || index >= length) {
      throw new IndexRangeError(index, length)
    }
    return index < 0 ? index + length : index
  }

  private shift(start: number, delta: number): void {
    if (delta === 0) return
    for (let i = start; i < this.locs.length; i += 1) {
      this.locs[i] += delta
    }
  }
}

const assertSize = (size: number): void => {
  if (!Number.isInteger(size) || size < 0) {
    throw new RangeError(`chunk size must be a non-negative integer, got ${size}`)
  }
}
