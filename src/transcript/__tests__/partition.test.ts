import { describe, it, expect } from "vitest"
import { IndexRangeError } from "../../errors.js"
import { Log, makeRecord } from "../log.js"
import { Partition } from "../partition.js"

const build = (sizes: number[]): Partition => {
  const partition = new Partition()
  sizes.forEach((size) => partition.append(size))
  return partition
}

describe("Partition", () => {
  it("keeps cumulative offsets through every mutation", () => {
    const partition = build([3, 0, 2])
    expect(partition.offsets()).toEqual([0, 3, 3, 5])
    partition.insert(1, 4)
    expect(partition.offsets()).toEqual([0, 3, 7, 7, 9])
    partition.set(2, 1)
    expect(partition.offsets()).toEqual([0, 3, 7, 8, 10])
    partition.delete(0)
    expect(partition.offsets()).toEqual([0, 4, 5, 7])
    expect(partition.length).toBe(3)
    expect(partition.total).toBe(7)
    expect([0, 1, 2].map((index) => partition.get(index))).toEqual([4, 1, 2])
  })

  it("restores its offsets when an inserted chunk is deleted again", () => {
    const sizes = [3, 0, 2, 5]
    const expected = build(sizes).offsets()
    for (let index = 0; index < sizes.length; index += 1) {
      for (const size of [0, 4]) {
        const partition = build(sizes)
        partition.insert(index, size)
        expect(partition.get(index)).toBe(size)
        partition.delete(index)
        expect(partition.offsets()).toEqual(expected)
      }
    }
  })

  it("reports first and inclusive last offsets per chunk", () => {
    const partition = build([2, 0, 3])
    expect(partition.first(0)).toBe(0)
    expect(partition.last(0)).toBe(1)
    expect(partition.first(1)).toBe(2)
    expect(partition.last(1)).toBe(1)
    expect(partition.first(2)).toBe(2)
    expect(partition.last(2)).toBe(4)
  })

  it("finds the leftmost chunk starting at or after a position", () => {
    const partition = build([2, 0, 3])
    expect(partition.findLoc(0)).toBe(0)
    expect(partition.findLoc(1)).toBe(1)
    expect(partition.findLoc(2)).toBe(1)
    expect(partition.findLoc(3)).toBe(3)
    expect(partition.findLoc(5)).toBe(3)
    expect(partition.findLoc(6)).toBe(4)
  })

  it("places every position at a chunk start or inside the preceding chunk", () => {
    const partition = build([1, 4, 0, 0, 2, 5, 0, 3])
    const locs = partition.offsets()
    for (let pos = 0; pos <= partition.total; pos += 1) {
      const index = partition.findLoc(pos)
      const startsHere = locs[index] === pos
      const insidePrevious = index > 0 && locs[index - 1] < pos && pos <= locs[index]
      expect(startsHere || insidePrevious).toBe(true)
    }
  })

  it("supports negative indices from the end", () => {
    const partition = build([5, 6, 7])
    expect(partition.get(-1)).toBe(7)
    partition.set(-3, 1)
    expect(partition.offsets()).toEqual([0, 1, 7, 14])
  })

  it("rejects indices outside the list", () => {
    const partition = build([1, 1, 1])
    expect(() => partition.get(3)).toThrow(IndexRangeError)
    expect(() => partition.get(3)).toThrow("index 3 out of range in list of size 3")
    expect(() => partition.delete(-4)).toThrow(IndexRangeError)
    expect(() => partition.insert(3, 1)).toThrow(IndexRangeError)
    expect(() => new Partition().first(0)).toThrow(IndexRangeError)
  })

  it("rejects negative chunk sizes", () => {
    const partition = build([1])
    expect(() => partition.append(-1)).toThrow(RangeError)
    expect(() => partition.set(0, 1.5)).toThrow(RangeError)
    expect(partition.offsets()).toEqual([0, 1])
  })

  it("tracks line counts of appended records", () => {
    const log = new Log()
    log.append(makeRecord("input", "IN[0]: \n", "x = 1\n"))
    log.append(makeRecord("input", "...: \n", "y = 2\n"))
    log.append(makeRecord("output", "", "3"))
    expect([0, 1, 2].map((index) => log.linenos.get(index))).toEqual([1, 1, 0])
    expect(log.linenos.findLoc(0)).toBe(0)
  })
})
