import { IndexRangeError, InvariantError } from "../errors.js"
import { Partition } from "./partition.js"

export type RecordDomain = "input" | "output" | "stdout" | "stdin" | "raw" | "control"

export interface LogRecord {
  readonly domain: RecordDomain
  /** Gutter text shown beside the record; one line per "\n". */
  readonly prompt: string
  readonly text: string
}

export interface RecordLocation {
  readonly index: number
  readonly record: LogRecord
  /** 0-based line (or character) offset inside the record. */
  readonly offset: number
}

export const makeRecord = (domain: RecordDomain, prompt: string, text: string): LogRecord => ({ domain, prompt, text })

export const countLineBreaks = (value: string): number => {
  let count = 0
  for (let index = value.indexOf("\n"); index !== -1; index = value.indexOf("\n", index + 1)) {
    count += 1
  }
  return count
}

export const recordLineCount = (record: LogRecord): number => countLineBreaks(record.prompt)

const DEBUG_INVARIANTS = process.env.CONSOLEKIT_DEBUG_INVARIANTS === "1"

/**
 * Transcript records plus two partitions kept in lockstep: `linenos` (rendered lines per record)
 * and `positions` (characters per record). Every mutation touches all three.
 */
export class Log {
  private readonly items: LogRecord[] = []
  readonly linenos = new Partition()
  readonly positions = new Partition()

  get length(): number {
    return this.items.length
  }

  get totalLines(): number {
    return this.linenos.total
  }

  get totalChars(): number {
    return this.positions.total
  }

  at(index: number): LogRecord {
    return this.items[this.checkIndex(index)]
  }

  records(): readonly LogRecord[] {
    return this.items
  }

  append(record: LogRecord): void {
    this.items.push(record)
    this.linenos.append(recordLineCount(record))
    this.positions.append(record.text.length)
    this.afterMutation()
  }

  /** Insert before the record at `index`. */
  insert(index: number, record: LogRecord): void {
    const i = this.checkIndex(index)
    this.items.splice(i, 0, record)
    this.linenos.insert(i, recordLineCount(record))
    this.positions.insert(i, record.text.length)
    this.afterMutation()
  }

  set(index: number, record: LogRecord): void {
    const i = this.checkIndex(index)
    this.items[i] = record
    this.linenos.set(i, recordLineCount(record))
    this.positions.set(i, record.text.length)
    this.afterMutation()
  }

  delete(index: number): void {
    const i = this.checkIndex(index)
    this.items.splice(i, 1)
    this.linenos.delete(i)
    this.positions.delete(i)
    this.afterMutation()
  }

  /** Record whose prompt covers rendered line `line`, with the line offset inside that prompt. */
  findRecordForLine(line: number): RecordLocation {
    return this.locate(this.linenos, line, "line")
  }

  /** Record whose text covers character `pos`. */
  findRecordForPosition(pos: number): RecordLocation {
    return this.locate(this.positions, pos, "position")
  }

  checkInvariants(): void {
    const count = this.items.length
    if (this.linenos.length !== count || this.positions.length !== count) {
      throw new InvariantError(
        `log out of sync: ${count} records, ${this.linenos.length} line chunks, ${this.positions.length} position chunks`,
      )
    }
    this.items.forEach((record, index) => {
      if (this.linenos.get(index) !== recordLineCount(record) || this.positions.get(index) !== record.text.length) {
        throw new InvariantError(`log chunk ${index} does not match its record`)
      }
    })
  }

  private locate(partition: Partition, value: number, what: string): RecordLocation {
    if (!Number.isInteger(value) || value < 0 || value >= partition.total) {
      throw new IndexRangeError(value, partition.total, what)
    }
    // first chunk starting past `value`, minus one, is the non-empty chunk containing it
    const index = partition.findLoc(value + 1) - 1
    return { index, record: this.items[index], offset: value - partition.first(index) }
  }

  private checkIndex(index: number): number {
    const length = this.items.length
    if (!Number.isInteger(index) || index < -length || index >= length) {
      throw new IndexRangeError(index, length)
    }
    return index < 0 ? index + length : index
  }

  private afterMutation(): void {
    if (DEBUG_INVARIANTS) this.checkInvariants()
  }
}
