import { ConsoleError, StreamOverflowError } from "../errors.js"

export type WaitResult = "ok" | "not-equal" | "timed-out"

/**
 * FIFO text store behind a stream. Every operation runs under the backlog's lock; the change
 * sequence increases on every write, close and wake so that waiters can detect missed signals.
 */
export interface Backlog {
  /** True when another thread can block on `waitForChange`. */
  readonly waitable: boolean
  readonly closed: boolean
  write(data: string): void
  /** Next complete line without its "\n", or undefined when none is buffered. */
  takeLine(): string | undefined
  drain(): string
  close(): void
  sequence(): number
  bump(): void
  waitForChange(seen: number, timeoutMs?: number): WaitResult
}

/** Single-thread backlog; the event loop already serialises access. */
export class LocalBacklog implements Backlog {
  readonly waitable = false
  private buffer = ""
  private seq = 0
  private isClosed = false

  get closed(): boolean {
    return this.isClosed
  }

  write(data: string): void {
    this.buffer += data
    this.seq += 1
  }

  takeLine(): string | undefined {
    const index = this.buffer.indexOf("\n")
    if (index === -1) return undefined
    const line = this.buffer.slice(0, index)
    this.buffer = this.buffer.slice(index + 1)
    return line
  }

  drain(): string {
    const data = this.buffer
    this.buffer = ""
    return data
  }

  close(): void {
    this.isClosed = true
    this.seq += 1
  }

  sequence(): number {
    return this.seq
  }

  bump(): void {
    this.seq += 1
  }

  waitForChange(): WaitResult {
    throw new ConsoleError("a local backlog cannot be waited on; use the cooperative readline")
  }
}

const LOCK = 0
const SEQ = 1
const CLOSED = 2
const LENGTH = 3
const HEADER_WORDS = 4
const HEADER_BYTES = HEADER_WORDS * Int32Array.BYTES_PER_ELEMENT
const NEWLINE = 0x0a

export const DEFAULT_SHARED_CAPACITY = 64 * 1024

export const createSharedBacklogBuffer = (capacity = DEFAULT_SHARED_CAPACITY): SharedArrayBuffer =>
  new SharedArrayBuffer(HEADER_BYTES + capacity)

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Backlog living in a SharedArrayBuffer so a worker thread can block on it while the foreground
 * writes. Layout: `[lock, seq, closed, length]` as Int32 words, then UTF-8 bytes.
 */
export class SharedBacklog implements Backlog {
  readonly waitable = true
  readonly buffer: SharedArrayBuffer
  private readonly header: Int32Array
  private readonly bytes: Uint8Array

  constructor(buffer: SharedArrayBuffer = createSharedBacklogBuffer()) {
    if (buffer.byteLength <= HEADER_BYTES) {
      throw new ConsoleError(`shared backlog needs more than ${HEADER_BYTES} bytes`)
    }
    this.buffer = buffer
    this.header = new Int32Array(buffer, 0, HEADER_WORDS)
    this.bytes = new Uint8Array(buffer, HEADER_BYTES)
  }

  get capacity(): number {
    return this.bytes.length
  }

  get closed(): boolean {
    return Atomics.load(this.header, CLOSED) === 1
  }

  write(data: string): void {
    if (data.length === 0) return
    const encoded = encoder.encode(data)
    this.withLock(() => {
      const length = Atomics.load(this.header, LENGTH)
      if (length + encoded.length > this.bytes.length) {
        throw new StreamOverflowError(encoded.length, this.bytes.length)
      }
      this.bytes.set(encoded, length)
      Atomics.store(this.header, LENGTH, length + encoded.length)
    })
    this.bump()
  }

  takeLine(): string | undefined {
    return this.withLock(() => {
      const length = Atomics.load(this.header, LENGTH)
      const index = this.bytes.subarray(0, length).indexOf(NEWLINE)
      if (index === -1) return undefined
      const line = decoder.decode(this.bytes.slice(0, index))
      this.bytes.copyWithin(0, index + 1, length)
      Atomics.store(this.header, LENGTH, length - index - 1)
      return line
    })
  }

  drain(): string {
    return this.withLock(() => {
      const length = Atomics.load(this.header, LENGTH)
      Atomics.store(this.header, LENGTH, 0)
      return decoder.decode(this.bytes.slice(0, length))
    })
  }

  close(): void {
    Atomics.store(this.header, CLOSED, 1)
    this.bump()
  }

  sequence(): number {
    return Atomics.load(this.header, SEQ)
  }

  bump(): void {
    Atomics.add(this.header, SEQ, 1)
    Atomics.notify(this.header, SEQ)
  }

  waitForChange(seen: number, timeoutMs?: number): WaitResult {
    return Atomics.wait(this.header, SEQ, seen, timeoutMs)
  }

  private withLock<T>(body: () => T): T {
    while (Atomics.compareExchange(this.header, LOCK, 0, 1) !== 0) {
      Atomics.wait(this.header, LOCK, 1, 1)
    }
    try {
      return body()
    } finally {
      Atomics.store(this.header, LOCK, 0)
      Atomics.notify(this.header, LOCK, 1)
    }
  }
}
