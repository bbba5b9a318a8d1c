import { EventEmitter } from "node:events"
import { ConsoleError, InterruptError, StreamTimeoutError } from "../errors.js"
import { LocalBacklog, type Backlog } from "./backlog.js"

export interface ReadlineOptions {
  /** Wait for a complete line (default) or return "" at once. */
  readonly block?: boolean
  /** Milliseconds before a blocking read fails with StreamTimeoutError. No timeout by default. */
  readonly timeout?: number
  /** Re-checked on every wake; a true result aborts the read with InterruptError. */
  readonly isCancelled?: () => boolean
}

type DataListener = (data: string) => void

const SIGNAL = "signal"

/**
 * Line-oriented text channel standing in for stdin/stdout of executed code.
 *
 * `readline` waits cooperatively for writes made on the same thread; `readlineSync` blocks the
 * calling thread on a shared backlog until another thread writes, closes or wakes it.
 * Both return `null` at EOF and "" for an empty non-blocking read.
 */
export class Stream {
  private readonly events = new EventEmitter()
  readonly backlog: Backlog

  constructor(backlog: Backlog = new LocalBacklog()) {
    this.backlog = backlog
    this.events.setMaxListeners(0)
  }

  get closed(): boolean {
    return this.backlog.closed
  }

  write(data: string): void {
    if (this.backlog.closed || data.length === 0) return
    this.backlog.write(data)
    this.events.emit(SIGNAL)
    this.events.emit("write", data)
  }

  async readline(options: ReadlineOptions = {}): Promise<string | null> {
    const { block = true, timeout, isCancelled } = options
    const deadline = timeout === undefined ? undefined : Date.now() + timeout
    for (;;) {
      if (isCancelled?.()) throw new InterruptError()
      const line = this.backlog.takeLine()
      if (line !== undefined) return line
      if (this.backlog.closed) return null
      if (!block) return ""
      await this.nextSignal(deadline, timeout)
    }
  }

  readlineSync(options: ReadlineOptions = {}): string | null {
    if (!this.backlog.waitable) {
      throw new ConsoleError("blocking readline needs a shared backlog written from another thread")
    }
    const { block = true, timeout, isCancelled } = options
    const deadline = timeout === undefined ? undefined : Date.now() + timeout
    for (;;) {
      const seen = this.backlog.sequence()
      if (isCancelled?.()) throw new InterruptError()
      const line = this.backlog.takeLine()
      if (line !== undefined) return line
      if (this.backlog.closed) return null
      if (!block) return ""
      if (deadline === undefined || timeout === undefined) {
        this.backlog.waitForChange(seen)
        continue
      }
      const remaining = deadline - Date.now()
      if (remaining <= 0 || this.backlog.waitForChange(seen, remaining) === "timed-out") {
        throw new StreamTimeoutError(timeout)
      }
    }
  }

  flush(): string {
    const data = this.backlog.drain()
    this.events.emit("flush", data)
    return data
  }

  close(): void {
    if (this.backlog.closed) return
    this.backlog.close()
    this.events.emit(SIGNAL)
    this.events.emit("close")
  }

  /** Release every pending read without data so it can re-check cancellation. */
  wake(): void {
    this.backlog.bump()
    this.events.emit(SIGNAL)
  }

  onWrite(listener: DataListener): () => void {
    this.events.on("write", listener)
    return () => this.events.off("write", listener)
  }

  onFlush(listener: DataListener): () => void {
    this.events.on("flush", listener)
    return () => this.events.off("flush", listener)
  }

  onClose(listener: () => void): () => void {
    this.events.on("close", listener)
    return () => this.events.off("close", listener)
  }

  private nextSignal(deadline: number | undefined, timeout: number | undefined): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined
      const onSignal = () => {
        if (timer) clearTimeout(timer)
        resolve()
      }
      this.events.once(SIGNAL, onSignal)
      if (deadline === undefined || timeout === undefined) return
      const fail = () => {
        this.events.off(SIGNAL, onSignal)
        reject(new StreamTimeoutError(timeout))
      }
      const remaining = deadline - Date.now()
      if (remaining <= 0) {
        fail()
        return
      }
      timer = setTimeout(fail, remaining)
    })
  }
}
