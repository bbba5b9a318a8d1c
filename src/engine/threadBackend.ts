import type { Worker, WorkerOptions } from "node:worker_threads"
import { ConsoleError, describeError } from "../errors.js"
import { SharedBacklog } from "../stream/backlog.js"
import type { Stream } from "../stream/stream.js"
import type { ExecutionBackend } from "./backend.js"
import type { ExecutionOutcome } from "./interpreter.js"
import { parseWorkerMessage, type HostMessage } from "./protocol.js"
import { RunSignals } from "./runSignals.js"
import { createConsoleWorkerThread } from "./workerThread.js"

export interface ThreadBackendOptions {
  /** Must be backed by a SharedBacklog: the worker blocks on it. */
  readonly stdin: Stream
  readonly stdout: Stream
  /** Copied into the worker with the structured clone algorithm. */
  readonly locals?: Record<string, unknown>
  readonly workerOptions?: WorkerOptions
}

interface PendingRun {
  readonly runId: number
  readonly resolve: (outcome: ExecutionOutcome) => void
}

const NOT_EXECUTED: ExecutionOutcome = { executed: false, interrupted: false }

/**
 * Runs submissions in a dedicated worker thread, started on first use. Output arrives as
 * messages and is written to the foreground stdout stream; stdin is shared memory so `input()`
 * blocks inside the worker.
 */
export class ThreadBackend implements ExecutionBackend {
  readonly mode = "thread"
  private readonly stdin: Stream
  private readonly stdout: Stream
  private readonly stdinBacklog: SharedBacklog
  private readonly signals = new RunSignals()
  private readonly locals: Record<string, unknown>
  private readonly workerOptions: WorkerOptions
  private readonly nameRequests = new Map<number, (names: string[]) => void>()
  private worker: Worker | null = null
  private pending: PendingRun | null = null
  private requestCounter = 0
  private exited = false

  constructor(options: ThreadBackendOptions) {
    if (!(options.stdin.backlog instanceof SharedBacklog)) {
      throw new ConsoleError("the thread mode needs stdin backed by a SharedBacklog")
    }
    this.stdin = options.stdin
    this.stdout = options.stdout
    this.stdinBacklog = options.stdin.backlog
    this.locals = { ...(options.locals ?? {}) }
    this.workerOptions = options.workerOptions ?? {}
  }

  runSource(source: string, runId: number): Promise<ExecutionOutcome> {
    const worker = this.ensureWorker()
    return new Promise<ExecutionOutcome>((resolve) => {
      this.pending = { runId, resolve }
      this.send(worker, { type: "run", runId, source })
    })
  }

  cancel(runId: number): boolean {
    const worker = this.worker
    if (!worker || this.pending?.runId !== runId) return false
    if (!this.signals.requestCancel(runId)) return false
    this.send(worker, { type: "interrupt", runId })
    this.stdin.wake()
    return true
  }

  exit(): void {
    if (this.exited) return
    this.exited = true
    const worker = this.worker
    this.worker = null
    if (worker) {
      void worker.terminate().catch((error: unknown) => {
        console.error("[worker] terminate failed:", error)
      })
    }
    this.settle(NOT_EXECUTED)
    this.dropNameRequests()
  }

  /** Empty while a run is in progress: the worker may be blocked in `input()`. */
  listNames(path: string | null): Promise<string[]> {
    if (this.exited || this.pending) return Promise.resolve([])
    const worker = this.ensureWorker()
    this.requestCounter += 1
    const requestId = this.requestCounter
    return new Promise<string[]>((resolve) => {
      this.nameRequests.set(requestId, resolve)
      this.send(worker, { type: "names", requestId, path })
    })
  }

  pushLocal(name: string, value: unknown): void {
    this.locals[name] = value
    if (this.worker) this.send(this.worker, { type: "push-local", name, value })
  }

  private ensureWorker(): Worker {
    if (this.exited) throw new ConsoleError("the console has exited")
    if (this.worker) return this.worker
    const worker = createConsoleWorkerThread(
      { stdin: this.stdinBacklog.buffer, signals: this.signals.buffer, locals: this.locals },
      this.workerOptions,
    )
    worker.on("message", (raw: unknown) => this.handleMessage(raw))
    worker.on("error", (error: unknown) => this.handleFailure(worker, describeError(error)))
    worker.on("exit", (code: number) => this.handleFailure(worker, `console worker exited with code ${code}`))
    this.worker = worker
    return worker
  }

  private send(worker: Worker, message: HostMessage): void {
    worker.postMessage(message)
  }

  private handleMessage(raw: unknown): void {
    const message = parseWorkerMessage(raw)
    if (!message) {
      console.warn("[worker] ignoring malformed message:", raw)
      return
    }
    switch (message.type) {
      case "stdout":
        this.stdout.write(message.data)
        return
      case "done":
        if (this.pending?.runId !== message.runId) return
        this.settle({ executed: message.executed, result: message.result, interrupted: message.interrupted })
        return
      case "names": {
        const resolve = this.nameRequests.get(message.requestId)
        this.nameRequests.delete(message.requestId)
        resolve?.(message.names)
        return
      }
    }
  }

  /** The worker died on its own: report it, fail what it owed us, start afresh next time. */
  private handleFailure(worker: Worker, reason: string): void {
    if (this.worker !== worker) return
    this.worker = null
    console.error("[worker]", reason)
    this.stdout.write(`${reason}\n`)
    this.settle(NOT_EXECUTED)
    this.dropNameRequests()
  }

  private settle(outcome: ExecutionOutcome): void {
    const pending = this.pending
    this.pending = null
    pending?.resolve(outcome)
  }

  private dropNameRequests(): void {
    for (const resolve of this.nameRequests.values()) resolve([])
    this.nameRequests.clear()
  }
}
