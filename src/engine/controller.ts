import type { WorkerOptions } from "node:worker_threads"
import { ConsoleError } from "../errors.js"
import type { Stream } from "../stream/stream.js"
import type { ExecutionBackend, ExecutionMode, ExecutorSpawn } from "./backend.js"
import { ForegroundBackend } from "./foregroundBackend.js"
import { analyzeSource } from "./sourceAnalysis.js"
import { ThreadBackend } from "./threadBackend.js"

export type SubmitResult =
  | { readonly status: "incomplete" }
  | {
      readonly status: "done"
      readonly executed: boolean
      readonly result?: string
      readonly interrupted: boolean
    }

export type ControllerState = "idle" | "running" | "exited"

export interface ExecutionControllerOptions {
  readonly stdin: Stream
  readonly stdout: Stream
  /** Chosen on first submit when not configured earlier. Defaults to `inline`. */
  readonly mode?: ExecutionMode
  readonly spawn?: ExecutorSpawn
  readonly locals?: Record<string, unknown>
  readonly workerOptions?: WorkerOptions
}

const DEBUG_EXEC = process.env.CONSOLEKIT_DEBUG_EXEC === "1"

const debug = (...values: unknown[]): void => {
  if (DEBUG_EXEC) console.warn("[exec]", ...values)
}

/**
 * Owns the namespace and runs one submission at a time through the selected backend.
 * `idle -> running -> idle`; `exit()` is terminal.
 */
export class ExecutionController {
  private readonly stdin: Stream
  private readonly stdout: Stream
  private readonly locals: Record<string, unknown>
  private readonly workerOptions: WorkerOptions | undefined
  private mode: ExecutionMode
  private spawn: ExecutorSpawn | undefined
  private backend: ExecutionBackend | null = null
  private currentState: ControllerState = "idle"
  private runCounter = 0
  private activeRun = 0

  constructor(options: ExecutionControllerOptions) {
    this.stdin = options.stdin
    this.stdout = options.stdout
    this.mode = options.mode ?? "inline"
    this.spawn = options.spawn
    this.locals = { ...(options.locals ?? {}) }
    this.workerOptions = options.workerOptions
  }

  get state(): ControllerState {
    return this.currentState
  }

  get isRunning(): boolean {
    return this.currentState === "running"
  }

  get executionMode(): ExecutionMode {
    return this.mode
  }

  /** Pick the concurrency model. Only possible before the backend exists. */
  configureExecutor(mode: ExecutionMode, spawn?: ExecutorSpawn): void {
    if (this.backend) {
      throw new ConsoleError(`execution mode already configured as ${this.backend.mode}`)
    }
    this.assertNotExited()
    this.mode = mode
    if (spawn) this.spawn = spawn
    this.ensureBackend()
  }

  startWorker(): void {
    this.configureExecutor("thread")
  }

  needsMoreInput(source: string): boolean {
    return analyzeSource(source).status === "incomplete"
  }

  async submit(source: string): Promise<SubmitResult> {
    this.assertNotExited()
    if (this.currentState === "running") {
      throw new ConsoleError("cannot submit while a command is running")
    }
    const analysis = analyzeSource(source)
    if (analysis.status === "incomplete") return { status: "incomplete" }
    if (analysis.status === "invalid") {
      this.stdout.write(`SyntaxError: ${analysis.message}\n`)
      return { status: "done", executed: false, interrupted: false }
    }
    const backend = this.ensureBackend()
    this.runCounter += 1
    const runId = this.runCounter
    this.activeRun = runId
    this.currentState = "running"
    debug(`run ${runId} started (${backend.mode})`)
    try {
      const outcome = await backend.runSource(source, runId)
      debug(`run ${runId} finished`, outcome)
      return { status: "done", ...outcome }
    } finally {
      this.activeRun = 0
      if (this.currentState === "running") this.currentState = "idle"
    }
  }

  /** Best-effort interrupt of the running submission. Never waits for it to stop. */
  cancel(): boolean {
    if (this.currentState !== "running" || !this.backend) return false
    const delivered = this.backend.cancel(this.activeRun)
    debug(`cancel run ${this.activeRun}: ${delivered ? "delivered" : "not delivered"}`)
    return delivered
  }

  exit(): void {
    if (this.currentState === "exited") return
    this.currentState = "exited"
    debug("exit")
    this.backend?.exit()
  }

  async listNames(path: string | null = null): Promise<string[]> {
    if (this.currentState === "exited") return []
    return this.ensureBackend().listNames(path)
  }

  pushLocal(name: string, value: unknown): void {
    this.locals[name] = value
    this.backend?.pushLocal(name, value)
  }

  private ensureBackend(): ExecutionBackend {
    if (this.backend) return this.backend
    const common = { stdin: this.stdin, stdout: this.stdout, locals: this.locals }
    this.backend =
      this.mode === "thread"
        ? new ThreadBackend({ ...common, workerOptions: this.workerOptions })
        : new ForegroundBackend({ ...common, mode: this.mode, spawn: this.spawn })
    return this.backend
  }

  private assertNotExited(): void {
    if (this.currentState === "exited") throw new ConsoleError("the console has exited")
  }
}
