import { ConsoleError, EndOfInputError } from "../errors.js"
import type { Stream } from "../stream/stream.js"
import type { ExecutionBackend, ExecutionMode, ExecutorSpawn } from "./backend.js"
import { Interpreter, formatUserError, type ExecutionOutcome } from "./interpreter.js"

export interface ForegroundBackendOptions {
  readonly mode: Exclude<ExecutionMode, "thread">
  readonly stdin: Stream
  readonly stdout: Stream
  readonly locals?: Record<string, unknown>
  /** Required for the `executor` mode. */
  readonly spawn?: ExecutorSpawn
}

const nextTurn = (): Promise<void> => new Promise((resolve) => setImmediate(resolve))

/**
 * Runs submissions on the foreground thread. `input()` is a cooperative read of stdin, so user
 * code has to `await` it; running code cannot be interrupted.
 *
 * Until `exit()`, rejections nobody handles and exceptions thrown from callbacks (timers, events)
 * are written to stdout instead of reaching the host's default handlers.
 */
export class ForegroundBackend implements ExecutionBackend {
  readonly mode: Exclude<ExecutionMode, "thread">
  private readonly interpreter: Interpreter
  private readonly spawn: ExecutorSpawn | undefined
  private readonly stdout: Stream
  private exited = false

  constructor(options: ForegroundBackendOptions) {
    if (options.mode === "executor" && !options.spawn) {
      throw new ConsoleError("the executor mode needs a spawn function")
    }
    this.mode = options.mode
    this.spawn = options.spawn
    this.stdout = options.stdout
    const stdin = options.stdin
    this.interpreter = new Interpreter({
      stdout: options.stdout,
      locals: options.locals,
      readInput: async () => {
        const line = await stdin.readline()
        if (line === null) throw new EndOfInputError()
        return line
      },
    })
    process.on("unhandledRejection", this.reportStrayError)
    process.on("uncaughtException", this.reportStrayError)
  }

  runSource(source: string): Promise<ExecutionOutcome> {
    const job = () => this.interpreter.run(source)
    switch (this.mode) {
      case "inline":
        return job()
      case "queued":
        return nextTurn().then(job)
      case "executor":
        return this.dispatch(job)
    }
  }

  cancel(): boolean {
    return false
  }

  exit(): void {
    if (this.exited) return
    this.exited = true
    process.off("unhandledRejection", this.reportStrayError)
    process.off("uncaughtException", this.reportStrayError)
  }

  listNames(path: string | null): Promise<string[]> {
    return Promise.resolve(this.interpreter.listNames(path))
  }

  pushLocal(name: string, value: unknown): void {
    this.interpreter.setLocal(name, value)
  }

  private readonly reportStrayError = (error: unknown): void => {
    this.stdout.write(`${formatUserError(error)}\n`)
  }

  private dispatch(job: () => Promise<ExecutionOutcome>): Promise<ExecutionOutcome> {
    const spawn = this.spawn
    if (!spawn) return Promise.reject(new ConsoleError("the executor mode needs a spawn function"))
    return new Promise<ExecutionOutcome>((resolve, reject) => {
      spawn(async () => {
        try {
          resolve(await job())
        } catch (error) {
          reject(error)
        }
      })
    })
  }
}
