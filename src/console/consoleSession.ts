import type { WorkerOptions } from "node:worker_threads"
import { describeError } from "../errors.js"
import type { ExecutionMode, ExecutorSpawn } from "../engine/backend.js"
import { ExecutionController, type SubmitResult } from "../engine/controller.js"
import { INTERRUPT_MARKER } from "../engine/interpreter.js"
import { SharedBacklog, createSharedBacklogBuffer } from "../stream/backlog.js"
import { Stream } from "../stream/stream.js"
import { NamespaceCompleter, type Completer } from "./completer.js"
import { ConsoleBuffer, type BufferListener } from "./consoleBuffer.js"

export interface ConsolePrompts {
  /** `%s` is replaced by the command counter. */
  readonly input: string
  readonly continuation: string
  readonly output: string
}

export const DEFAULT_PROMPTS: ConsolePrompts = {
  input: "IN [%s]: ",
  continuation: "...: ",
  output: "OUT[%s]: ",
}

export const CTRL_D_NOTICE = "Ctrl-D does not exit this console; close the application instead.\n"

export interface ConsoleSessionOptions {
  readonly mode?: ExecutionMode
  readonly spawn?: ExecutorSpawn
  readonly locals?: Record<string, unknown>
  readonly tabWidth?: number
  readonly ctrlDExits?: boolean
  readonly prompts?: Partial<ConsolePrompts>
  /** `null` turns completion off. */
  readonly completer?: Completer | null
  /** Bytes of unread stdin the shared backlog can hold. */
  readonly stdinCapacity?: number
  readonly workerOptions?: WorkerOptions
  readonly onExit?: () => void
}

export type ProcessResult = SubmitResult | { readonly status: "stdin" } | { readonly status: "exited" }

const fillPrompt = (template: string, counter: number): string => template.replace("%s", String(counter))

/**
 * Wires the document, the streams and the controller into an interactive console. Every
 * transcript mutation happens here, on the thread that owns the session; output produced by
 * running code reaches the transcript through stdout write notifications.
 */
export class ConsoleSession {
  readonly buffer: ConsoleBuffer
  readonly stdin: Stream
  readonly stdout: Stream
  readonly controller: ExecutionController
  private readonly prompts: ConsolePrompts
  private readonly completer: Completer | null
  private readonly ctrlDExits: boolean
  private readonly onExit: (() => void) | undefined
  private counter = 0
  private exited = false

  constructor(options: ConsoleSessionOptions = {}) {
    this.buffer = new ConsoleBuffer({ tabWidth: options.tabWidth })
    this.prompts = { ...DEFAULT_PROMPTS, ...(options.prompts ?? {}) }
    this.completer = options.completer === undefined ? new NamespaceCompleter() : options.completer
    this.ctrlDExits = options.ctrlDExits ?? false
    this.onExit = options.onExit
    this.stdin = new Stream(new SharedBacklog(createSharedBacklogBuffer(options.stdinCapacity)))
    this.stdout = new Stream()
    this.stdout.onWrite(() => this.drainStdout())
    this.controller = new ExecutionController({
      stdin: this.stdin,
      stdout: this.stdout,
      mode: options.mode,
      spawn: options.spawn,
      locals: options.locals,
      workerOptions: options.workerOptions,
    })
    this.showPrompt()
  }

  get isRunning(): boolean {
    return this.controller.isRunning
  }

  get isExited(): boolean {
    return this.exited
  }

  /** Counter shown in the next `IN` prompt. */
  get commandCount(): number {
    return this.counter
  }

  subscribe(listener: BufferListener): () => void {
    return this.buffer.subscribe(listener)
  }

  /**
   * Enter. While code runs the typed line is fed to stdin; otherwise the input buffer is
   * submitted, or continued on a new line when it is not a complete program yet.
   */
  async processInput(): Promise<ProcessResult> {
    if (this.exited) return { status: "exited" }
    if (this.controller.isRunning) {
      const line = this.buffer.commitInput()
      this.buffer.openInput("", "", "", "stdin")
      this.stdin.write(`${line}\n`)
      return { status: "stdin" }
    }
    const source = this.buffer.inputBuffer()
    if (this.controller.needsMoreInput(source)) {
      this.buffer.moveCursor(this.buffer.promptEnd)
      this.buffer.insertInputText("\n")
      return { status: "incomplete" }
    }
    this.buffer.commitInput()
    this.buffer.openInput("", "", "", "stdin")
    let result: SubmitResult
    try {
      result = await this.controller.submit(source)
    } catch (error) {
      console.error("[exec] submit failed:", error)
      this.stdout.write(`${describeError(error)}\n`)
      result = { status: "done", executed: false, interrupted: false }
    }
    if (this.exited) return { status: "exited" }
    this.finishCommand(source, result)
    return result
  }

  /** Ctrl-C. Interrupts running code, or abandons the pending input when idle. */
  interrupt(): boolean {
    if (this.exited) return false
    if (this.controller.isRunning) return this.controller.cancel()
    this.buffer.commitInput()
    this.stdout.write(`${INTERRUPT_MARKER}\n`)
    this.showPrompt()
    return false
  }

  /** Ctrl-D on an empty input buffer. */
  endOfInput(): boolean {
    if (this.exited || this.buffer.inputBuffer() !== "") return false
    if (this.ctrlDExits) {
      this.exit()
      return true
    }
    if (this.controller.isRunning) return false
    this.buffer.commitInput()
    this.buffer.appendOutput("output", `\n${CTRL_D_NOTICE}`)
    this.showPrompt()
    return false
  }

  async getCompletions(line: string): Promise<string[]> {
    if (!this.completer || this.exited) return []
    return this.completer.complete(line, (path) => this.controller.listNames(path))
  }

  pushLocal(name: string, value: unknown): void {
    this.controller.pushLocal(name, value)
  }

  exit(): void {
    if (this.exited) return
    this.exited = true
    this.controller.exit()
    this.stdin.close()
    this.stdout.close()
    this.onExit?.()
  }

  private drainStdout(): void {
    const data = this.stdout.flush()
    this.buffer.appendOutput("stdout", data)
  }

  private finishCommand(source: string, result: SubmitResult): void {
    const pending = this.buffer.discardInput()
    if (result.status === "done") {
      if (result.result !== undefined) {
        this.buffer.appendOutput("output", result.result, fillPrompt(this.prompts.output, this.counter))
      }
      if (result.executed && source.trim() !== "") this.counter += 1
    }
    this.showPrompt(pending)
  }

  private showPrompt(pendingText = ""): void {
    const records = this.buffer.log
    if (records.length > 0 && records.at(-1).domain !== "input") {
      this.buffer.append("raw", "\n", "\n")
    }
    this.buffer.openInput(fillPrompt(this.prompts.input, this.counter), this.prompts.continuation, pendingText)
  }
}
