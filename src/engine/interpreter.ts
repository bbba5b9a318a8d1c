import vm from "node:vm"
import { format, inspect, types } from "node:util"
import { InterruptError } from "../errors.js"
import type { Stream } from "../stream/stream.js"
import { analyzeSource, type StatementPlan } from "./sourceAnalysis.js"

export const INTERRUPT_MARKER = "^C"

const FILENAME = "<console>"
const AWAIT_SLOT = "__consolekitAwaited__"
const MEMBER_PATH = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/

export interface ExecutionOutcome {
  readonly executed: boolean
  /** Formatted value of a trailing expression statement. */
  readonly result?: string
  readonly interrupted: boolean
}

export interface CancellationToken {
  isCancelled(): boolean
  /** Called once when a cancel arrives while the run is awaiting. Returns an unsubscribe. */
  onCancel(listener: () => void): () => void
}

export const NEVER_CANCELLED: CancellationToken = {
  isCancelled: () => false,
  onCancel: () => () => {},
}

export interface InterpreterOptions {
  readonly stdout: Stream
  /** Reads one line for `input()`; may return it directly or as a promise. */
  readonly readInput: () => string | Promise<string>
  readonly locals?: Record<string, unknown>
}

const isThenable = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === "object" && value !== null && "then" in value && typeof value.then === "function"

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null

/** `Name: message` plus the stack frames that point into console input. */
export const formatUserError = (error: unknown): string => {
  if (!types.isNativeError(error) && !(isRecord(error) && typeof error.message === "string")) {
    return `Uncaught ${inspect(error)}`
  }
  const name = isRecord(error) && typeof error.name === "string" ? error.name : "Error"
  const message = isRecord(error) && typeof error.message === "string" ? error.message : String(error)
  const stack = isRecord(error) && typeof error.stack === "string" ? error.stack : ""
  const frames = stack
    .split("\n")
    .filter((line) => line.trimStart().startsWith("at ") && line.includes(FILENAME))
  return [`${name}: ${message}`, ...frames].join("\n")
}

const checkpoint = (token: CancellationToken): void => {
  if (token.isCancelled()) throw new InterruptError()
}

/** Await `value` if it is a thenable, giving up as soon as the run is cancelled. */
const settle = (value: unknown, token: CancellationToken): Promise<unknown> => {
  if (!isThenable(value)) return Promise.resolve(value)
  checkpoint(token)
  return new Promise<unknown>((resolve, reject) => {
    const off = token.onCancel(() => reject(new InterruptError()))
    Promise.resolve(value).then(
      (result) => {
        off()
        resolve(result)
      },
      (error: unknown) => {
        off()
        reject(error)
      },
    )
  })
}

/**
 * Runs console submissions statement by statement against a persistent namespace. The namespace
 * is a plain object turned into a vm context; top-level `let`/`const` bindings live in the
 * context's script scope and persist between submissions as well.
 */
export class Interpreter {
  readonly namespace: Record<string, unknown>
  private readonly context: vm.Context
  private readonly stdout: Stream
  private readonly lexicalNames = new Set<string>()

  constructor(options: InterpreterOptions) {
    this.stdout = options.stdout
    const write = (...values: unknown[]) => this.stdout.write(`${format(...values)}\n`)
    const input = (prompt: unknown = "") => {
      this.stdout.write(String(prompt))
      return options.readInput()
    }
    this.namespace = {
      ...(options.locals ?? {}),
      console: { log: write, info: write, debug: write, warn: write, error: write, trace: write },
      print: write,
      input,
      setTimeout,
      clearTimeout,
      setInterval,
      clearInterval,
    }
    this.context = vm.createContext(this.namespace, { name: "consolekit" })
  }

  async run(source: string, token: CancellationToken = NEVER_CANCELLED): Promise<ExecutionOutcome> {
    const analysis = analyzeSource(source)
    if (analysis.status !== "complete") {
      const message = analysis.status === "invalid" ? analysis.message : "Unexpected end of input"
      this.stdout.write(`SyntaxError: ${message}\n`)
      return { executed: false, interrupted: false }
    }
    try {
      let value: unknown
      let lastIsExpression = false
      for (const plan of analysis.statements) {
        checkpoint(token)
        value = await this.runStatement(plan, token)
        lastIsExpression = plan.kind === "plain" ? plan.expression : plan.kind === "await-expression"
      }
      const result = lastIsExpression && value !== undefined ? inspect(value, { depth: 2 }) : undefined
      return { executed: true, result, interrupted: false }
    } catch (error) {
      if (error instanceof InterruptError) {
        this.stdout.write(`${INTERRUPT_MARKER}\n`)
        return { executed: false, interrupted: true }
      }
      this.stdout.write(`${formatUserError(error)}\n`)
      return { executed: false, interrupted: false }
    }
  }

  setLocal(name: string, value: unknown): void {
    this.namespace[name] = value
  }

  /**
   * Names visible at the top level, or the property names (own and inherited) of the value a
   * dotted member path resolves to. Unresolvable paths yield no names.
   */
  listNames(path: string | null = null): string[] {
    if (path === null) {
      const globals = vm.runInContext("Object.getOwnPropertyNames(globalThis)", this.context)
      const names = Array.isArray(globals) ? globals.filter((name): name is string => typeof name === "string") : []
      return [...new Set([...names, ...this.lexicalNames])].sort()
    }
    if (!MEMBER_PATH.test(path)) return []
    let target: unknown
    try {
      target = vm.runInContext(path, this.context)
    } catch {
      return []
    }
    if (target === null || target === undefined) return []
    const names = new Set<string>()
    for (let current: unknown = Object(target); current !== null; current = Object.getPrototypeOf(current)) {
      for (const name of Object.getOwnPropertyNames(current)) names.add(name)
    }
    return [...names].sort()
  }

  private exec(code: string): unknown {
    return new vm.Script(code, { filename: FILENAME }).runInContext(this.context, { displayErrors: false })
  }

  private async runStatement(plan: StatementPlan, token: CancellationToken): Promise<unknown> {
    switch (plan.kind) {
      case "plain": {
        const value = this.exec(plan.source)
        plan.names.forEach((name) => this.lexicalNames.add(name))
        return settle(value, token)
      }
      case "await-expression":
        return settle(this.exec(`(async () => (${plan.expression}))()`), token)
      case "await-declaration": {
        for (const declarator of plan.declarators) {
          checkpoint(token)
          if (!declarator.awaits || declarator.init === null) {
            const init = declarator.init === null ? "" : ` = ${declarator.init}`
            this.exec(`${plan.declarationKind} ${declarator.target}${init};`)
            continue
          }
          this.namespace[AWAIT_SLOT] = await settle(this.exec(`(async () => (${declarator.init}))()`), token)
          try {
            this.exec(`${plan.declarationKind} ${declarator.target} = globalThis.${AWAIT_SLOT};`)
          } finally {
            delete this.namespace[AWAIT_SLOT]
          }
        }
        plan.names.forEach((name) => this.lexicalNames.add(name))
        return undefined
      }
      case "await-block":
        await settle(this.exec(`(async () => {\n${plan.source}\n})()`), token)
        return undefined
    }
  }
}
