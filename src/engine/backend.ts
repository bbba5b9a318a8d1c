import type { ExecutionOutcome } from "./interpreter.js"

export type ExecutionMode = "inline" | "queued" | "executor" | "thread"

export const EXECUTION_MODES: readonly ExecutionMode[] = ["inline", "queued", "executor", "thread"]

export const isExecutionMode = (value: unknown): value is ExecutionMode =>
  typeof value === "string" && EXECUTION_MODES.some((mode) => mode === value)

/** Hands a job to an embedder-owned scheduler (thread pool, task queue, ...). */
export type ExecutorSpawn = (job: () => Promise<void>) => void

/** One concurrency model for running submissions against a namespace. */
export interface ExecutionBackend {
  readonly mode: ExecutionMode
  runSource(source: string, runId: number): Promise<ExecutionOutcome>
  /** Best-effort interrupt of run `runId`; true when an interrupt was delivered. */
  cancel(runId: number): boolean
  exit(): void
  listNames(path: string | null): Promise<string[]>
  pushLocal(name: string, value: unknown): void
}
