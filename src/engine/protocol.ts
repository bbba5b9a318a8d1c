// Messages exchanged between the controller's thread backend and its worker.

export type HostMessage =
  | { readonly type: "run"; readonly runId: number; readonly source: string }
  | { readonly type: "interrupt"; readonly runId: number }
  | { readonly type: "names"; readonly requestId: number; readonly path: string | null }
  | { readonly type: "push-local"; readonly name: string; readonly value: unknown }

export type WorkerMessage =
  | { readonly type: "stdout"; readonly data: string }
  | {
      readonly type: "done"
      readonly runId: number
      readonly executed: boolean
      readonly result?: string
      readonly interrupted: boolean
    }
  | { readonly type: "names"; readonly requestId: number; readonly names: string[] }

export interface WorkerBootstrap {
  readonly stdin: SharedArrayBuffer
  readonly signals: SharedArrayBuffer
  readonly locals: Record<string, unknown>
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string")

export const parseHostMessage = (value: unknown): HostMessage | null => {
  if (!isRecord(value)) return null
  switch (value.type) {
    case "run":
      return typeof value.runId === "number" && typeof value.source === "string"
        ? { type: "run", runId: value.runId, source: value.source }
        : null
    case "interrupt":
      return typeof value.runId === "number" ? { type: "interrupt", runId: value.runId } : null
    case "names":
      return typeof value.requestId === "number" && (typeof value.path === "string" || value.path === null)
        ? { type: "names", requestId: value.requestId, path: value.path }
        : null
    case "push-local":
      return typeof value.name === "string" ? { type: "push-local", name: value.name, value: value.value } : null
    default:
      return null
  }
}

export const parseWorkerMessage = (value: unknown): WorkerMessage | null => {
  if (!isRecord(value)) return null
  switch (value.type) {
    case "stdout":
      return typeof value.data === "string" ? { type: "stdout", data: value.data } : null
    case "done":
      if (typeof value.runId !== "number" || typeof value.executed !== "boolean") return null
      return {
        type: "done",
        runId: value.runId,
        executed: value.executed,
        ...(typeof value.result === "string" ? { result: value.result } : {}),
        interrupted: value.interrupted === true,
      }
    case "names":
      return typeof value.requestId === "number" && isStringArray(value.names)
        ? { type: "names", requestId: value.requestId, names: value.names }
        : null
    default:
      return null
  }
}

export const parseWorkerBootstrap = (value: unknown): WorkerBootstrap | null => {
  if (!isRecord(value)) return null
  const { stdin, signals, locals } = value
  if (!(stdin instanceof SharedArrayBuffer) || !(signals instanceof SharedArrayBuffer)) return null
  return { stdin, signals, locals: isRecord(locals) ? locals : {} }
}
