import { parentPort, workerData } from "node:worker_threads"
import { EndOfInputError } from "../errors.js"
import { SharedBacklog } from "../stream/backlog.js"
import { Stream } from "../stream/stream.js"
import { Interpreter, formatUserError, type CancellationToken, type ExecutionOutcome } from "./interpreter.js"
import { parseHostMessage, parseWorkerBootstrap, type WorkerMessage } from "./protocol.js"
import { RunSignals } from "./runSignals.js"

const port = parentPort
if (!port) {
  throw new Error("[consolekit] console worker requires parentPort")
}

const bootstrap = parseWorkerBootstrap(workerData)
if (!bootstrap) {
  throw new Error("[consolekit] console worker bootstrap data missing")
}

const post = (message: WorkerMessage): void => {
  port.postMessage(message)
}

const signals = new RunSignals(bootstrap.signals)
const stdin = new Stream(new SharedBacklog(bootstrap.stdin))
const stdout = new Stream()

// stdout is forwarded as it is written; the host owns the transcript
stdout.onWrite(() => {
  const data = stdout.flush()
  if (data) post({ type: "stdout", data })
})

// stray async failures of user code become console output
const reportStrayError = (error: unknown): void => {
  stdout.write(`${formatUserError(error)}\n`)
}
process.on("unhandledRejection", reportStrayError)
process.on("uncaughtException", reportStrayError)

let currentRun = 0
const cancelListeners = new Set<() => void>()

const token: CancellationToken = {
  isCancelled: () => currentRun !== 0 && signals.isCancelled(currentRun),
  onCancel: (listener) => {
    cancelListeners.add(listener)
    return () => {
      cancelListeners.delete(listener)
    }
  },
}

const interpreter = new Interpreter({
  stdout,
  locals: bootstrap.locals,
  readInput: () => {
    const line = stdin.readlineSync({ isCancelled: token.isCancelled })
    if (line === null) throw new EndOfInputError()
    return line
  },
})

const runOne = async (runId: number, source: string): Promise<void> => {
  currentRun = runId
  signals.beginRun(runId)
  let outcome: ExecutionOutcome
  try {
    outcome = await interpreter.run(source, token)
  } finally {
    signals.endRun(runId)
    currentRun = 0
    cancelListeners.clear()
  }
  // the run id is cleared before "done" so a late cancel cannot land on the next run
  post({ type: "done", runId, ...outcome })
}

port.on("message", (raw: unknown) => {
  const message = parseHostMessage(raw)
  if (!message) {
    console.error("[worker] ignoring malformed message:", raw)
    return
  }
  switch (message.type) {
    case "run":
      void runOne(message.runId, message.source).catch((error: unknown) => {
        console.error("[worker] run failed:", error)
        post({ type: "done", runId: message.runId, executed: false, interrupted: false })
      })
      return
    case "interrupt":
      if (message.runId !== currentRun || !token.isCancelled()) return
      for (const listener of [...cancelListeners]) listener()
      return
    case "names":
      post({ type: "names", requestId: message.requestId, names: interpreter.listNames(message.path) })
      return
    case "push-local":
      interpreter.setLocal(message.name, message.value)
      return
  }
})
