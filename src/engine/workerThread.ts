import { existsSync } from "node:fs"
import { Worker, type WorkerOptions } from "node:worker_threads"
import type { WorkerBootstrap } from "./protocol.js"

/**
 * Worker code that loads a TypeScript entry through tsx. `--import tsx` in `execArgv` does not
 * register the loader inside worker threads on Node 20, so the entry is imported with `tsImport`.
 */
export const tsxBootstrapSource = (entry: URL): string => {
  const href = JSON.stringify(entry.href)
  return `import("tsx/esm/api").then(({ tsImport }) => tsImport(${href}, ${href}))`
}

export const createConsoleWorkerThread = (bootstrap: WorkerBootstrap, options: WorkerOptions = {}): Worker => {
  const jsEntry = new URL("./worker-thread-entry.js", import.meta.url)
  if (existsSync(jsEntry)) {
    return new Worker(jsEntry, { ...options, workerData: bootstrap })
  }
  // running from TS sources
  const tsEntry = new URL("./worker-thread-entry.ts", import.meta.url)
  return new Worker(tsxBootstrapSource(tsEntry), { ...options, eval: true, workerData: bootstrap })
}
