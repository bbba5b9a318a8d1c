const RUNNING = 0
const CANCEL = 1
const WORDS = 2

export const createRunSignalsBuffer = (): SharedArrayBuffer => new SharedArrayBuffer(WORDS * Int32Array.BYTES_PER_ELEMENT)

/**
 * Two shared words, `[runningId, cancelId]`, describing which run the worker is executing and
 * which run a cancel was addressed to. Run ids are positive and never reused.
 */
export class RunSignals {
  readonly buffer: SharedArrayBuffer
  private readonly words: Int32Array

  constructor(buffer: SharedArrayBuffer = createRunSignalsBuffer()) {
    this.buffer = buffer
    this.words = new Int32Array(buffer, 0, WORDS)
  }

  beginRun(runId: number): void {
    Atomics.store(this.words, RUNNING, runId)
  }

  endRun(runId: number): void {
    Atomics.compareExchange(this.words, RUNNING, runId, 0)
  }

  /**
   * Address a cancel to `runId` if that run is the one executing right now. The run can still
   * finish between the check and the store; the stale id then never matches a later run.
   */
  requestCancel(runId: number): boolean {
    if (Atomics.load(this.words, RUNNING) !== runId) return false
    Atomics.store(this.words, CANCEL, runId)
    return true
  }

  isCancelled(runId: number): boolean {
    return Atomics.load(this.words, CANCEL) === runId
  }
}
