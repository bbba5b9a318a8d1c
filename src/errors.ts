export class ConsoleError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConsoleError"
  }
}

export class IndexRangeError extends ConsoleError {
  readonly index: number
  readonly length: number

  constructor(index: number, length: number, what = "index") {
    super(`${what} ${index} out of range in list of size ${length}`)
    this.name = "IndexRangeError"
    this.index = index
    this.length = length
  }
}

/** Internal lockstep violation. Never the result of a valid public call. */
export class InvariantError extends ConsoleError {
  constructor(message: string) {
    super(message)
    this.name = "InvariantError"
  }
}

export class StreamTimeoutError extends ConsoleError {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`readline timed out after ${timeoutMs}ms`)
    this.name = "StreamTimeoutError"
    this.timeoutMs = timeoutMs
  }
}

export class StreamOverflowError extends ConsoleError {
  readonly capacity: number

  constructor(requested: number, capacity: number) {
    super(`stream backlog cannot hold ${requested} more bytes (capacity ${capacity})`)
    this.name = "StreamOverflowError"
    this.capacity = capacity
  }
}

export class InterruptError extends ConsoleError {
  constructor(message = "Execution interrupted") {
    super(message)
    this.name = "InterruptError"
  }
}

/** Raised by `input()` when stdin reached EOF. */
export class EndOfInputError extends ConsoleError {
  constructor() {
    super("EOF when reading a line")
    this.name = "EOFError"
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error)
