import { describe, it, expect } from "vitest"
import { Stream } from "../../stream/stream.js"
import { Interpreter, formatUserError, type CancellationToken } from "../interpreter.js"

const createToken = () => {
  let cancelled = false
  const listeners = new Set<() => void>()
  const token: CancellationToken = {
    isCancelled: () => cancelled,
    onCancel: (listener) => {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
  }
  const cancel = () => {
    cancelled = true
    for (const listener of [...listeners]) listener()
  }
  return { token, cancel }
}

const setup = (locals?: Record<string, unknown>, inputs: string[] = []) => {
  const stdout = new Stream()
  const interpreter = new Interpreter({
    stdout,
    locals,
    readInput: () => inputs.shift() ?? "",
  })
  return { stdout, interpreter }
}

describe("Interpreter", () => {
  it("returns the formatted value of a trailing expression", async () => {
    const { interpreter } = setup()
    await expect(interpreter.run("1 + 2")).resolves.toEqual({ executed: true, result: "3", interrupted: false })
    await expect(interpreter.run("'a' + 'b'")).resolves.toMatchObject({ result: "'ab'" })
  })

  it("keeps top-level bindings between runs", async () => {
    const { interpreter } = setup()
    await interpreter.run("let x = 5")
    await interpreter.run("var y = 2")
    await expect(interpreter.run("x * y")).resolves.toMatchObject({ executed: true, result: "10" })
  })

  it("reports no result for statements and undefined values", async () => {
    const { interpreter } = setup()
    await expect(interpreter.run("const z = 1")).resolves.toEqual({ executed: true, interrupted: false })
    await expect(interpreter.run("undefined")).resolves.toEqual({ executed: true, interrupted: false })
  })

  it("routes console helpers to stdout", async () => {
    const { interpreter, stdout } = setup()
    await interpreter.run("console.log('hi', 1); print({ a: 1 }); console.error('oops')")
    expect(stdout.flush()).toBe("hi 1\n{ a: 1 }\noops\n")
  })

  it("reads input through the injected reader", async () => {
    const { interpreter, stdout } = setup({}, ["Ada"])
    await expect(interpreter.run("const name = input('name? '); name")).resolves.toMatchObject({ result: "'Ada'" })
    expect(stdout.flush()).toBe("name? ")
  })

  it("writes user errors as name and message", async () => {
    const { interpreter, stdout } = setup()
    await expect(interpreter.run("throw new TypeError('boom')")).resolves.toEqual({
      executed: false,
      interrupted: false,
    })
    expect(stdout.flush().split("\n")[0]).toBe("TypeError: boom")
  })

  it("stops at the failing statement", async () => {
    const { interpreter, stdout } = setup()
    await interpreter.run("var before = 1; missing(); var after = 2")
    expect(stdout.flush().split("\n")[0]).toBe("ReferenceError: missing is not defined")
    await expect(interpreter.run("typeof after")).resolves.toMatchObject({ result: "'undefined'" })
    await expect(interpreter.run("before")).resolves.toMatchObject({ result: "1" })
  })

  it("writes syntax errors without running anything", async () => {
    const { interpreter, stdout } = setup()
    await expect(interpreter.run("1 +* 2")).resolves.toEqual({ executed: false, interrupted: false })
    expect(stdout.flush()).toBe("SyntaxError: Unexpected token (1:3)\n")
  })

  it("awaits top-level await and thenable results", async () => {
    const { interpreter } = setup()
    await expect(interpreter.run("await Promise.resolve(41 + 1)")).resolves.toMatchObject({ result: "42" })
    await interpreter.run("const v = await Promise.resolve('ok'), w = 3")
    await expect(interpreter.run("[v, w]")).resolves.toMatchObject({ result: "[ 'ok', 3 ]" })
    await expect(interpreter.run("Promise.resolve(7)")).resolves.toMatchObject({ result: "7" })
    await expect(interpreter.run("for (const n of [1, 2]) await print(n)")).resolves.toEqual({
      executed: true,
      interrupted: false,
    })
  })

  it("provides timers to user code", async () => {
    const { interpreter } = setup()
    await expect(interpreter.run("await new Promise((r) => setTimeout(r, 10)); 'waited'")).resolves.toMatchObject({
      executed: true,
      result: "'waited'",
    })
    await expect(interpreter.run("clearInterval(setInterval(() => {}, 1000)); typeof clearTimeout")).resolves.toMatchObject({
      result: "'function'",
    })
  })

  it("reports rejected promises as errors", async () => {
    const { interpreter, stdout } = setup()
    await expect(interpreter.run("await Promise.reject(new RangeError('late'))")).resolves.toMatchObject({
      executed: false,
    })
    expect(stdout.flush().split("\n")[0]).toBe("RangeError: late")
  })

  it("stops before the next statement once cancelled", async () => {
    const { interpreter, stdout } = setup()
    const { token, cancel } = createToken()
    cancel()
    await expect(interpreter.run("print('never')", token)).resolves.toEqual({ executed: false, interrupted: true })
    expect(stdout.flush()).toBe("^C\n")
  })

  it("abandons a pending await when cancelled", async () => {
    const { interpreter, stdout } = setup()
    const { token, cancel } = createToken()
    const pending = interpreter.run("await new Promise(() => {})", token)
    cancel()
    await expect(pending).resolves.toEqual({ executed: false, interrupted: true })
    expect(stdout.flush()).toBe("^C\n")
  })

  it("exposes locals and lists names", async () => {
    const { interpreter } = setup({ answer: 42 })
    interpreter.setLocal("config", { alpha: 1, beta: 2 })
    await interpreter.run("let hidden = 1")
    await expect(interpreter.run("answer + config.beta")).resolves.toMatchObject({ result: "44" })
    const names = interpreter.listNames(null)
    expect(names).toEqual(expect.arrayContaining(["answer", "config", "console", "hidden", "input", "print", "Array"]))
    expect(interpreter.listNames("config")).toEqual(expect.arrayContaining(["alpha", "beta", "hasOwnProperty"]))
    expect(interpreter.listNames("nothing.here")).toEqual([])
    expect(interpreter.listNames("config; 1")).toEqual([])
  })
})

describe("formatUserError", () => {
  it("keeps only frames inside console input", () => {
    const error = new Error("bad")
    error.stack = "Error: bad\n    at <console>:1:7\n    at Script.runInContext (node:vm:1:1)"
    expect(formatUserError(error)).toBe("Error: bad\n    at <console>:1:7")
  })

  it("describes thrown non-errors", () => {
    expect(formatUserError(42)).toBe("Uncaught 42")
  })
})
