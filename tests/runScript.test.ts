import { describe, it, expect } from "vitest"
import { runConsoleScript } from "../src/commands/run.js"

describe("runConsoleScript", () => {
  it("types each line into the console and returns the transcript", async () => {
    await expect(runConsoleScript("let a = 2\na * 21\n", { mode: "inline" })).resolves.toBe(
      "IN [0]: let a = 2\nIN [1]: a * 21\nOUT[1]: 42\n\nIN [2]:",
    )
  })

  it("skips blank lines between commands", async () => {
    await expect(runConsoleScript("\n1\n\n", { mode: "queued" })).resolves.toBe("IN [0]: 1\nOUT[0]: 1\n\nIN [1]:")
  })

  it("gives input() end of file", async () => {
    const lines = (await runConsoleScript("input()", { mode: "inline" })).split("\n")
    expect(lines).toContain("        EOFError: EOF when reading a line")
  })
})
