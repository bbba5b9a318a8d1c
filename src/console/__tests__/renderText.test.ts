import { describe, it, expect } from "vitest"
import { ConsoleBuffer } from "../consoleBuffer.js"
import { cursorLocation, documentLines, renderTranscriptLines } from "../renderText.js"

describe("renderText", () => {
  it("pairs every document line with its gutter prompt", () => {
    const buffer = new ConsoleBuffer()
    buffer.appendOutput("stdout", "x\ny\n")
    buffer.openInput("> ", ". ", "z")
    expect(documentLines(buffer)).toEqual([
      { prompt: "", text: "x", domain: "stdout" },
      { prompt: "", text: "y", domain: "stdout" },
      { prompt: "> ", text: "z", domain: "input" },
    ])
    expect(cursorLocation(buffer)).toEqual({ line: 2, column: 1 })
  })

  it("right-aligns gutters to the widest prompt", () => {
    const buffer = new ConsoleBuffer()
    buffer.openInput("> ", ". ", "ab")
    expect(renderTranscriptLines(buffer, { colors: false, gutterWidth: 4 })).toEqual(["  > ab"])
  })

  it("marks the cursor without colours", () => {
    const buffer = new ConsoleBuffer()
    buffer.openInput("> ", ". ", "ab")
    buffer.moveCursor(buffer.promptPos + 1)
    expect(renderTranscriptLines(buffer, { colors: false, showCursor: true })).toEqual(["> a_b"])
  })

  it("has no cursor without an input region", () => {
    const buffer = new ConsoleBuffer()
    buffer.appendOutput("stdout", "done\n")
    expect(cursorLocation(buffer)).toBeNull()
    expect(renderTranscriptLines(buffer, { colors: false, showCursor: true })).toEqual(["done"])
  })
})
