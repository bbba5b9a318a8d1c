import { describe, it, expect, vi } from "vitest"
import { ConsoleError } from "../../errors.js"
import { ConsoleBuffer } from "../consoleBuffer.js"

const withInput = (text: string, tabWidth = 4): ConsoleBuffer => {
  const buffer = new ConsoleBuffer({ tabWidth })
  buffer.openInput("> ", ". ", text)
  return buffer
}

describe("ConsoleBuffer", () => {
  it("indents every selected line by one tab and shifts the selection", () => {
    const buffer = withInput("ab\ncd")
    buffer.setSelection(1, 4)
    buffer.indentSelection()
    expect(buffer.inputBuffer()).toBe("    ab\n    cd")
    expect(buffer.selection).toEqual({ anchor: 5, position: 12 })
    buffer.indentSelection(false)
    expect(buffer.inputBuffer()).toBe("ab\ncd")
    expect(buffer.selection).toEqual({ anchor: 1, position: 4 })
  })

  it("outdents only the leading spaces within one tab", () => {
    const buffer = withInput("  x\n      y\nz")
    buffer.setSelection(0, buffer.promptEnd)
    buffer.indentSelection(false)
    expect(buffer.inputBuffer()).toBe("x\n  y\nz")
  })

  it("keeps one line record per input line", () => {
    const buffer = withInput("")
    buffer.insertInputText("a\nb\nc")
    expect(buffer.log.length).toBe(3)
    expect(buffer.lineCount).toBe(3)
    expect([0, 1, 2].map((line) => buffer.promptForLine(line))).toEqual(["> ", ". ", ". "])
    buffer.setSelection(1, 4)
    buffer.insertInputText("")
    expect(buffer.inputBuffer()).toBe("ac")
    expect(buffer.log.length).toBe(1)
    expect(buffer.log.at(0).text).toBe("ac")
    expect(() => buffer.log.checkInvariants()).not.toThrow()
  })

  it("inserts spaces up to the next tab stop", () => {
    const buffer = withInput("ab")
    buffer.insertTab()
    expect(buffer.inputBuffer()).toBe("ab  ")
    expect(buffer.cursorOffset()).toBe(4)
  })

  it("removes a whole tab of spaces on backspace at a tab stop", () => {
    const buffer = withInput("        ")
    buffer.backspace()
    expect(buffer.inputBuffer()).toBe("    ")
    const uneven = withInput("ab   ")
    uneven.backspace()
    expect(uneven.inputBuffer()).toBe("ab  ")
  })

  it("deletes a whole tab of spaces forward from a tab stop", () => {
    const buffer = withInput("    x")
    buffer.moveCursor(0)
    buffer.deleteForward()
    expect(buffer.inputBuffer()).toBe("x")
    buffer.deleteForward()
    expect(buffer.inputBuffer()).toBe("")
    buffer.deleteForward()
    expect(buffer.inputBuffer()).toBe("")
  })

  it("deletes by word", () => {
    const buffer = withInput("foo bar")
    buffer.backspace({ word: true })
    expect(buffer.inputBuffer()).toBe("foo ")
    buffer.moveCursor(0)
    buffer.deleteForward({ word: true })
    expect(buffer.inputBuffer()).toBe(" ")
  })

  it("removes the selection instead of a character", () => {
    const buffer = withInput("hello")
    buffer.setSelection(1, 3)
    buffer.backspace()
    expect(buffer.inputBuffer()).toBe("hlo")
    expect(buffer.cursorOffset()).toBe(1)
  })

  it("clamps the selection into the input region", () => {
    const buffer = new ConsoleBuffer()
    buffer.append("stdout", "\n", "log line\n")
    buffer.openInput("> ", ". ", "abc")
    expect(buffer.promptPos).toBe(9)
    buffer.setSelection(0, 100)
    expect(buffer.selection).toEqual({ anchor: 9, position: 12 })
    buffer.insertInputText("x")
    expect(buffer.inputBuffer()).toBe("x")
    expect(buffer.text()).toBe("log line\nx")
  })

  it("inserts output in front of an open input region", () => {
    const buffer = withInput("1+")
    buffer.appendOutput("stdout", "hello")
    expect(buffer.text()).toBe("hello\n1+")
    expect(buffer.promptPos).toBe(6)
    expect(buffer.inputBuffer()).toBe("1+")
    expect(buffer.selection).toEqual({ anchor: 8, position: 8 })
    expect(buffer.promptForLine(0)).toBe("")
    expect(buffer.promptForLine(1)).toBe("> ")
  })

  it("terminates the previous record before appending", () => {
    const buffer = new ConsoleBuffer()
    buffer.appendOutput("stdout", "abc")
    buffer.appendOutput("stdout", "def\n")
    expect(buffer.text()).toBe("abc\ndef\n")
    expect(buffer.lineCount).toBe(2)
    expect(buffer.appendOutput("stdout", "")).toBeNull()
  })

  it("labels only the first line of multi-line output", () => {
    const buffer = new ConsoleBuffer()
    buffer.appendOutput("output", "[\n  1\n]", "OUT[0]: ")
    expect(buffer.log.at(0).prompt).toBe("OUT[0]: \n\n\n")
    expect([0, 1, 2].map((line) => buffer.promptForLine(line))).toEqual(["OUT[0]: ", "", ""])
  })

  it("commits or discards the input region", () => {
    const buffer = withInput("kept")
    expect(buffer.commitInput()).toBe("kept")
    expect(buffer.hasInput).toBe(false)
    expect(buffer.inputBuffer()).toBe("")
    buffer.openInput("> ", ". ", "dropped\ntoo")
    expect(buffer.discardInput()).toBe("dropped\ntoo")
    expect(buffer.text()).toBe("kept\n")
    expect(buffer.log.length).toBe(1)
    expect(() => {
      buffer.openInput("> ", ". ")
      buffer.openInput("> ", ". ")
    }).toThrow(ConsoleError)
  })

  it("moves between input lines keeping the column", () => {
    const buffer = withInput("abc\nd")
    buffer.moveLine(-1)
    expect(buffer.cursorOffset()).toBe(1)
    buffer.moveCursorBy(2)
    buffer.moveLine(1)
    expect(buffer.cursorOffset()).toBe(5)
    buffer.home()
    expect(buffer.cursorOffset()).toBe(4)
    buffer.moveCursorBy(-10, true)
    expect(buffer.selection).toEqual({ anchor: 4, position: 0 })
  })

  it("clears the input buffer", () => {
    const buffer = withInput("one\ntwo")
    buffer.clearInputBuffer()
    expect(buffer.inputBuffer()).toBe("")
    expect(buffer.log.length).toBe(1)
    expect(buffer.cursorOffset()).toBe(0)
  })

  it("finds records by document position", () => {
    const buffer = new ConsoleBuffer()
    buffer.appendOutput("stdout", "ab\n")
    buffer.openInput("> ", ". ", "xyz")
    expect(buffer.recordAtPosition(4)).toMatchObject({ index: 1, offset: 1 })
    expect(buffer.recordAtPosition(4).record.domain).toBe("input")
  })

  it("notifies listeners of appended records and input edits", () => {
    const buffer = new ConsoleBuffer()
    const listener = vi.fn()
    const unsubscribe = buffer.subscribe(listener)
    const record = buffer.append("raw", "\n", "\n")
    buffer.openInput("> ", ". ")
    expect(listener).toHaveBeenNthCalledWith(1, { kind: "append", record })
    expect(listener).toHaveBeenNthCalledWith(2, { kind: "input" })
    unsubscribe()
    buffer.insertInputText("x")
    expect(listener).toHaveBeenCalledTimes(2)
  })

  it("rejects tab widths below one", () => {
    expect(() => new ConsoleBuffer({ tabWidth: 0 })).toThrow(RangeError)
  })
})
