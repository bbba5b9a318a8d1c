import React, { useEffect, useState } from "react"
import { Box, Text, useInput } from "ink"
import chalk from "chalk"
import type { ConsoleSession } from "../../console/consoleSession.js"
import { renderTranscriptLines } from "../../console/renderText.js"

const DEFAULT_ROWS = 30
const COMPLETABLE_TAIL = /[\w$.]$/

export interface ConsoleViewProps {
  readonly session: ConsoleSession
  readonly rows?: number
  readonly colors?: boolean
}

const commonPrefix = (values: readonly string[]): string =>
  values.reduce((prefix, value) => {
    let index = 0
    while (index < prefix.length && index < value.length && prefix[index] === value[index]) index += 1
    return prefix.slice(0, index)
  })

const reportFailure = (what: string) => (error: unknown) => {
  console.error(`[repl] ${what} failed:`, error)
}

export const ConsoleView: React.FC<ConsoleViewProps> = ({ session, rows, colors = true }) => {
  const [, setVersion] = useState(0)
  const [completions, setCompletions] = useState<string[]>([])
  const buffer = session.buffer

  useEffect(() => session.subscribe(() => setVersion((value) => value + 1)), [session])

  const complete = () => {
    const before = buffer.inputBuffer().slice(0, buffer.cursorOffset())
    const line = before.slice(before.lastIndexOf("\n") + 1)
    if (!COMPLETABLE_TAIL.test(line)) {
      buffer.insertTab()
      return
    }
    const word = /[\w$]*$/.exec(line)?.[0] ?? ""
    void session
      .getCompletions(line)
      .then((names) => {
        if (names.length === 0) {
          setCompletions([])
          return
        }
        const prefix = commonPrefix(names)
        if (prefix.length > word.length) buffer.insertInputText(prefix.slice(word.length))
        setCompletions(names.length > 1 ? names : [])
      })
      .catch(reportFailure("completion"))
  }

  useInput((input, key) => {
    if (session.isExited) return
    setCompletions([])
    if (key.ctrl && input === "c") {
      session.interrupt()
      return
    }
    if (key.ctrl && input === "d") {
      session.endOfInput()
      return
    }
    if (key.ctrl && input === "a") {
      buffer.home(key.shift)
      return
    }
    if (key.return) {
      if (key.shift) {
        buffer.insertInputText("\n")
        return
      }
      buffer.moveCursor(buffer.promptEnd)
      void session.processInput().catch(reportFailure("input"))
      return
    }
    if (key.tab) {
      if (key.shift) {
        buffer.indentSelection(false)
      } else if (buffer.hasSelection) {
        buffer.insertTab()
      } else {
        complete()
      }
      return
    }
    if (key.backspace) {
      buffer.backspace({ word: key.ctrl || key.meta })
      return
    }
    if (key.delete) {
      // most terminals send DEL for Backspace; only Ctrl-Delete is unambiguous
      if (key.ctrl) {
        buffer.deleteForward({ word: true })
      } else {
        buffer.backspace({ word: key.meta })
      }
      return
    }
    if (key.leftArrow || key.rightArrow) {
      buffer.moveCursorBy(key.leftArrow ? -1 : 1, key.shift)
      return
    }
    if (key.upArrow || key.downArrow) {
      buffer.moveLine(key.upArrow ? -1 : 1, key.shift)
      return
    }
    if (input && !key.ctrl && !key.meta) {
      buffer.insertInputText(input)
    }
  })

  const height = rows && Number.isFinite(rows) ? rows : DEFAULT_ROWS
  const lines = renderTranscriptLines(buffer, { colors, showCursor: !session.isExited })
  const bodyRows = Math.max(1, height - 1)
  const visible = lines.slice(Math.max(0, lines.length - bodyRows))
  const status = session.isExited
    ? "exited"
    : session.isRunning
      ? "running • Ctrl-C interrupt"
      : "Enter run • Shift-Enter newline • Tab complete • Ctrl-D exit"

  return (
    <Box flexDirection="column">
      {visible.map((line, index) => (
        <Text key={`ln-${lines.length - visible.length + index}`} wrap="truncate-end">
          {line}
        </Text>
      ))}
      {completions.length > 0 ? <Text wrap="truncate-end">{completions.join("  ")}</Text> : null}
      <Text wrap="truncate-end">{colors ? chalk.dim(status) : status}</Text>
    </Box>
  )
}
