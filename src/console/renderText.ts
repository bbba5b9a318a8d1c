import chalk from "chalk"
import type { RecordDomain } from "../transcript/log.js"
import type { ConsoleBuffer } from "./consoleBuffer.js"

export interface RenderOptions {
  readonly colors?: boolean
  /** Draw the cursor (inverse cell) inside the input region. */
  readonly showCursor?: boolean
  /** Minimum gutter width; grows to fit the widest prompt. */
  readonly gutterWidth?: number
}

export interface RenderedLine {
  readonly prompt: string
  readonly text: string
  readonly domain: RecordDomain
}

const DOMAIN_STYLE: Record<RecordDomain, (value: string) => string> = {
  input: (value) => value,
  output: (value) => chalk.green(value),
  stdout: (value) => value,
  stdin: (value) => chalk.cyan(value),
  raw: (value) => value,
  control: (value) => chalk.dim(value),
}

const PROMPT_STYLE: Record<RecordDomain, (value: string) => string> = {
  input: (value) => chalk.blue(value),
  output: (value) => chalk.red(value),
  stdout: (value) => chalk.dim(value),
  stdin: (value) => chalk.dim(value),
  raw: (value) => value,
  control: (value) => chalk.dim(value),
}

/** One entry per document line: its gutter prompt, its text and the domain of its record. */
export const documentLines = (buffer: ConsoleBuffer): RenderedLine[] => {
  const texts = buffer.text().split("\n")
  const lines: RenderedLine[] = []
  for (let line = 0; line < buffer.lineCount; line += 1) {
    const { record } = buffer.log.findRecordForLine(line)
    lines.push({ prompt: buffer.promptForLine(line), text: texts[line] ?? "", domain: record.domain })
  }
  return lines
}

const withCursor = (text: string, column: number, colors: boolean): string => {
  const cell = text.charAt(column) || " "
  const marked = colors ? chalk.inverse(cell) : "_"
  return colors ? text.slice(0, column) + marked + text.slice(column + 1) : text.slice(0, column) + marked + text.slice(column)
}

/** Locate the cursor as (document line, column). */
export const cursorLocation = (buffer: ConsoleBuffer): { line: number; column: number } | null => {
  if (!buffer.hasInput) return null
  const before = buffer.text().slice(0, buffer.selection.position)
  const line = before.split("\n").length - 1
  return { line, column: before.length - (before.lastIndexOf("\n") + 1) }
}

export const renderTranscriptLines = (buffer: ConsoleBuffer, options: RenderOptions = {}): string[] => {
  const colors = options.colors ?? true
  const lines = documentLines(buffer)
  const width = Math.max(options.gutterWidth ?? 0, ...lines.map((line) => line.prompt.length))
  const cursor = options.showCursor ? cursorLocation(buffer) : null
  return lines.map((line, index) => {
    const gutter = line.prompt.padStart(width)
    const text = cursor && cursor.line === index ? withCursor(line.text, cursor.column, colors) : line.text
    if (!colors) return `${gutter}${text}`
    return `${PROMPT_STYLE[line.domain](gutter)}${DOMAIN_STYLE[line.domain](text)}`
  })
}

export const renderTranscriptText = (buffer: ConsoleBuffer, options: RenderOptions = {}): string =>
  renderTranscriptLines(buffer, options)
    .map((line) => line.trimEnd())
    .join("\n")
