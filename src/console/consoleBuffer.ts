import { ConsoleError } from "../errors.js"
import {
  Log,
  countLineBreaks,
  makeRecord,
  type LogRecord,
  type RecordDomain,
  type RecordLocation,
} from "../transcript/log.js"

export interface BufferSelection {
  /** Absolute document offsets. */
  readonly anchor: number
  readonly position: number
}

export type BufferChange = { readonly kind: "append"; readonly record: LogRecord } | { readonly kind: "input" }

export type BufferListener = (change: BufferChange) => void

export interface ConsoleBufferOptions {
  readonly tabWidth?: number
}

export interface KeyOptions {
  readonly word?: boolean
}

const WORD_CHAR = /\w/

const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(value, max))

const previousWordStart = (text: string, offset: number): number => {
  let index = offset
  while (index > 0 && !WORD_CHAR.test(text[index - 1])) index -= 1
  while (index > 0 && WORD_CHAR.test(text[index - 1])) index -= 1
  return index
}

const nextWordEnd = (text: string, offset: number): number => {
  let index = offset
  while (index < text.length && !WORD_CHAR.test(text[index])) index += 1
  while (index < text.length && WORD_CHAR.test(text[index])) index += 1
  return index
}

const lineStartOffsets = (lines: readonly string[]): number[] => {
  const starts: number[] = []
  let offset = 0
  for (const line of lines) {
    starts.push(offset)
    offset += line.length + 1
  }
  return starts
}

/**
 * The console document: transcript history followed by the editable input region, all held in a
 * single Log so that line and character lookups cover the whole document.
 *
 * The input region is records `[inputStart, length)`, one record per input line. History is
 * append-only from the outside; new records always land in front of the input region, which
 * keeps `promptPos` and the selection valid while output arrives during editing.
 */
export class ConsoleBuffer {
  readonly log = new Log()
  readonly tabWidth: number
  private readonly listeners = new Set<BufferListener>()
  private inputStart = 0
  private inputOpen = false
  private inputDomain: RecordDomain = "input"
  private label = ""
  private continuation = ""
  // input-relative
  private anchor = 0
  private position = 0

  constructor(options: ConsoleBufferOptions = {}) {
    const tabWidth = options.tabWidth ?? 4
    if (!Number.isInteger(tabWidth) || tabWidth < 1) {
      throw new RangeError(`tab width must be a positive integer, got ${tabWidth}`)
    }
    this.tabWidth = tabWidth
  }

  get hasInput(): boolean {
    return this.inputOpen
  }

  /** Start of the input region. */
  get promptPos(): number {
    return this.inputOpen ? this.log.positions.first(this.inputStart) : this.log.totalChars
  }

  /** End of the input region, which is always the end of the document. */
  get promptEnd(): number {
    return this.log.totalChars
  }

  get lineCount(): number {
    return this.log.totalLines
  }

  get selection(): BufferSelection {
    const base = this.promptPos
    return { anchor: base + this.anchor, position: base + this.position }
  }

  get hasSelection(): boolean {
    return this.anchor !== this.position
  }

  subscribe(listener: BufferListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  append(domain: RecordDomain, prompt: string, text: string): LogRecord {
    const index = this.inputOpen ? this.inputStart : this.log.length
    this.terminateRecord(index - 1)
    const record = makeRecord(domain, prompt, this.inputOpen && !text.endsWith("\n") ? `${text}\n` : text)
    if (this.inputOpen) {
      this.log.insert(this.inputStart, record)
      this.inputStart += 1
    } else {
      this.log.append(record)
    }
    this.emit({ kind: "append", record })
    return record
  }

  /** Append `text` with a gutter of matching height, `label` on its first line. */
  appendOutput(domain: RecordDomain, text: string, label = ""): LogRecord | null {
    if (text.length === 0) return null
    const lines = countLineBreaks(text) + (text.endsWith("\n") ? 0 : 1)
    return this.append(domain, `${label}${"\n".repeat(lines)}`, text)
  }

  openInput(label: string, continuation: string, text = "", domain: RecordDomain = "input"): void {
    if (this.inputOpen) throw new ConsoleError("an input region is already open")
    this.terminateRecord(this.log.length - 1)
    this.label = label
    this.continuation = continuation
    this.inputDomain = domain
    this.inputStart = this.log.length
    this.inputOpen = true
    const lines = text.split("\n")
    lines.forEach((_, index) => this.log.append(this.inputRecord(lines, index)))
    this.anchor = text.length
    this.position = text.length
    this.emit({ kind: "input" })
  }

  /** The region becomes history. Returns its text. */
  commitInput(): string {
    const text = this.inputBuffer()
    this.closeInput()
    return text
  }

  /** The region's records are removed. Returns its text. */
  discardInput(): string {
    const text = this.inputBuffer()
    if (this.inputOpen) {
      for (let index = this.log.length - 1; index >= this.inputStart; index -= 1) {
        this.log.delete(index)
      }
    }
    this.closeInput()
    return text
  }

  inputBuffer(): string {
    if (!this.inputOpen) return ""
    return this.log
      .records()
      .slice(this.inputStart)
      .map((record) => record.text)
      .join("")
  }

  clearInputBuffer(): void {
    if (!this.inputOpen) return
    this.replaceInput(0, this.inputBuffer().length, "")
    this.anchor = 0
    this.position = 0
    this.emit({ kind: "input" })
  }

  /** Replace the selection (or insert at the cursor) with `text`. */
  insertInputText(text: string): void {
    if (!this.inputOpen) return
    this.keepCursorInBuffer()
    const [start, end] = this.selectedRange()
    this.replaceInput(start, end, text)
    this.anchor = start + text.length
    this.position = this.anchor
    this.emit({ kind: "input" })
  }

  setSelection(anchor: number, position: number): void {
    const base = this.promptPos
    const length = this.inputBuffer().length
    this.anchor = clamp(anchor - base, 0, length)
    this.position = clamp(position - base, 0, length)
    this.emit({ kind: "input" })
  }

  /** Cursor index inside the input buffer. */
  cursorOffset(): number {
    return this.position
  }

  moveCursor(position: number, select = false): void {
    this.setSelection(select ? this.promptPos + this.anchor : position, position)
  }

  moveCursorBy(delta: number, select = false): void {
    this.moveCursor(this.promptPos + this.position + delta, select)
  }

  /** Move the cursor `delta` input lines up or down, keeping its column where the line allows. */
  moveLine(delta: number, select = false): void {
    const lines = this.inputBuffer().split("\n")
    const starts = lineStartOffsets(lines)
    const line = countLineBreaks(this.inputBuffer().slice(0, this.position))
    const column = this.position - starts[line]
    const target = clamp(line + delta, 0, lines.length - 1)
    this.moveCursor(this.promptPos + starts[target] + Math.min(column, lines[target].length), select)
  }

  keepCursorInBuffer(): void {
    const length = this.inputBuffer().length
    this.anchor = clamp(this.anchor, 0, length)
    this.position = clamp(this.position, 0, length)
  }

  home(select = false): void {
    const before = this.inputBuffer().slice(0, this.position)
    this.moveCursor(this.promptPos + before.lastIndexOf("\n") + 1, select)
  }

  backspace(options: KeyOptions = {}): void {
    this.keepCursorInBuffer()
    const offset = this.position
    if (!this.hasSelection && offset >= 1) {
      if (options.word) {
        this.position = previousWordStart(this.inputBuffer(), offset)
      } else {
        // a full tab of spaces ending at a tab stop goes in one step
        const before = this.lineUntilCursor()
        const tab = " ".repeat(this.tabWidth)
        const atTabStop = before.length % this.tabWidth === 0
        this.position = offset - (atTabStop && before.endsWith(tab) ? this.tabWidth : 1)
      }
    }
    this.removeSelectedInput()
  }

  deleteForward(options: KeyOptions = {}): void {
    this.keepCursorInBuffer()
    const offset = this.position
    const buffer = this.inputBuffer()
    if (!this.hasSelection && offset < buffer.length) {
      if (options.word) {
        this.position = nextWordEnd(buffer, offset)
      } else {
        const tab = " ".repeat(this.tabWidth)
        const atTabStop = this.lineUntilCursor().length % this.tabWidth === 0
        this.position = offset + (atTabStop && this.lineAfterCursor().startsWith(tab) ? this.tabWidth : 1)
      }
    }
    this.removeSelectedInput()
  }

  /** Spaces up to the next tab stop, or an indent of every selected line. */
  insertTab(): void {
    if (this.hasSelection) {
      this.indentSelection(true)
      return
    }
    const column = this.lineUntilCursor().length
    this.insertInputText(" ".repeat(this.tabWidth - (column % this.tabWidth)))
  }

  /**
   * Add (or remove) exactly one tab width at the start of every line the selection touches.
   * Indents never snap to tab stops, so relative sub-tab indentation survives.
   */
  indentSelection(indent = true): void {
    if (!this.inputOpen) return
    this.keepCursorInBuffer()
    const buffer = this.inputBuffer()
    const [start, end] = this.selectedRange()
    const lines = buffer.split("\n")
    const oldStarts = lineStartOffsets(lines)
    const line0 = countLineBreaks(buffer.slice(0, start))
    const line1 = countLineBreaks(buffer.slice(0, end))
    const tab = " ".repeat(this.tabWidth)
    const shifts: number[] = []
    for (let index = line0; index <= line1; index += 1) {
      const line = lines[index]
      lines[index] = indent ? tab + line : line.slice(0, this.tabWidth).trimStart() + line.slice(this.tabWidth)
      shifts[index] = lines[index].length - line.length
    }
    const newStarts = lineStartOffsets(lines)
    const column0 = Math.max(0, start - oldStarts[line0] + shifts[line0])
    const column1 = Math.max(0, end - oldStarts[line1] + shifts[line1])
    this.replaceInput(0, buffer.length, lines.join("\n"))
    const anchorFirst = this.anchor <= this.position
    const newStart = newStarts[line0] + column0
    const newEnd = newStarts[line1] + column1
    this.anchor = anchorFirst ? newStart : newEnd
    this.position = anchorFirst ? newEnd : newStart
    this.emit({ kind: "input" })
  }

  text(): string {
    return this.log
      .records()
      .map((record) => record.text)
      .join("")
  }

  /** Gutter text for document line `line`. */
  promptForLine(line: number): string {
    const { record, offset } = this.log.findRecordForLine(line)
    return record.prompt.split("\n")[offset]
  }

  recordAtPosition(pos: number): RecordLocation {
    return this.log.findRecordForPosition(pos)
  }

  private selectedRange(): [number, number] {
    return this.anchor <= this.position ? [this.anchor, this.position] : [this.position, this.anchor]
  }

  private lineUntilCursor(): string {
    const before = this.inputBuffer().slice(0, this.position)
    return before.slice(before.lastIndexOf("\n") + 1)
  }

  private lineAfterCursor(): string {
    return this.inputBuffer().slice(this.position).split("\n", 1)[0]
  }

  private removeSelectedInput(): void {
    const [start, end] = this.selectedRange()
    if (start !== end) this.replaceInput(start, end, "")
    this.anchor = start
    this.position = start
    this.emit({ kind: "input" })
  }

  private inputRecord(lines: readonly string[], index: number): LogRecord {
    const prompt = `${index === 0 ? this.label : this.continuation}\n`
    const text = index < lines.length - 1 ? `${lines[index]}\n` : lines[index]
    return makeRecord(this.inputDomain, prompt, text)
  }

  /**
   * Splice `text` over input range `[start, end)` and mirror the change onto the line records
   * it touches; records outside the affected lines are left alone.
   */
  private replaceInput(start: number, end: number, text: string): void {
    const buffer = this.inputBuffer()
    const next = buffer.slice(0, start) + text + buffer.slice(end)
    const oldLines = buffer.split("\n")
    const newLines = next.split("\n")
    const first = countLineBreaks(buffer.slice(0, start))
    const lastOld = countLineBreaks(buffer.slice(0, end))
    const lastNew = lastOld + newLines.length - oldLines.length
    for (let index = first; index <= Math.min(lastOld, lastNew); index += 1) {
      this.log.set(this.inputStart + index, this.inputRecord(newLines, index))
    }
    for (let index = lastOld + 1; index <= lastNew; index += 1) {
      const record = this.inputRecord(newLines, index)
      const at = this.inputStart + index
      if (at < this.log.length) {
        this.log.insert(at, record)
      } else {
        this.log.append(record)
      }
    }
    for (let index = lastOld; index > lastNew; index -= 1) {
      this.log.delete(this.inputStart + index)
    }
  }

  /** Give history record `index` a trailing newline so the next record starts a fresh line. */
  private terminateRecord(index: number): void {
    if (index < 0) return
    const record = this.log.at(index)
    if (record.text.endsWith("\n")) return
    this.log.set(index, makeRecord(record.domain, record.prompt, `${record.text}\n`))
  }

  private closeInput(): void {
    this.inputOpen = false
    this.inputStart = this.log.length
    this.anchor = 0
    this.position = 0
    this.emit({ kind: "input" })
  }

  private emit(change: BufferChange): void {
    for (const listener of this.listeners) listener(change)
  }
}
