export * from "./errors.js"
export { Partition } from "./transcript/partition.js"
export { Log, makeRecord, countLineBreaks, recordLineCount } from "./transcript/log.js"
export type { LogRecord, RecordDomain, RecordLocation } from "./transcript/log.js"
export { Stream } from "./stream/stream.js"
export type { ReadlineOptions } from "./stream/stream.js"
export { LocalBacklog, SharedBacklog, createSharedBacklogBuffer, DEFAULT_SHARED_CAPACITY } from "./stream/backlog.js"
export type { Backlog, WaitResult } from "./stream/backlog.js"
export { ExecutionController } from "./engine/controller.js"
export type { ControllerState, ExecutionControllerOptions, SubmitResult } from "./engine/controller.js"
export { EXECUTION_MODES, isExecutionMode } from "./engine/backend.js"
export type { ExecutionBackend, ExecutionMode, ExecutorSpawn } from "./engine/backend.js"
export { Interpreter, INTERRUPT_MARKER, NEVER_CANCELLED, formatUserError } from "./engine/interpreter.js"
export type { CancellationToken, ExecutionOutcome, InterpreterOptions } from "./engine/interpreter.js"
export { analyzeSource, needsMoreInput } from "./engine/sourceAnalysis.js"
export type { SourceAnalysis, StatementPlan } from "./engine/sourceAnalysis.js"
export { ConsoleBuffer } from "./console/consoleBuffer.js"
export type { BufferChange, BufferListener, BufferSelection, ConsoleBufferOptions } from "./console/consoleBuffer.js"
export { ConsoleSession, DEFAULT_PROMPTS, CTRL_D_NOTICE } from "./console/consoleSession.js"
export type { ConsolePrompts, ConsoleSessionOptions, ProcessResult } from "./console/consoleSession.js"
export { NamespaceCompleter } from "./console/completer.js"
export type { Completer, NameLookup } from "./console/completer.js"
export { renderTranscriptLines, renderTranscriptText, documentLines } from "./console/renderText.js"
export { loadAppConfig, AppConfigTag, AppConfigLayer } from "./config/appConfig.js"
export type { AppConfig } from "./config/appConfig.js"
