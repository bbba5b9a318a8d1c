import { Args, Command, Options } from "@effect/cli"
import { Console, Effect } from "effect"
import { promises as fs } from "node:fs"
import { AppConfigTag } from "../config/appConfig.js"
import { ConsoleSession, type ConsoleSessionOptions } from "../console/consoleSession.js"
import { renderTranscriptText } from "../console/renderText.js"
import { modeOption, sessionOptionsFromConfig } from "./sessionOptions.js"

const fileArg = Args.file({ name: "file", exists: "yes" })
const colorOption = Options.boolean("color").pipe(Options.withDescription("colour the transcript"))

/**
 * Types `source` into a fresh console line by line, pressing Enter after each, and returns the
 * rendered transcript. Stdin is closed up front, so `input()` sees end of file.
 */
export const runConsoleScript = async (
  source: string,
  options: ConsoleSessionOptions & { readonly colors?: boolean } = {},
): Promise<string> => {
  const session = new ConsoleSession({ ...options, ctrlDExits: false })
  session.stdin.close()
  try {
    const lines = source.endsWith("\n") ? source.slice(0, -1).split("\n") : source.split("\n")
    for (const line of lines) {
      if (line.trim() === "" && session.buffer.inputBuffer() === "") continue
      session.buffer.insertInputText(line)
      await session.processInput()
    }
    return renderTranscriptText(session.buffer, { colors: options.colors ?? false })
  } finally {
    session.exit()
  }
}

export const runCommand = Command.make("run", { file: fileArg, mode: modeOption, color: colorOption }, ({ file, mode, color }) =>
  Effect.gen(function* () {
    const config = yield* AppConfigTag
    const source = yield* Effect.tryPromise({
      try: () => fs.readFile(file, "utf8"),
      catch: (error) => (error instanceof Error ? error : new Error(String(error))),
    })
    const transcript = yield* Effect.tryPromise({
      try: () => runConsoleScript(source, { ...sessionOptionsFromConfig(config, mode), colors: color }),
      catch: (error) => (error instanceof Error ? error : new Error(String(error))),
    })
    yield* Console.log(transcript)
  }),
).pipe(Command.withDescription("run a script through the console and print the transcript"))
