import React from "react"
import { Command } from "@effect/cli"
import { Effect } from "effect"
import { render } from "ink"
import type { Instance as InkInstance } from "ink"
import { AppConfigTag } from "../config/appConfig.js"
import { ConsoleSession } from "../console/consoleSession.js"
import { ConsoleView } from "../repl/components/ConsoleView.js"
import { modeOption, sessionOptionsFromConfig } from "./sessionOptions.js"

export const replCommand = Command.make("repl", { mode: modeOption }, ({ mode }) =>
  Effect.gen(function* () {
    const config = yield* AppConfigTag
    yield* Effect.tryPromise({
      try: async () => {
        let instance: InkInstance | null = null
        const session = new ConsoleSession(
          sessionOptionsFromConfig(config, mode, {
            onExit: () => instance?.unmount(),
          }),
        )
        instance = render(<ConsoleView session={session} rows={process.stdout.rows} />, { exitOnCtrlC: false })
        try {
          await instance.waitUntilExit()
        } finally {
          session.exit()
        }
      },
      catch: (error) => (error instanceof Error ? error : new Error(String(error))),
    })
  }),
).pipe(Command.withDescription("interactive console"))
