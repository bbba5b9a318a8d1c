import { Options } from "@effect/cli"
import { Option } from "effect"
import type { AppConfig } from "../config/appConfig.js"
import type { ConsoleSessionOptions } from "../console/consoleSession.js"
import { EXECUTION_MODES, type ExecutionMode, type ExecutorSpawn } from "../engine/backend.js"

export const modeOption = Options.choice("mode", EXECUTION_MODES).pipe(
  Options.withDescription("how submissions run: inline, queued, executor or thread"),
  Options.optional,
)

/** The CLI's executor: every job starts on a fresh timer turn. */
export const timerSpawn: ExecutorSpawn = (job) => {
  setTimeout(() => {
    void job()
  }, 0)
}

export const sessionOptionsFromConfig = (
  config: AppConfig,
  mode: Option.Option<ExecutionMode>,
  overrides: Partial<ConsoleSessionOptions> = {},
): ConsoleSessionOptions => ({
  mode: Option.getOrElse(mode, () => config.executionMode),
  spawn: timerSpawn,
  tabWidth: config.tabWidth,
  ctrlDExits: config.ctrlDExits,
  prompts: config.prompts,
  stdinCapacity: config.stdinCapacity,
  ...overrides,
})
