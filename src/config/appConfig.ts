import dotenv from "dotenv"
import { Effect, Layer, Context } from "effect"
import { DEFAULT_PROMPTS, type ConsolePrompts } from "../console/consoleSession.js"
import { isExecutionMode, type ExecutionMode } from "../engine/backend.js"
import { DEFAULT_SHARED_CAPACITY } from "../stream/backlog.js"
import { loadUserConfigSync } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly executionMode: ExecutionMode
  readonly tabWidth: number
  readonly ctrlDExits: boolean
  readonly stdinCapacity: number
  readonly prompts: ConsolePrompts
}

const DEFAULT_MODE: ExecutionMode = "thread"
const DEFAULT_TAB_WIDTH = 4

const positiveInteger = (value: unknown): number | undefined => {
  const parsed = typeof value === "string" ? Number(value.trim()) : value
  return typeof parsed === "number" && Number.isInteger(parsed) && parsed > 0 ? parsed : undefined
}

const parseFlag = (value: string | undefined): boolean | undefined => {
  if (value === undefined) return undefined
  const normalized = value.trim().toLowerCase()
  return normalized === "1" || normalized === "true"
}

const resolveMode = (...candidates: Array<string | undefined>): ExecutionMode => {
  for (const candidate of candidates) {
    const normalized = candidate?.trim().toLowerCase()
    if (!normalized) continue
    if (isExecutionMode(normalized)) return normalized
    console.warn(`[config] unknown execution mode "${candidate}", expected inline, queued, executor or thread`)
  }
  return DEFAULT_MODE
}

const computeConfig = (): AppConfig => {
  const userConfig = loadUserConfigSync()
  const executionMode = resolveMode(process.env.CONSOLEKIT_EXEC_MODE, userConfig.executionMode)
  const tabWidth =
    positiveInteger(process.env.CONSOLEKIT_TAB_WIDTH) ?? positiveInteger(userConfig.tabWidth) ?? DEFAULT_TAB_WIDTH
  const ctrlDExits = parseFlag(process.env.CONSOLEKIT_CTRL_D_EXITS) ?? userConfig.ctrlDExits ?? true
  const stdinCapacity =
    positiveInteger(process.env.CONSOLEKIT_STDIN_CAPACITY) ??
    positiveInteger(userConfig.stdinCapacity) ??
    DEFAULT_SHARED_CAPACITY
  return {
    executionMode,
    tabWidth,
    ctrlDExits,
    stdinCapacity,
    prompts: { ...DEFAULT_PROMPTS, ...(userConfig.prompts ?? {}) },
  }
}

export const AppConfigTag = Context.GenericTag<AppConfig>("AppConfig")

export const AppConfigLayer = Layer.effect(AppConfigTag, Effect.sync(computeConfig))

export const loadAppConfig = (): AppConfig => computeConfig()
