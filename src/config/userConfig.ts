import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"

export interface UserConfigFile {
  readonly executionMode?: string
  readonly tabWidth?: number
  readonly ctrlDExits?: boolean
  readonly stdinCapacity?: number
  readonly prompts?: {
    readonly input?: string
    readonly continuation?: string
    readonly output?: string
  }
}

const resolveConfigPath = (): string => {
  const explicit = process.env.CONSOLEKIT_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".consolekit", "config.json")
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const readConfigFile = (configPath: string): unknown => {
  try {
    return JSON.parse(fs.readFileSync(configPath, "utf8"))
  } catch (error) {
    console.warn(`[config] ignoring unreadable ${configPath}:`, error instanceof Error ? error.message : error)
    return null
  }
}

export const loadUserConfigSync = (): UserConfigFile => {
  const configPath = resolveConfigPath()
  if (!fs.existsSync(configPath)) return {}
  const parsed = readConfigFile(configPath)
  if (!isRecord(parsed)) return {}
  const executionMode = typeof parsed.executionMode === "string" ? parsed.executionMode : undefined
  const tabWidth = typeof parsed.tabWidth === "number" ? parsed.tabWidth : undefined
  const ctrlDExits = typeof parsed.ctrlDExits === "boolean" ? parsed.ctrlDExits : undefined
  const stdinCapacity = typeof parsed.stdinCapacity === "number" ? parsed.stdinCapacity : undefined
  const promptsRaw = isRecord(parsed.prompts) ? parsed.prompts : undefined
  const prompts = promptsRaw
    ? {
        ...(typeof promptsRaw.input === "string" ? { input: promptsRaw.input } : {}),
        ...(typeof promptsRaw.continuation === "string" ? { continuation: promptsRaw.continuation } : {}),
        ...(typeof promptsRaw.output === "string" ? { output: promptsRaw.output } : {}),
      }
    : undefined
  return { executionMode, tabWidth, ctrlDExits, stdinCapacity, prompts }
}
