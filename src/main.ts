#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { AppConfigLayer } from "./config/appConfig.js"
import { replCommand } from "./commands/repl.js"
import { runCommand } from "./commands/run.js"

const root = Command.make("consolekit", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([replCommand, runCommand]),
)

const cli = Command.run(root, { name: "consolekit", version: "0.1.0" })

const argv = process.argv.length <= 2 ? [...process.argv.slice(0, 2), "repl"] : process.argv

cli(argv).pipe(Effect.provide(Layer.merge(NodeContext.layer, AppConfigLayer)), NodeRuntime.runMain)
