#!/usr/bin/env node

import * as NodeRuntime from "@effect/platform-node/NodeRuntime"
import * as Effect from "effect/Effect"
import * as Logger from "effect/Logger"
import { Cli } from "./cli.ts"

// Commands report their own failures on stderr
Cli.pipe(
  Effect.provide(Logger.pretty),
  NodeRuntime.runMain({ disableErrorReporting: true, disablePrettyLogger: true })
)
