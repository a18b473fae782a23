import * as CliConfig from "@effect/cli/CliConfig"
import * as Command from "@effect/cli/Command"
import * as NodeContext from "@effect/platform-node/NodeContext"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import PackageJson from "../package.json" with { type: "json" }
import { IdentifyCommand } from "./commands/identify.ts"
import { InspectCommand } from "./commands/inspect.ts"

const RootCommand = Command.make("flatwire").pipe(
  Command.withDescription("Inspect finished FlatBuffers."),
  Command.withSubcommands([InspectCommand, IdentifyCommand])
)

const run = Command.run(RootCommand, {
  name: "Flatwire",
  version: PackageJson["version"]
})

const CliConfigLayer = CliConfig.layer({
  showBuiltIns: false
})

const MainLayer = CliConfigLayer.pipe(
  Layer.provideMerge(NodeContext.layer)
)

export const Cli = run(process.argv).pipe(
  Effect.provide(MainLayer),
  Effect.catchTag("Flatwire/NonZeroExitCode", () => Effect.sync(() => process.exit(1)))
)
