import * as Args from "@effect/cli/Args"
import * as Command from "@effect/cli/Command"
import * as Options from "@effect/cli/Options"
import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import * as Errors from "../errors.ts"
import { readBuffer } from "../input.ts"
import * as Inspection from "../inspection.ts"

const file = Args.file({ name: "file" }).pipe(
  Args.withDescription("The finished buffer to inspect.")
)

const sizePrefixed = Options.boolean("size-prefixed").pipe(
  Options.withAlias("s"),
  Options.withDescription("Whether the buffer starts with a 4-byte size prefix.")
)

/**
 * Reads a buffer from disk and resolves its root table and vtable.
 */
export const inspectFile = Effect.fnUntraced(function*(path: string, sizePrefixed: boolean) {
  const bytes = yield* readBuffer(path, { sizePrefixed, identifier: false })
  return yield* Inspection.inspect(bytes, sizePrefixed)
})

const handleInspectCommand = Effect.fnUntraced(function*({ file, sizePrefixed }: {
  readonly file: string
  readonly sizePrefixed: boolean
}) {
  const inspection = yield* inspectFile(file, sizePrefixed).pipe(
    Effect.catchAll(Effect.fnUntraced(function*(error) {
      yield* Console.error(`Failed to inspect ${file}: ${error.message}`)
      return yield* new Errors.NonZeroExitCode()
    }))
  )
  yield* Console.log(Inspection.format(inspection).join("\n"))
})

export const InspectCommand = Command.make("inspect", { file, sizePrefixed }).pipe(
  Command.withDescription("Print the root offset, file identifier and root vtable of a finished buffer."),
  Command.withHandler(handleInspectCommand)
)
