import * as Args from "@effect/cli/Args"
import * as Command from "@effect/cli/Command"
import * as Options from "@effect/cli/Options"
import { FILE_IDENTIFIER_LENGTH } from "@flatwire/flatbuffers/core/constants"
import { Table } from "@flatwire/flatbuffers/table/table"
import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import * as Schema from "effect/Schema"
import * as Errors from "../errors.ts"
import { readBuffer } from "../input.ts"

const file = Args.file({ name: "file" }).pipe(
  Args.withDescription("The finished buffer to check.")
)

const identifier = Options.text("identifier").pipe(
  Options.withAlias("i"),
  Options.withDescription("The expected four-character file identifier."),
  Options.withSchema(Schema.String.pipe(Schema.length(FILE_IDENTIFIER_LENGTH)))
)

const sizePrefixed = Options.boolean("size-prefixed").pipe(
  Options.withAlias("s"),
  Options.withDescription("Whether the buffer starts with a 4-byte size prefix.")
)

/**
 * Returns whether the buffer at `path` carries `identifier`.
 */
export const identifyFile = Effect.fnUntraced(function*(path: string, identifier: string, sizePrefixed: boolean) {
  const bytes = yield* readBuffer(path, { sizePrefixed, identifier: true })
  return Table.hasIdentifier(bytes, identifier, sizePrefixed)
})

const handleIdentifyCommand = Effect.fnUntraced(function*({ file, identifier, sizePrefixed }: {
  readonly file: string
  readonly identifier: string
  readonly sizePrefixed: boolean
}) {
  const matches = yield* identifyFile(file, identifier, sizePrefixed).pipe(
    Effect.catchAll(Effect.fnUntraced(function*(error) {
      yield* Console.error(`Failed to read ${file}: ${error.message}`)
      return yield* new Errors.NonZeroExitCode()
    }))
  )
  if (!matches) {
    yield* Console.error(`${file} does not carry the file identifier '${identifier}'`)
    return yield* new Errors.NonZeroExitCode()
  }
  yield* Console.log(`${file}: ${identifier}`)
})

export const IdentifyCommand = Command.make("identify", { file, identifier, sizePrefixed }).pipe(
  Command.withDescription("Check that a finished buffer carries the expected file identifier."),
  Command.withHandler(handleIdentifyCommand)
)
