import * as Data from "effect/Data"
import * as Schema from "effect/Schema"

/**
 * Signals that the process should exit with a non-zero status once the
 * command has reported its failure.
 */
export class NonZeroExitCode extends Data.TaggedError("Flatwire/NonZeroExitCode") {}

/**
 * Represents an input file too short to hold the buffer header that the
 * command needs, e.g. a root offset and a file identifier.
 */
export class TruncatedInputError extends Schema.TaggedError<TruncatedInputError>(
  "Flatwire/TruncatedInputError"
)("TruncatedInputError", {
  path: Schema.String,
  length: Schema.Number,
  /**
   * The number of bytes the header occupies.
   */
  minimum: Schema.Number
}) {
  override get message(): string {
    return `${this.path} is ${this.length} bytes long, shorter than the ${this.minimum}-byte header`
  }
}
