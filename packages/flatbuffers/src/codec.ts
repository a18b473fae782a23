/**
 * Descriptor-driven serialization.
 *
 * `serialize` walks a plain value tree and writes it through a `Builder`;
 * `deserialize` reads every field of a finished buffer back into the same
 * shape. Both run as effects whose error channel carries the typed
 * `SerializeError` / `DecodeError` unions.
 *
 * ## Usage
 *
 * ```typescript
 * import * as Effect from "effect/Effect"
 * import { Codec, Descriptor, Field } from "@flatwire/flatbuffers"
 *
 * const Point = Descriptor.make("Point", [Field.int32("x"), Field.int32("y")])
 *
 * const program = Effect.gen(function*() {
 *   const bytes = yield* Codec.serialize({ x: 1, y: 2 }, Point)
 *   return yield* Codec.deserialize(bytes, Point)
 * })
 * ```
 *
 * @module
 */
export * from "./codec/decoder.ts"
export * from "./codec/encoder.ts"
export * from "./codec/values.ts"
