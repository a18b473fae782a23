/**
 * Builder configuration and the `FlatBuffers` service, which runs the codec
 * with a fixed set of builder options.
 *
 * @module
 */
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import { Builder, type BuilderOptions } from "./builder/builder.ts"
import { DEFAULT_INITIAL_SIZE } from "./core/constants.ts"
import type { DecodeError, SerializeError } from "./core/errors.ts"
import { type DeserializeOptions, deserialize } from "./codec/decoder.ts"
import { type SerializeOptions, serialize } from "./codec/encoder.ts"
import type { Serializable, TableValue } from "./codec/values.ts"
import type { TableDescriptor } from "./descriptor/types.ts"

// =============================================================================
// Options
// =============================================================================

export interface ResolvedBuilderOptions {
  readonly initialSize: number
  readonly forceDefaults: boolean
}

export const defaults: ResolvedBuilderOptions = {
  initialSize: DEFAULT_INITIAL_SIZE,
  forceDefaults: false
}

/**
 * Reads builder options from `FLATBUFFERS_INITIAL_SIZE` and
 * `FLATBUFFERS_FORCE_DEFAULTS`.
 */
export const BuilderOptionsConfig: Config.Config<ResolvedBuilderOptions> = Config.all({
  initialSize: Config.integer("FLATBUFFERS_INITIAL_SIZE").pipe(
    Config.validate({ message: "Expected a positive integer", validation: (n) => n > 0 }),
    Config.withDefault(defaults.initialSize)
  ),
  forceDefaults: Config.boolean("FLATBUFFERS_FORCE_DEFAULTS").pipe(
    Config.withDefault(defaults.forceDefaults)
  )
})

// =============================================================================
// Service
// =============================================================================

export class FlatBuffers extends Context.Tag("FlatBuffers/FlatBuffers")<FlatBuffers, {
  readonly options: ResolvedBuilderOptions
  /**
   * Creates a fresh builder with the configured options.
   */
  readonly builder: Effect.Effect<Builder>
  readonly serialize: (
    value: TableValue | Serializable,
    descriptor: TableDescriptor,
    options?: Omit<SerializeOptions, keyof BuilderOptions>
  ) => Effect.Effect<Uint8Array, SerializeError>
  readonly deserialize: (
    bytes: Uint8Array,
    descriptor: TableDescriptor,
    options?: DeserializeOptions
  ) => Effect.Effect<TableValue, DecodeError>
}>() {}

export const make = (options: BuilderOptions = {}): Context.Tag.Service<FlatBuffers> => {
  const resolved: ResolvedBuilderOptions = {
    initialSize: options.initialSize ?? defaults.initialSize,
    forceDefaults: options.forceDefaults ?? defaults.forceDefaults
  }
  return FlatBuffers.of({
    options: resolved,
    builder: Effect.sync(() => new Builder(resolved)),
    serialize: (value, descriptor, serializeOptions = {}) =>
      serialize(value, descriptor, { ...serializeOptions, ...resolved }),
    deserialize
  })
}

export const layer = (options: BuilderOptions = {}): Layer.Layer<FlatBuffers> =>
  Layer.succeed(FlatBuffers, make(options))

export const layerConfig: Layer.Layer<FlatBuffers, ConfigError.ConfigError> = Layer.effect(
  FlatBuffers,
  Effect.map(BuilderOptionsConfig, make)
)
