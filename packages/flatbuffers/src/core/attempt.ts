import * as Effect from "effect/Effect"
import { identity } from "effect/Function"

/**
 * Runs a synchronous computation that signals failure by throwing. Errors
 * accepted by `refine` become typed failures; anything else is a defect.
 */
export const attempt = <A, E>(evaluate: () => A, refine: (u: unknown) => u is E): Effect.Effect<A, E> =>
  Effect.try({ try: evaluate, catch: identity }).pipe(
    Effect.catchAll((cause) => refine(cause) ? Effect.fail(cause) : Effect.die(cause))
  )
