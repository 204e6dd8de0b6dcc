import { Effect, Logger, LogLevel } from "effect"

/**
 * Runs an effect with logging silenced.
 */
export const run = <A, E>(effect: Effect.Effect<A, E>): Promise<A> =>
  Effect.runPromise(effect.pipe(Logger.withMinimumLogLevel(LogLevel.None)))

/**
 * Runs an effect expected to fail and returns its error.
 */
export const runFailure = <A, E>(effect: Effect.Effect<A, E>): Promise<E> => run(Effect.flip(effect))
