import { Context, Effect, Layer, SynchronizedRef } from "effect"
import * as Snapshot from "./ClockSnapshot.js"
import { ClockConfigurationError } from "./Errors.js"

/**
 * The state of a clock immediately before and after one update.
 * Both sides are captured inside the same critical section.
 */
export interface Transition {
  readonly before: Snapshot.ClockSnapshot
  readonly after: Snapshot.ClockSnapshot
}

/**
 * A vector clock owned by one process.
 *
 * The key set is fixed to the roster given at construction. Every update runs as a single
 * atomic step on a `SynchronizedRef`, so concurrent callers within the owning process observe
 * some total order of increments and merges and never lose an update. Clocks of different
 * processes share nothing.
 */
export interface VectorClock {
  /** Identifier of the owning process */
  readonly processId: string
  /** Every process the clock tracks, in roster order */
  readonly roster: ReadonlyArray<string>
  /**
   * Stamps a local event by adding exactly one to the owner's counter.
   */
  readonly increment: () => Effect.Effect<Transition>
  /**
   * Applies the receive rule: component-wise maximum over the keys both sides track, then one
   * tick of the owner's counter. Keys the local clock does not track are dropped.
   * @param received - The snapshot the sender attached to its message
   */
  readonly merge: (received: Snapshot.ClockSnapshot) => Effect.Effect<Transition>
  /**
   * A frozen copy of the current state.
   */
  readonly snapshot: Effect.Effect<Snapshot.ClockSnapshot>
  /**
   * The counter of a process, or 0 when the process is not tracked.
   */
  readonly valueOf: (processId: string) => Effect.Effect<number>
  /**
   * The current state rendered with keys in lexicographic order.
   */
  readonly format: Effect.Effect<string>
}

/**
 * Options for building a vector clock.
 */
export interface VectorClockOptions {
  /** Starting counters, restricted to roster members. Missing members start at zero. */
  readonly initial?: Snapshot.ClockSnapshot
}

const validate = (
  processId: string,
  roster: ReadonlyArray<string>,
  options: VectorClockOptions
): Effect.Effect<Snapshot.ClockSnapshot, ClockConfigurationError> => {
  const fail = (message: string) => Effect.fail(new ClockConfigurationError({ message, processId }))

  if (roster.length === 0) {
    return fail("Roster must name at least one process")
  }
  const seen = new Set<string>()
  for (const member of roster) {
    if (member.length === 0) {
      return fail("Roster entries must be non-empty process identifiers")
    }
    if (seen.has(member)) {
      return fail(`Duplicate roster entry: ${member}`)
    }
    seen.add(member)
  }
  if (!seen.has(processId)) {
    return fail(`Owning process ${processId} is not part of the roster`)
  }

  const initial = options.initial ?? {}
  for (const [member, value] of Object.entries(initial)) {
    if (!seen.has(member)) {
      return fail(`Initial counter for unknown process: ${member}`)
    }
    if (!Number.isInteger(value) || value < 0) {
      return fail(`Initial counter for ${member} must be a non-negative integer, got ${value}`)
    }
  }
  return Effect.succeed(
    Snapshot.fromEntries(roster.map((member) => [member, Snapshot.has(initial, member) ? initial[member] : 0] as const))
  )
}

/**
 * Creates the vector clock of one process.
 * @param processId - The owning process, which must be in the roster
 * @param roster - Every participating process, without duplicates
 */
export const make = (
  processId: string,
  roster: ReadonlyArray<string>,
  options: VectorClockOptions = {}
): Effect.Effect<VectorClock, ClockConfigurationError> =>
  Effect.gen(function*() {
    const initial = yield* validate(processId, roster, options)
    const state = yield* SynchronizedRef.make(initial)

    // never assign counters by key: "__proto__" would hit the prototype setter
    const update = (before: Snapshot.ClockSnapshot, next: (key: string, value: number) => number) =>
      Snapshot.fromEntries(Object.entries(before).map(([key, value]) => [key, next(key, value)] as const))

    const tick = (key: string, value: number) => key === processId ? value + 1 : value

    const increment = () =>
      SynchronizedRef.modify(state, (before): [Transition, Snapshot.ClockSnapshot] => {
        const after = update(before, tick)
        return [{ before, after }, after]
      })

    const merge = (received: Snapshot.ClockSnapshot) =>
      SynchronizedRef.modify(state, (before): [Transition, Snapshot.ClockSnapshot] => {
        const after = update(before, (key, value) =>
          tick(key, Snapshot.has(received, key) ? Math.max(value, received[key]) : value))
        return [{ before, after }, after]
      })

    const snapshot = SynchronizedRef.get(state)

    yield* Effect.logDebug(`vector clock created: ${Snapshot.format(initial)}`).pipe(
      Effect.annotateLogs("process", processId)
    )

    return {
      processId,
      roster: [...roster],
      increment,
      merge,
      snapshot,
      valueOf: (id: string) => Effect.map(snapshot, (current) => (Snapshot.has(current, id) ? current[id] : 0)),
      format: Effect.map(snapshot, Snapshot.format)
    } satisfies VectorClock
  })

/**
 * Context tag for the vector clock owned by the running process.
 */
export class VectorClockService extends Context.Tag("@causal/VectorClock")<VectorClockService, VectorClock>() {}

/**
 * Layer providing the vector clock of one process.
 */
export const layer = (
  processId: string,
  roster: ReadonlyArray<string>,
  options?: VectorClockOptions
): Layer.Layer<VectorClockService, ClockConfigurationError> =>
  Layer.effect(VectorClockService, make(processId, roster, options))
