import { Clock, Effect, Option, Ref, Schema } from "effect"
import * as Causality from "./Causality.js"
import { ClockSnapshot } from "./ClockSnapshot.js"
import { ClockConfigurationError } from "./Errors.js"

/**
 * One stamped event of a process.
 * The clock is the owner's snapshot at the moment of stamping; the wall-clock timestamp is
 * informational and never used for ordering.
 */
export class EventRecord extends Schema.Class<EventRecord>("EventRecord")({
  eventId: Schema.String,
  processId: Schema.String,
  eventType: Schema.String,
  clock: ClockSnapshot,
  timestamp: Schema.Number,
  description: Schema.String
}) {}

/**
 * A record together with its causal relation to the record displayed before it.
 */
export interface AnnotatedRecord {
  readonly record: EventRecord
  readonly relationToPrevious: Option.Option<Causality.Relation>
}

/**
 * Append-only, insertion-ordered log of the events of one process.
 * Only the owning process appends to its log.
 */
export interface EventLog {
  /** Identifier of the owning process */
  readonly processId: string
  /** Maximum number of retained records, if the log is capped */
  readonly capacity: Option.Option<number>
  /**
   * Appends a record stamped with the given snapshot.
   * @returns The appended record
   */
  readonly append: (
    eventType: string,
    description: string,
    clock: ClockSnapshot
  ) => Effect.Effect<EventRecord>
  /**
   * The last `n` records in insertion order.
   */
  readonly tail: (n: number) => Effect.Effect<ReadonlyArray<EventRecord>>
  /** Every retained record in insertion order */
  readonly all: Effect.Effect<ReadonlyArray<EventRecord>>
  /** Number of retained records */
  readonly size: Effect.Effect<number>
  /**
   * Record counts per event type, in first-seen order.
   */
  readonly summarizeByType: () => Effect.Effect<ReadonlyArray<readonly [string, number]>>
}

/**
 * Options for building an event log.
 */
export interface EventLogOptions {
  /** Keep only the most recent records. Unbounded when omitted. */
  readonly capacity?: number
}

/**
 * A random four-character prefix followed by the record's sequence number in the log, so ids of
 * one log never collide. Ids are eight characters until the sequence passes `zzzz`.
 */
const makeEventId = (sequence: number): Effect.Effect<string> =>
  Effect.sync(() => Math.random().toString(36).slice(2, 6).padEnd(4, "0") + sequence.toString(36).padStart(4, "0"))

/**
 * Counts records per event type, in first-seen order.
 */
export const summarizeByType = (records: Iterable<EventRecord>): ReadonlyArray<readonly [string, number]> => {
  const counts = new Map<string, number>()
  for (const record of records) {
    counts.set(record.eventType, (counts.get(record.eventType) ?? 0) + 1)
  }
  return Array.from(counts.entries())
}

/**
 * Annotates each record with the relation of its predecessor's clock to its own clock.
 * The first record has no predecessor.
 */
export const pairwiseCausality = (records: ReadonlyArray<EventRecord>): ReadonlyArray<AnnotatedRecord> =>
  records.map((record, i) => ({
    record,
    relationToPrevious: i === 0
      ? Option.none()
      : Option.some(Causality.relation(records[i - 1].clock, record.clock))
  }))

/**
 * Creates the event log of one process.
 */
export const make = (
  processId: string,
  options: EventLogOptions = {}
): Effect.Effect<EventLog, ClockConfigurationError> =>
  Effect.gen(function*() {
    const capacity = Option.fromNullable(options.capacity)
    if (Option.isSome(capacity) && (!Number.isInteger(capacity.value) || capacity.value < 1)) {
      return yield* new ClockConfigurationError({
        message: `Event log capacity must be a positive integer, got ${capacity.value}`,
        processId
      })
    }

    const records = yield* Ref.make<ReadonlyArray<EventRecord>>([])
    const sequence = yield* Ref.make(0)

    const append = (eventType: string, description: string, clock: ClockSnapshot) =>
      Effect.gen(function*() {
        const eventId = yield* Effect.flatMap(Ref.getAndUpdate(sequence, (n) => n + 1), makeEventId)
        const timestamp = yield* Clock.currentTimeMillis
        const record = new EventRecord({ eventId, processId, eventType, clock, timestamp, description })
        yield* Ref.update(records, (current) => {
          const next = [...current, record]
          return Option.match(capacity, {
            onNone: () => next,
            onSome: (max) => next.length > max ? next.slice(next.length - max) : next
          })
        })
        return record
      })

    const tail = (n: number) =>
      Ref.get(records).pipe(
        Effect.map((current) => n <= 0 ? [] : current.slice(Math.max(0, current.length - n)))
      )

    return {
      processId,
      capacity,
      append,
      tail,
      all: Ref.get(records),
      size: Effect.map(Ref.get(records), (current) => current.length),
      summarizeByType: () => Effect.map(Ref.get(records), summarizeByType)
    } satisfies EventLog
  })
