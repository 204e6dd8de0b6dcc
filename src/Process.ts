import { Context, Effect, Layer } from "effect"
import type { ConfigError } from "effect/ConfigError"
import * as Causality from "./Causality.js"
import * as Snapshot from "./ClockSnapshot.js"
import { makeEventLog } from "./Config.js"
import { type ClockConfigurationError, InvalidMessageError } from "./Errors.js"
import type { EventLog, EventRecord } from "./EventLog.js"
import { type VectorClock, VectorClockService } from "./VectorClock.js"

/**
 * A message between processes: the payload plus the sender's clock at send time.
 */
export interface Envelope<A> {
  /** The sending process */
  readonly from: string
  /** The sender's snapshot, taken when the message was built */
  readonly clock: Snapshot.ClockSnapshot
  /** Application data, opaque to the clock */
  readonly payload: A
}

/**
 * Outcome of receiving one message.
 */
export interface Receipt {
  /** Local snapshot right before the merge */
  readonly before: Snapshot.ClockSnapshot
  /** Local snapshot right after the merge */
  readonly after: Snapshot.ClockSnapshot
  /** The decoded snapshot carried by the message */
  readonly received: Snapshot.ClockSnapshot
  /** Relation of the pre-merge local state to the received snapshot */
  readonly relation: Causality.Relation
  /** The log record of the receive event */
  readonly record: EventRecord
}

/**
 * A process's clock and event log, bundled as the single handle passed to whatever handles
 * events for that process.
 */
export interface CausalProcess {
  readonly id: string
  readonly clock: VectorClock
  readonly log: EventLog
  /**
   * Stamps a local event: one tick, then a log record carrying the new snapshot.
   */
  readonly stamp: (eventType: string, description: string) => Effect.Effect<EventRecord>
  /**
   * Logs a marker with the current snapshot without ticking.
   */
  readonly record: (eventType: string, description: string) => Effect.Effect<EventRecord>
  /**
   * Wraps a payload with the current snapshot. Sending does not change the clock.
   */
  readonly send: <A>(payload: A) => Effect.Effect<Envelope<A>>
  /**
   * Merges the clock of an incoming message and logs the receive event.
   * A message whose clock fails validation is rejected before the clock is touched.
   */
  readonly receive: <A>(
    envelope: Envelope<A>,
    eventType: string,
    description: string
  ) => Effect.Effect<Receipt, InvalidMessageError>
  /**
   * Sends a request through `call` and receives the reply.
   * When `call` fails, the clock and the log are left exactly as they were.
   */
  readonly exchange: <A, B, E, R>(
    payload: A,
    call: (request: Envelope<A>) => Effect.Effect<Envelope<B>, E, R>,
    eventType: string,
    description: (reply: B) => string
  ) => Effect.Effect<{ readonly reply: Envelope<B>; readonly receipt: Receipt }, E | InvalidMessageError, R>
}

/**
 * Binds a clock and a log owned by the same process.
 */
export const make = (clock: VectorClock, log: EventLog): CausalProcess => {
  const id = clock.processId
  const annotate = Effect.annotateLogs("process", id)

  const stamp = (eventType: string, description: string) =>
    Effect.flatMap(clock.increment(), ({ after }) => log.append(eventType, description, after))

  const record = (eventType: string, description: string) =>
    Effect.flatMap(clock.snapshot, (current) => log.append(eventType, description, current))

  const send = <A>(payload: A) =>
    Effect.map(clock.snapshot, (current): Envelope<A> => ({ from: id, clock: current, payload }))

  const receive = <A>(envelope: Envelope<A>, eventType: string, description: string) =>
    Effect.gen(function*() {
      const received = yield* Snapshot.decode(envelope.clock).pipe(
        Effect.mapError((cause) =>
          new InvalidMessageError({
            message: `Message from ${envelope.from} carries an invalid clock`,
            from: envelope.from,
            cause
          })
        )
      )
      const { after, before } = yield* clock.merge(received)
      const logged = yield* log.append(eventType, description, after)
      const relation = Causality.relation(before, received)
      yield* Effect.logDebug(
        `received ${eventType} from ${envelope.from}: ${Snapshot.format(before)} -> ${Snapshot.format(after)} (${relation})`
      )
      return { before, after, received, relation, record: logged } satisfies Receipt
    }).pipe(annotate)

  const exchange = <A, B, E, R>(
    payload: A,
    call: (request: Envelope<A>) => Effect.Effect<Envelope<B>, E, R>,
    eventType: string,
    description: (reply: B) => string
  ) =>
    Effect.gen(function*() {
      const request = yield* send(payload)
      const reply = yield* call(request)
      const receipt = yield* receive(reply, eventType, description(reply.payload))
      return { reply, receipt }
    })

  return { id, clock, log, stamp, record, send, receive, exchange }
}

/**
 * Context tag for the process handle of the running process.
 */
export class CausalProcessService extends Context.Tag("@causal/Process")<CausalProcessService, CausalProcess>() {}

/**
 * Layer providing the process handle built from the configured clock and event log.
 */
export const layer: Layer.Layer<
  CausalProcessService,
  ConfigError | ClockConfigurationError,
  VectorClockService
> = Layer.effect(
  CausalProcessService,
  Effect.gen(function*() {
    const clock = yield* VectorClockService
    const log = yield* makeEventLog(clock.processId)
    return make(clock, log)
  })
)
