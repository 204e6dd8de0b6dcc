import { Clock, Effect, Ref } from "effect"
import * as Snapshot from "./ClockSnapshot.js"
import { CalculationError, type ClockConfigurationError, type InvalidMessageError } from "./Errors.js"
import * as EventLog from "./EventLog.js"
import * as Process from "./Process.js"
import * as VectorClock from "./VectorClock.js"

/**
 * Request for the sum of the integers in `[start, end]`.
 */
export interface PartialSumRequest {
  readonly start: number
  readonly end: number
  /** Identifier shared by every partial request of one calculation */
  readonly requestId: string
}

/**
 * A server's answer to a partial sum request.
 */
export interface PartialSumReply {
  /** Exact sum of the range */
  readonly partialSum: bigint
  readonly serverName: string
  readonly rangeStart: number
  readonly rangeEnd: number
  readonly requestId: string
  /** Wall-clock time of the reply in epoch milliseconds */
  readonly timestamp: number
}

/**
 * A server's answer to a health check.
 */
export interface HealthReply {
  readonly healthy: boolean
  readonly serverName: string
  readonly uptimeSeconds: number
}

/**
 * An inclusive range of positive integers.
 */
export interface Range {
  readonly start: number
  readonly end: number
}

/**
 * Splits `1..n` into contiguous ranges, one per worker.
 * The first `n % count` ranges get one extra number. No range is empty, so fewer than `count`
 * ranges come back when `n < count`.
 */
export const divideWork = (n: number, count: number): ReadonlyArray<Range> => {
  const workers = Math.min(n, count)
  if (workers < 1) return []
  const size = Math.floor(n / workers)
  const remainder = n % workers
  const ranges: Array<Range> = []
  let start = 1
  for (let i = 0; i < workers; i++) {
    const end = start + size + (i < remainder ? 1 : 0) - 1
    ranges.push({ start, end })
    start = end + 1
  }
  return ranges
}

/**
 * Exact sum of the integers in `[start, end]`.
 */
export const rangeSum = (start: number, end: number): bigint => {
  const first = BigInt(start)
  const last = BigInt(end)
  return (last * (last + 1n)) / 2n - ((first - 1n) * first) / 2n
}

/**
 * A calculator server process.
 */
export interface CalculatorServer {
  readonly name: string
  readonly process: Process.CausalProcess
  /**
   * Ticks the server clock and reports liveness.
   */
  readonly healthCheck: (clientId: string) => Effect.Effect<HealthReply>
  /**
   * Merges the request clock, computes the partial sum and replies with the server's snapshot.
   * Invalid ranges are rejected before the clock is touched.
   */
  readonly partialSum: (
    request: Process.Envelope<PartialSumRequest>
  ) => Effect.Effect<Process.Envelope<PartialSumReply>, CalculationError | InvalidMessageError>
  /** Number of partial sum requests accepted so far */
  readonly requestCount: Effect.Effect<number>
}

const validateRange = ({ end, start }: PartialSumRequest): Effect.Effect<void, CalculationError> =>
  Number.isSafeInteger(start) && Number.isSafeInteger(end) && start >= 1 && end >= start
    ? Effect.void
    : Effect.fail(
      new CalculationError({
        message: `Invalid range [${start}-${end}]`,
        operation: "partialSum"
      })
    )

/**
 * Starts a server around an existing process handle.
 */
export const makeServer = (process: Process.CausalProcess): Effect.Effect<CalculatorServer> =>
  Effect.gen(function*() {
    const name = process.id
    const startedAt = yield* Clock.currentTimeMillis
    const requests = yield* Ref.make(0)
    const annotate = Effect.annotateLogs("process", name)

    yield* process.record("SERVER_START", "Server initialization")
    const initial = yield* process.clock.format
    yield* Effect.logInfo(`${name} started with clock ${initial}`).pipe(annotate)

    const healthCheck = (clientId: string) =>
      Effect.gen(function*() {
        const now = yield* Clock.currentTimeMillis
        yield* process.stamp("HEALTH_CHECK", `Health check from ${clientId}`)
        yield* Effect.logDebug(`health check from ${clientId}`).pipe(annotate)
        return {
          healthy: true,
          serverName: name,
          uptimeSeconds: Math.floor((now - startedAt) / 1000)
        } satisfies HealthReply
      })

    const partialSum = (request: Process.Envelope<PartialSumRequest>) =>
      Effect.gen(function*() {
        const { end, requestId, start } = request.payload
        yield* validateRange(request.payload)
        const receipt = yield* process.receive(
          request,
          "REQUEST_RECEIVED",
          `Partial sum request [${start}-${end}] from RequestID: ${requestId}`
        )
        const count = yield* Ref.updateAndGet(requests, (n) => n + 1)
        yield* Effect.logInfo(
          `request #${count} ${requestId} [${start}-${end}]: received ${Snapshot.format(receipt.received)}, ` +
            `before ${Snapshot.format(receipt.before)}, after ${Snapshot.format(receipt.after)}, ${receipt.relation}`
        ).pipe(annotate)

        const partial = rangeSum(start, end)
        yield* process.stamp("CALCULATION_COMPLETE", `Calculated sum [${start}-${end}] = ${partial}`)

        const timestamp = yield* Clock.currentTimeMillis
        return yield* process.send<PartialSumReply>({
          partialSum: partial,
          serverName: name,
          rangeStart: start,
          rangeEnd: end,
          requestId,
          timestamp
        })
      })

    return {
      name,
      process,
      healthCheck,
      partialSum,
      requestCount: Ref.get(requests)
    } satisfies CalculatorServer
  })

/**
 * Builds a server process with its own clock and event log, then starts it.
 * @param name - The server's process id, which must be in the roster
 */
export const startServer = (
  name: string,
  roster: ReadonlyArray<string>,
  options: EventLog.EventLogOptions = {}
): Effect.Effect<CalculatorServer, ClockConfigurationError> =>
  Effect.gen(function*() {
    const clock = yield* VectorClock.make(name, roster)
    const log = yield* EventLog.make(name, options)
    return yield* makeServer(Process.make(clock, log))
  })
