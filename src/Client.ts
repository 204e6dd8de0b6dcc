import { Array as Arr, Context, Effect, Layer, Option, Order } from "effect"
import {
  divideWork,
  type HealthReply,
  type PartialSumReply,
  type PartialSumRequest,
  rangeSum
} from "./Calculator.js"
import * as Causality from "./Causality.js"
import * as Snapshot from "./ClockSnapshot.js"
import { CalculationError, type InvalidMessageError, TransportError } from "./Errors.js"
import { type CausalProcess, CausalProcessService, type Envelope, type Receipt } from "./Process.js"
import { type Transport, TransportService } from "./Transport.js"

/**
 * Liveness of one server as seen by the client.
 */
export interface HealthStatus {
  readonly server: string
  readonly healthy: boolean
  /** Reported uptime, absent when the server could not be reached */
  readonly uptimeSeconds: Option.Option<number>
}

/**
 * The part of a calculation answered by one server.
 */
export interface ServerResult {
  readonly server: string
  readonly reply: PartialSumReply
  /** Client snapshot attached to the request */
  readonly sent: Snapshot.ClockSnapshot
  /** Server snapshot attached to the reply */
  readonly received: Snapshot.ClockSnapshot
  /** Relation of the sent snapshot to the received one */
  readonly relation: Causality.Relation
}

/**
 * Outcome of a distributed calculation.
 */
export interface CalculationResult {
  readonly n: number
  readonly requestId: string
  readonly total: bigint
  readonly expected: bigint
  readonly correct: boolean
  /** Successful partial results in range order */
  readonly results: ReadonlyArray<ServerResult>
  /** Servers whose partial request failed */
  readonly failed: ReadonlyArray<TransportError>
  /** Client snapshot after every reply was merged */
  readonly finalClock: Snapshot.ClockSnapshot
}

/**
 * Client side of the calculator session.
 */
export interface CalculatorClient {
  readonly process: CausalProcess
  /**
   * Stamps a health check event and asks every server for its status.
   */
  readonly checkHealth: () => Effect.Effect<ReadonlyArray<HealthStatus>>
  /**
   * Servers currently answering the health check, in configured order.
   */
  readonly availableServers: () => Effect.Effect<ReadonlyArray<string>>
  /**
   * Computes the sum of `1..n` across servers, merging each reply into the client clock.
   * Uses every available server when `servers` is omitted.
   */
  readonly calculate: (
    n: number,
    servers?: ReadonlyArray<string>
  ) => Effect.Effect<CalculationResult, CalculationError | TransportError | InvalidMessageError>
  /**
   * Asks one server for the sum of `[start, end]` in a single request/reply exchange.
   */
  readonly sumRange: (
    server: string,
    start: number,
    end: number
  ) => Effect.Effect<Receipt & { readonly reply: PartialSumReply }, TransportError | InvalidMessageError>
}

const byRangeStart = Order.mapInput(
  Order.number,
  (outcome: { readonly reply: Envelope<PartialSumReply> }) => outcome.reply.payload.rangeStart
)

const newRequestId = Effect.sync(() => Math.random().toString(36).slice(2, 10).padEnd(8, "0"))

// Replies are checked before any of them is merged, so a bad clock counts as a failed server
const checkReply = (server: string, reply: Envelope<PartialSumReply>) =>
  Snapshot.decode(reply.clock).pipe(
    Effect.mapError((cause) =>
      new TransportError({
        message: `Server ${server} replied with an invalid clock`,
        server,
        code: "INVALID_REPLY",
        cause
      })
    )
  )

/**
 * Creates the client around its process handle and a transport.
 */
export const make = (process: CausalProcess, transport: Transport): CalculatorClient => {
  const annotate = Effect.annotateLogs("process", process.id)

  const probe = (server: string) =>
    transport.healthCheck(server, process.id).pipe(
      Effect.map((reply: HealthReply): HealthStatus => ({
        server,
        healthy: reply.healthy,
        uptimeSeconds: Option.some(reply.uptimeSeconds)
      })),
      Effect.catchAll(() => Effect.succeed<HealthStatus>({ server, healthy: false, uptimeSeconds: Option.none() }))
    )

  const checkHealth = () =>
    Effect.gen(function*() {
      yield* process.stamp("HEALTH_CHECK", "Checking all servers")
      const statuses = yield* Effect.forEach(transport.servers, probe)
      for (const status of statuses) {
        yield* status.healthy
          ? Effect.logInfo(`${status.server} healthy`)
          : Effect.logWarning(`${status.server} down`)
      }
      return statuses
    }).pipe(annotate)

  const availableServers = () =>
    Effect.forEach(transport.servers, probe).pipe(
      Effect.map((statuses) => statuses.filter((status) => status.healthy).map((status) => status.server))
    )

  const calculate = (n: number, servers?: ReadonlyArray<string>) =>
    Effect.gen(function*() {
      if (!Number.isSafeInteger(n) || n < 1) {
        return yield* new CalculationError({
          message: `Expected a positive integer, got ${n}`,
          operation: "calculate"
        })
      }
      const mode = servers === undefined ? "Auto" : `Manual: ${servers.join(",")}`
      yield* process.stamp("REQUEST_INIT", `Initiating calculation for n=${n} (${mode})`)
      const requestId = yield* newRequestId

      const pool = servers ?? (yield* availableServers())
      if (pool.length === 0) {
        return yield* new TransportError({
          message: "No servers available",
          server: "*",
          code: "NO_SERVERS"
        })
      }

      const assignments = Arr.zip(pool, divideWork(n, pool.length))
      const request = yield* process.send({ requestId })
      const outcomes = yield* Effect.forEach(
        assignments,
        ([server, range]) =>
          transport.partialSum(server, {
            ...request,
            payload: { start: range.start, end: range.end, requestId } satisfies PartialSumRequest
          }).pipe(
            Effect.tap((reply) => checkReply(server, reply)),
            Effect.map((reply) => ({ server, reply })),
            Effect.either
          ),
        { concurrency: "unbounded" }
      )

      const [failed, succeeded] = Arr.separate(outcomes)
      for (const error of failed) {
        yield* Effect.logWarning(error.message)
      }
      if (succeeded.length === 0) {
        return yield* new TransportError({
          message: "All servers failed",
          server: "*",
          code: "ALL_FAILED"
        })
      }

      const results: Array<ServerResult> = []
      for (const { reply, server } of Arr.sort(succeeded, byRangeStart)) {
        yield* process.receive(
          reply,
          "RESPONSE_RECEIVED",
          `Partial sum [${reply.payload.rangeStart}-${reply.payload.rangeEnd}] = ${reply.payload.partialSum} from ${server}`
        )
        results.push({
          server,
          reply: reply.payload,
          sent: request.clock,
          received: reply.clock,
          relation: Causality.relation(request.clock, reply.clock)
        })
      }

      const total = results.reduce((sum, result) => sum + result.reply.partialSum, 0n)
      const expected = rangeSum(1, n)
      const completed = yield* process.stamp("CALCULATION_COMPLETE", `Completed calculation for n=${n}, result=${total}`)
      yield* Effect.logInfo(
        `calculation ${requestId} for n=${n}: ${total} from ${results.length}/${pool.length} servers, ` +
          `clock ${Snapshot.format(completed.clock)}`
      )

      return {
        n,
        requestId,
        total,
        expected,
        correct: total === expected,
        results,
        failed,
        finalClock: completed.clock
      } satisfies CalculationResult
    }).pipe(annotate)

  const sumRange = (server: string, start: number, end: number) =>
    Effect.gen(function*() {
      const requestId = yield* newRequestId
      const { receipt, reply } = yield* process.exchange(
        { start, end, requestId } satisfies PartialSumRequest,
        (request) => transport.partialSum(server, request),
        "RESPONSE_RECEIVED",
        (payload) => `Partial sum [${payload.rangeStart}-${payload.rangeEnd}] = ${payload.partialSum} from ${server}`
      )
      return { ...receipt, reply: reply.payload }
    }).pipe(annotate)

  return { process, checkHealth, availableServers, calculate, sumRange }
}

/**
 * Context tag for the calculator client of the running process.
 */
export class CalculatorClientService
  extends Context.Tag("@causal/CalculatorClient")<CalculatorClientService, CalculatorClient>()
{}

/**
 * Layer providing the client from the process handle and the transport in context.
 */
export const layer: Layer.Layer<CalculatorClientService, never, CausalProcessService | TransportService> = Layer
  .effect(
    CalculatorClientService,
    Effect.gen(function*() {
      const process = yield* CausalProcessService
      const transport = yield* TransportService
      yield* process.record("CLIENT_START", "Client application started")
      return make(process, transport)
    })
  )
