import { Context, Effect, HashSet, Layer, Ref } from "effect"
import type { CalculatorServer, HealthReply, PartialSumReply, PartialSumRequest } from "./Calculator.js"
import { TransportError } from "./Errors.js"
import type { Envelope } from "./Process.js"

/**
 * Request/reply channel between the client and the calculator servers.
 * A failed call never reaches the client's clock.
 */
export interface Transport {
  /** Names of the servers the transport can address, in configured order */
  readonly servers: ReadonlyArray<string>
  readonly healthCheck: (server: string, clientId: string) => Effect.Effect<HealthReply, TransportError>
  readonly partialSum: (
    server: string,
    request: Envelope<PartialSumRequest>
  ) => Effect.Effect<Envelope<PartialSumReply>, TransportError>
}

/**
 * Context tag for the Transport.
 */
export class TransportService extends Context.Tag("@causal/Transport")<TransportService, Transport>() {}

/**
 * A transport that calls server handlers in the same process.
 * Servers can be taken offline to simulate unreachable peers.
 */
export interface InMemoryTransport extends Transport {
  readonly setOnline: (server: string, online: boolean) => Effect.Effect<void>
}

/**
 * Creates an in-memory transport routing to the given servers, all initially online.
 */
export const makeInMemory = (servers: ReadonlyArray<CalculatorServer>): Effect.Effect<InMemoryTransport> =>
  Effect.gen(function*() {
    const byName = new Map(servers.map((server) => [server.name, server] as const))
    const offline = yield* Ref.make(HashSet.empty<string>())

    const resolve = (name: string) =>
      Effect.gen(function*() {
        const server = byName.get(name)
        const down = HashSet.has(yield* Ref.get(offline), name)
        if (server === undefined || down) {
          return yield* new TransportError({
            message: `Server ${name} is unavailable`,
            server: name,
            code: "UNAVAILABLE"
          })
        }
        return server
      })

    return {
      servers: servers.map((server) => server.name),
      healthCheck: (name, clientId) => Effect.flatMap(resolve(name), (server) => server.healthCheck(clientId)),
      partialSum: (name, request) =>
        Effect.flatMap(resolve(name), (server) =>
          server.partialSum(request).pipe(
            Effect.mapError((cause) =>
              new TransportError({
                message: `Server ${name} rejected the request: ${cause.message}`,
                server: name,
                code: "REJECTED",
                cause
              })
            )
          )),
      setOnline: (name, online) =>
        Ref.update(offline, (current) => online ? HashSet.remove(current, name) : HashSet.add(current, name))
    } satisfies InMemoryTransport
  })

/**
 * Layer providing an in-memory transport over the given servers.
 */
export const inMemoryLayer = (servers: ReadonlyArray<CalculatorServer>): Layer.Layer<TransportService> =>
  Layer.effect(TransportService, makeInMemory(servers))
