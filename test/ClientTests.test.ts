import { Effect, Layer, Option } from "effect"
import { describe, expect, it } from "vitest"
import * as Calculator from "../src/Calculator.js"
import * as Client from "../src/Client.js"
import * as EventLog from "../src/EventLog.js"
import * as Process from "../src/Process.js"
import * as Transport from "../src/Transport.js"
import * as VectorClock from "../src/VectorClock.js"
import { run, runFailure } from "./utils.js"

const roster = ["Client", "Server1", "Server2", "Server3"]

const setup = Effect.gen(function*() {
  const servers = yield* Effect.forEach(["Server1", "Server2", "Server3"], (name) => Calculator.startServer(name, roster))
  const transport = yield* Transport.makeInMemory(servers)
  const clock = yield* VectorClock.make("Client", roster)
  const log = yield* EventLog.make("Client")
  const client = Client.make(Process.make(clock, log), transport)
  return { client, servers, transport }
})

describe("Client", () => {
  describe("calculate", () => {
    it("should split the work across every available server", async () => {
      const [result, types] = await run(Effect.gen(function*() {
        const { client } = yield* setup
        const result = yield* client.calculate(100)
        const records = yield* client.process.log.all
        return [result, records.map((record) => record.eventType)] as const
      }))
      expect(result.total).toBe(5050n)
      expect(result.expected).toBe(5050n)
      expect(result.correct).toBe(true)
      expect(result.failed).toEqual([])
      expect(result.results.map((r) => [r.server, r.reply.rangeStart, r.reply.rangeEnd, r.reply.partialSum])).toEqual([
        ["Server1", 1, 34, 595n],
        ["Server2", 35, 67, 1683n],
        ["Server3", 68, 100, 2772n]
      ])
      expect(types).toEqual([
        "REQUEST_INIT",
        "RESPONSE_RECEIVED",
        "RESPONSE_RECEIVED",
        "RESPONSE_RECEIVED",
        "CALCULATION_COMPLETE"
      ])
    })

    it("should order every reply after its request", async () => {
      const result = await run(Effect.flatMap(setup, ({ client }) => client.calculate(100)))
      const [first] = result.results
      expect(first?.sent).toEqual({ Client: 1, Server1: 0, Server2: 0, Server3: 0 })
      expect(first?.received).toEqual({ Client: 1, Server1: 3, Server2: 0, Server3: 0 })
      expect(result.results.map((r) => r.relation)).toEqual(["before", "before", "before"])
      expect(result.finalClock).toEqual({ Client: 5, Server1: 3, Server2: 3, Server3: 3 })
    })

    it("should skip servers that fail the health check", async () => {
      const result = await run(Effect.gen(function*() {
        const { client, transport } = yield* setup
        yield* transport.setOnline("Server2", false)
        return yield* client.calculate(10)
      }))
      expect(result.results.map((r) => [r.server, r.reply.partialSum])).toEqual([
        ["Server1", 15n],
        ["Server3", 40n]
      ])
      expect(result.total).toBe(55n)
      expect(result.correct).toBe(true)
    })

    it("should report a partial total when a chosen server fails", async () => {
      const result = await run(Effect.gen(function*() {
        const { client, transport } = yield* setup
        yield* transport.setOnline("Server2", false)
        return yield* client.calculate(10, ["Server1", "Server2"])
      }))
      expect(result.total).toBe(15n)
      expect(result.expected).toBe(55n)
      expect(result.correct).toBe(false)
      expect(result.failed.map((error) => [error.server, error.code])).toEqual([["Server2", "UNAVAILABLE"]])
      expect(result.finalClock.Client).toBe(3)
    })

    it("should keep the total exact for large n", async () => {
      const result = await run(Effect.flatMap(setup, ({ client }) => client.calculate(987654321)))
      expect(result.total).toBe(487730529388812681n)
      expect(result.expected).toBe(487730529388812681n)
      expect(result.correct).toBe(true)
    })

    it("should treat a reply with an invalid clock as a failed server", async () => {
      const [result, types] = await run(Effect.gen(function*() {
        const { transport } = yield* setup
        const tampered: Transport.Transport = {
          ...transport,
          partialSum: (server, request) =>
            server === "Server2"
              ? Effect.map(transport.partialSum(server, request), (reply) => ({ ...reply, clock: { Client: -1 } }))
              : transport.partialSum(server, request)
        }
        const clock = yield* VectorClock.make("Client", roster)
        const client = Client.make(Process.make(clock, yield* EventLog.make("Client")), tampered)
        const result = yield* client.calculate(10, ["Server1", "Server2"])
        const records = yield* client.process.log.all
        return [result, records.map((record) => record.eventType)] as const
      }))
      expect(result.total).toBe(15n)
      expect(result.correct).toBe(false)
      expect(result.failed.map((error) => [error.server, error.code])).toEqual([["Server2", "INVALID_REPLY"]])
      expect(result.finalClock.Client).toBe(3)
      expect(types).toEqual(["REQUEST_INIT", "RESPONSE_RECEIVED", "CALCULATION_COMPLETE"])
    })

    it("should fail when every chosen server fails", async () => {
      const [error, snapshot] = await run(Effect.gen(function*() {
        const { client, transport } = yield* setup
        yield* transport.setOnline("Server1", false)
        const error = yield* Effect.flip(client.calculate(10, ["Server1"]))
        return [error, yield* client.process.clock.snapshot] as const
      }))
      expect(error._tag).toBe("TransportError")
      expect(error.message).toBe("All servers failed")
      expect(snapshot).toEqual({ Client: 1, Server1: 0, Server2: 0, Server3: 0 })
    })

    it("should fail when no server is available", async () => {
      const error = await runFailure(Effect.gen(function*() {
        const { client, transport } = yield* setup
        yield* Effect.forEach(transport.servers, (server) => transport.setOnline(server, false))
        return yield* client.calculate(10)
      }))
      expect(error._tag).toBe("TransportError")
      expect(error.message).toBe("No servers available")
    })

    it("should reject a non-positive n before ticking", async () => {
      const [error, snapshot] = await run(Effect.gen(function*() {
        const { client } = yield* setup
        const error = yield* Effect.flip(client.calculate(0))
        return [error, yield* client.process.clock.snapshot] as const
      }))
      expect(error._tag).toBe("CalculationError")
      expect(error.message).toBe("Expected a positive integer, got 0")
      expect(snapshot).toEqual({ Client: 0, Server1: 0, Server2: 0, Server3: 0 })
    })
  })

  describe("checkHealth", () => {
    it("should stamp one event and report each server", async () => {
      const [statuses, snapshot] = await run(Effect.gen(function*() {
        const { client, transport } = yield* setup
        yield* transport.setOnline("Server2", false)
        const statuses = yield* client.checkHealth()
        return [statuses, yield* client.process.clock.snapshot] as const
      }))
      expect(statuses.map((status) => [status.server, status.healthy])).toEqual([
        ["Server1", true],
        ["Server2", false],
        ["Server3", true]
      ])
      expect(Option.isSome(statuses[0]?.uptimeSeconds ?? Option.none())).toBe(true)
      expect(statuses[1]?.uptimeSeconds).toEqual(Option.none())
      expect(snapshot).toEqual({ Client: 1, Server1: 0, Server2: 0, Server3: 0 })
    })
  })

  describe("sumRange", () => {
    it("should merge the reply of a single exchange", async () => {
      const receipt = await run(Effect.flatMap(setup, ({ client }) => client.sumRange("Server1", 3, 5)))
      expect(receipt.reply.partialSum).toBe(12n)
      expect(receipt.received).toEqual({ Client: 0, Server1: 2, Server2: 0, Server3: 0 })
      expect(receipt.after).toEqual({ Client: 1, Server1: 2, Server2: 0, Server3: 0 })
      expect(receipt.relation).toBe("before")
      expect(receipt.record.description).toBe("Partial sum [3-5] = 12 from Server1")
    })

    it("should leave the client untouched when the server is offline", async () => {
      const [error, snapshot, size] = await run(Effect.gen(function*() {
        const { client, transport } = yield* setup
        yield* transport.setOnline("Server1", false)
        const error = yield* Effect.flip(client.sumRange("Server1", 3, 5))
        return [error, yield* client.process.clock.snapshot, yield* client.process.log.size] as const
      }))
      expect(error._tag).toBe("TransportError")
      expect(snapshot).toEqual({ Client: 0, Server1: 0, Server2: 0, Server3: 0 })
      expect(size).toBe(0)
    })
  })

  describe("layer", () => {
    it("should record the client start without ticking", async () => {
      const [snapshot, types] = await run(Effect.gen(function*() {
        const { servers } = yield* setup
        const client = yield* Effect.provide(
          Client.CalculatorClientService,
          Client.layer.pipe(
            Layer.provide(Layer.effect(
              Process.CausalProcessService,
              Effect.gen(function*() {
                const clock = yield* VectorClock.make("Client", roster)
                return Process.make(clock, yield* EventLog.make("Client"))
              })
            )),
            Layer.provide(Transport.inMemoryLayer(servers))
          )
        )
        const records = yield* client.process.log.all
        return [yield* client.process.clock.snapshot, records.map((record) => record.eventType)] as const
      }))
      expect(snapshot).toEqual({ Client: 0, Server1: 0, Server2: 0, Server3: 0 })
      expect(types).toEqual(["CLIENT_START"])
    })
  })
})
