/**
 * Main program entry point.
 * Runs a scripted calculator session between the configured client and in-process servers,
 * then prints the client's clock analysis and event log.
 */
import { Console, Effect, Layer, Logger } from "effect"
import { startServer } from "./Calculator.js"
import * as Client from "./Client.js"
import { ProcessConfig, vectorClockLayer } from "./Config.js"
import * as Process from "./Process.js"
import * as Report from "./Report.js"
import { makeInMemory, TransportService } from "./Transport.js"

const session = Effect.gen(function*() {
  const config = yield* ProcessConfig
  const servers = yield* Effect.forEach(
    config.roster.filter((id) => id !== config.processId),
    (name) => startServer(name, config.roster)
  )
  const transport = yield* makeInMemory(servers)

  const client = yield* Effect.provide(
    Client.CalculatorClientService,
    Client.layer.pipe(
      Layer.provide(Process.layer),
      Layer.provide(vectorClockLayer),
      Layer.provide(Layer.succeed(TransportService, transport))
    )
  )

  yield* client.checkHealth()

  const first = yield* client.calculate(1000)
  for (const result of first.results) {
    yield* Console.log(
      `${result.server}: [${result.reply.rangeStart}-${result.reply.rangeEnd}] = ${result.reply.partialSum}, ` +
        `sent ${JSON.stringify(result.sent)} ${result.relation} received ${JSON.stringify(result.received)}`
    )
  }
  yield* Console.log(`Total: ${first.total} (${first.correct ? "correct" : `expected ${first.expected}`})`)

  const [unreachable] = transport.servers
  if (unreachable !== undefined) {
    yield* transport.setOnline(unreachable, false)
    const second = yield* client.calculate(10)
    yield* Console.log(`Total without ${unreachable}: ${second.total} from ${second.results.length} servers`)
  }

  yield* client.process.record("CLIENT_STOP", "Client application stopped")

  const snapshot = yield* client.process.clock.snapshot
  const records = yield* client.process.log.all
  yield* Console.log(Report.renderClockAnalysis(snapshot, records).join("\n"))
  yield* Console.log(Report.renderEventLog(records).join("\n"))
})

session.pipe(
  Effect.tapErrorCause(Effect.logError),
  Effect.provide(Logger.pretty),
  Effect.runPromise
).then(
  () => console.log("Session completed"),
  (error) => {
    console.error("Session failed:", error)
    process.exitCode = 1
  }
)
