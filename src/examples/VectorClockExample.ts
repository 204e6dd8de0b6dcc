/**
 * Example demonstrating Vector Clock usage for tracking causality between two processes.
 */

import { Effect } from "effect"
import * as Causality from "../Causality.js"
import { format } from "../ClockSnapshot.js"
import * as VectorClock from "../VectorClock.js"

const example = Effect.gen(function*() {
  console.log("=== Vector Clock Example ===")

  const roster = ["P1", "P2"]
  const p1 = yield* VectorClock.make("P1", roster)
  const p2 = yield* VectorClock.make("P2", roster)

  // P1 stamps a local event and sends its snapshot to P2
  const { after: sent } = yield* p1.increment()
  console.log("P1 after local event:", format(sent))

  // P2 merges the message: max per process, then its own tick
  const { after: received } = yield* p2.merge(sent)
  console.log("P2 after receive:", format(received))
  console.log("P2 vs P1:", Causality.relation(received, sent)) // after

  // Two more events without any exchange
  const { after: p1Later } = yield* p1.increment()
  const { after: p2Later } = yield* p2.increment()
  console.log("P1 later:", format(p1Later))
  console.log("P2 later:", format(p2Later))
  console.log("Concurrent:", Causality.isConcurrentWith(p1Later, p2Later)) // true

  console.log("\n=== End Vector Clock Example ===\n")
})

Effect.runPromise(example).then(
  () => console.log("Example completed"),
  (error) => console.error("Example failed:", error)
)
