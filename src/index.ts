/**
 * Snapshot type, schema and formatting for vector clock state.
 */
export * as ClockSnapshot from "./ClockSnapshot.js"

/**
 * A vector clock owned by one process.
 */
export * as VectorClock from "./VectorClock.js"

/**
 * Happened-before, happened-after and concurrency over two snapshots.
 */
export * as Causality from "./Causality.js"

/**
 * Append-only log of stamped events.
 */
export * as EventLog from "./EventLog.js"

/**
 * A process's clock and event log bound into one handle.
 */
export * as Process from "./Process.js"

/**
 * Calculator server and partial sum payloads.
 */
export * as Calculator from "./Calculator.js"

/**
 * Calculator client session.
 */
export * as Client from "./Client.js"

/**
 * Request/reply channel between client and servers.
 */
export * as Transport from "./Transport.js"

/**
 * Text renderings of clock state and event logs.
 */
export * as Report from "./Report.js"

/**
 * Process settings read through Effect Config.
 */
export * as Config from "./Config.js"

/**
 * Tagged error classes.
 */
export * as Errors from "./Errors.js"
