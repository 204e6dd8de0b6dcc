import { Config, Effect, Layer, Option } from "effect"
import type { ConfigError } from "effect/ConfigError"
import * as EventLog from "./EventLog.js"
import type { ClockConfigurationError } from "./Errors.js"
import * as VectorClock from "./VectorClock.js"

/**
 * Processes taking part in the calculator session when no roster is configured.
 */
export const DEFAULT_ROSTER: ReadonlyArray<string> = ["Client", "Server1", "Server2", "Server3"]

/**
 * Identity and bookkeeping settings of one process.
 */
export interface ProcessConfig {
  /** Identifier of the owning process */
  readonly processId: string
  /** Every participating process */
  readonly roster: ReadonlyArray<string>
  /** Optional cap on retained event log records */
  readonly eventLogCapacity: Option.Option<number>
}

/**
 * Reads the process settings from the active config provider:
 * `PROCESS_ID`, `ROSTER` (comma separated) and `EVENT_LOG_CAPACITY`.
 */
export const ProcessConfig: Config.Config<ProcessConfig> = Config.all({
  processId: Config.string("PROCESS_ID").pipe(Config.withDefault("Client")),
  roster: Config.array(Config.string(), "ROSTER").pipe(Config.withDefault(DEFAULT_ROSTER)),
  eventLogCapacity: Config.option(Config.integer("EVENT_LOG_CAPACITY"))
})

/**
 * Layer providing the vector clock of the configured process.
 */
export const vectorClockLayer: Layer.Layer<
  VectorClock.VectorClockService,
  ConfigError | ClockConfigurationError
> = Layer.effect(
  VectorClock.VectorClockService,
  Effect.flatMap(ProcessConfig, (config) => VectorClock.make(config.processId, config.roster))
)

/**
 * Builds the event log of a process, sized by the configured capacity.
 */
export const makeEventLog = (
  processId: string
): Effect.Effect<EventLog.EventLog, ConfigError | ClockConfigurationError> =>
  Effect.flatMap(ProcessConfig, (config) =>
    EventLog.make(
      processId,
      Option.match(config.eventLogCapacity, {
        onNone: () => ({}),
        onSome: (capacity) => ({ capacity })
      })
    ))
