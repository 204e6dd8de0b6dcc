import { Option } from "effect"
import * as Causality from "./Causality.js"
import * as Snapshot from "./ClockSnapshot.js"
import { type EventRecord, pairwiseCausality, summarizeByType } from "./EventLog.js"

const pad = (value: string | number, width: number): string => String(value).padEnd(width)

const padStart = (value: string | number, width: number): string => String(value).padStart(width)

const time = (timestamp: number): string => new Date(timestamp).toISOString()

/**
 * Text view of a process clock and its most recent events.
 */
export const renderClockAnalysis = (
  snapshot: Snapshot.ClockSnapshot,
  records: ReadonlyArray<EventRecord>
): ReadonlyArray<string> => {
  const lines = [
    "Current Vector Clock State:",
    `   ${Snapshot.format(snapshot)}`,
    "",
    "Detailed Breakdown:",
    ...Snapshot.sortedKeys(snapshot).map((key) => `   └─ ${pad(key, 15)}: ${padStart(snapshot[key], 3)} events`),
    "",
    `Total Events Logged: ${records.length}`,
    `Processes Tracked: ${Object.keys(snapshot).length}`,
    `Total Logical Events: ${Snapshot.total(snapshot)}`
  ]
  if (records.length >= 2) {
    lines.push("", "Recent Causality Analysis:")
    for (const record of records.slice(-3)) {
      lines.push(`   └─ [${record.eventType}] at ${time(record.timestamp)} | VC: ${Snapshot.format(record.clock)}`)
    }
  }
  return lines
}

/**
 * Text view of an event log: per-type counts, then the last `window` records, each with its
 * relation to the record shown before it.
 */
export const renderEventLog = (records: ReadonlyArray<EventRecord>, window = 10): ReadonlyArray<string> => {
  if (records.length === 0) {
    return ["No events logged yet."]
  }
  const lines = [
    `Total Events: ${records.length}`,
    "",
    "Event Type Summary:",
    ...summarizeByType(records).map(([type, count]) => `   └─ ${pad(type, 20)}: ${padStart(count, 3)} events`),
    "",
    `Event Timeline (Last ${window} events):`
  ]
  pairwiseCausality(records.slice(-window)).forEach(({ record, relationToPrevious }, i) => {
    lines.push(
      "",
      `${i + 1}. [${record.eventType}]`,
      `   Time: ${time(record.timestamp)}`,
      `   Process: ${record.processId}`,
      `   Vector Clock: ${Snapshot.format(record.clock)}`,
      `   Description: ${record.description}`
    )
    if (Option.isSome(relationToPrevious)) {
      lines.push(`   Relation to prev: ${Causality.describe(relationToPrevious.value)}`)
    }
  })
  return lines
}
