import { Schema } from "effect"

/**
 * An immutable view of a vector clock at one point in time.
 * Maps each process identifier to the number of events observed from it.
 */
export type ClockSnapshot = { readonly [processId: string]: number }

/**
 * Schema for snapshots carried as message metadata between processes.
 * Counters must be non-negative integers.
 */
export const ClockSnapshot: Schema.Schema<ClockSnapshot> = Schema.Record({
  key: Schema.String,
  value: Schema.Int.pipe(Schema.nonNegative())
})

/**
 * Builds a frozen snapshot from entries. Every id becomes an own property, `"__proto__"` included.
 */
export const fromEntries = (entries: Iterable<readonly [string, number]>): ClockSnapshot =>
  Object.freeze(Object.fromEntries(entries))

/**
 * Process identifiers of a snapshot in code-unit lexicographic order.
 */
export const sortedKeys = (snapshot: ClockSnapshot): Array<string> =>
  Object.keys(snapshot).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))

/**
 * Decodes a snapshot received from another process.
 */
export const decode = Schema.decodeUnknown(ClockSnapshot)

/**
 * Whether the snapshot tracks the given process.
 */
export const has = (snapshot: ClockSnapshot, processId: string): boolean => Object.hasOwn(snapshot, processId)

/**
 * Sum of all counters, i.e. the number of logical events the snapshot has seen.
 */
export const total = (snapshot: ClockSnapshot): number =>
  Object.values(snapshot).reduce((sum, value) => sum + value, 0)

/**
 * Renders a snapshot as `{A:1, B:0}` with keys in lexicographic order.
 */
export const format = (snapshot: ClockSnapshot): string =>
  "{" + sortedKeys(snapshot).map((key) => `${key}:${snapshot[key]}`).join(", ") + "}"
