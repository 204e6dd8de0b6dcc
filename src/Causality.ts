import type { ClockSnapshot } from "./ClockSnapshot.js"
import { has } from "./ClockSnapshot.js"

/**
 * The causal relation of one snapshot to another.
 */
export type Relation = "before" | "after" | "concurrent"

/**
 * Whether `a` happened before `b`.
 *
 * Only processes tracked by both snapshots take part in the comparison: every shared counter of
 * `a` must be at most the one in `b`, and at least one must be strictly smaller. Snapshots that
 * share no process are never ordered.
 */
export const happenedBefore = (a: ClockSnapshot, b: ClockSnapshot): boolean => {
  let anyLess = false
  for (const key of Object.keys(a)) {
    if (!has(b, key)) continue
    if (a[key] > b[key]) return false
    if (a[key] < b[key]) anyLess = true
  }
  return anyLess
}

/**
 * Whether `a` happened after `b`.
 */
export const happenedAfter = (a: ClockSnapshot, b: ClockSnapshot): boolean => happenedBefore(b, a)

/**
 * Whether neither snapshot happened before the other. Identical snapshots are concurrent.
 */
export const isConcurrentWith = (a: ClockSnapshot, b: ClockSnapshot): boolean =>
  !happenedBefore(a, b) && !happenedBefore(b, a)

/**
 * Three-way comparison: -1 when `a` happened before `b`, 1 when after, 0 when concurrent.
 * This is not a total order, 0 does not mean equal.
 */
export const compare = (a: ClockSnapshot, b: ClockSnapshot): -1 | 0 | 1 =>
  happenedBefore(a, b) ? -1 : happenedBefore(b, a) ? 1 : 0

/**
 * The relation of `a` to `b`.
 */
export const relation = (a: ClockSnapshot, b: ClockSnapshot): Relation => {
  switch (compare(a, b)) {
    case -1:
      return "before"
    case 1:
      return "after"
    default:
      return "concurrent"
  }
}

/**
 * Short arrow notation used in reports.
 */
export const describe = (rel: Relation): string => {
  switch (rel) {
    case "before":
      return "→ (Happened Before)"
    case "after":
      return "← (Happened After)"
    case "concurrent":
      return "|| (Concurrent)"
  }
}
