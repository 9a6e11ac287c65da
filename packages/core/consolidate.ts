/**
 * Interval consolidation
 *
 * Groups intervals by (resource, date, status), sorts each group by start
 * and merges overlapping or touching spans in one sweep. Within a group the
 * result is pairwise non-overlapping and non-adjacent. A merged span never
 * covers more than a full day.
 */

import { MINUTES_PER_DAY } from './time.js'
import { spanEnd } from './normalize.js'
import type { Interval } from './types.js'

function groupKey(interval: Interval): string {
  return `${interval.resourceId}\u0000${interval.date}\u0000${interval.status}`
}

/**
 * Group intervals by (resource, date, status), keys in sorted order
 */
export function groupIntervals(intervals: Iterable<Interval>): Map<string, Interval[]> {
  const groups = new Map<string, Interval[]>()

  for (const interval of intervals) {
    const key = groupKey(interval)
    const group = groups.get(key)
    if (group) {
      group.push(interval)
    } else {
      groups.set(key, [interval])
    }
  }

  const keys = [...groups.keys()].sort()
  return new Map(keys.map(key => [key, groups.get(key) ?? []]))
}

/**
 * Merge one group that shares resource, date and status
 */
export function mergeGroup(group: Interval[]): Interval[] {
  if (group.length === 0) return []

  const sorted = [...group].sort((a, b) => a.start - b.start)
  const merged: Interval[] = []

  let current = { ...sorted[0] }
  let currentEnd = spanEnd(current)

  for (const next of sorted.slice(1)) {
    // half-open spans: touching counts as mergeable
    if (next.start <= currentEnd) {
      currentEnd = Math.min(Math.max(currentEnd, spanEnd(next)), current.start + MINUTES_PER_DAY)
      current.durationMinutes = currentEnd - current.start
      current.end = currentEnd % MINUTES_PER_DAY
      if (next.observedAt < current.observedAt) {
        current.observedAt = next.observedAt
      }
      continue
    }

    merged.push(current)
    current = { ...next }
    currentEnd = spanEnd(current)
  }

  merged.push(current)
  return merged
}

export function consolidate(intervals: Iterable<Interval>): Interval[] {
  const result: Interval[] = []

  for (const group of groupIntervals(intervals).values()) {
    result.push(...mergeGroup(group))
  }

  return result
}
