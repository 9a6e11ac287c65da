/**
 * Interval normalization
 *
 * Resolves midnight wraparound, computes duration and attaches the status
 * of the extraction path. Degenerate spans are dropped here.
 */

import { MINUTES_PER_DAY } from './time.js'
import type { Interval, RawInterval, SlotStatus } from './types.js'

export interface NormalizeContext {
  resourceId: string
  date: string
  status: SlotStatus
  runId: string
  observedAt: Date
}

/**
 * Normalize one raw interval
 * @returns null when the span is zero-length or impossible
 */
export function normalizeInterval(raw: RawInterval, context: NormalizeContext): Interval | null {
  const { start, end } = raw

  if (!isClockMinute(start) || !isClockMinute(end)) return null

  // end before start means the booking runs past midnight
  const spanEnd = end < start ? end + MINUTES_PER_DAY : end
  const durationMinutes = spanEnd - start

  if (durationMinutes <= 0 || durationMinutes > MINUTES_PER_DAY) return null

  return {
    resourceId: context.resourceId,
    date: context.date,
    start,
    end: spanEnd % MINUTES_PER_DAY,
    durationMinutes,
    status: context.status,
    runId: context.runId,
    observedAt: context.observedAt
  }
}

export function normalizeRow(raws: Iterable<RawInterval>, context: NormalizeContext): Interval[] {
  const intervals: Interval[] = []

  for (const raw of raws) {
    const interval = normalizeInterval(raw, context)
    if (interval) intervals.push(interval)
  }

  return intervals
}

/**
 * End of the interval on a continuous timeline (may pass 24:00)
 */
export function spanEnd(interval: Pick<Interval, 'start' | 'durationMinutes'>): number {
  return interval.start + interval.durationMinutes
}

function isClockMinute(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < MINUTES_PER_DAY
}
