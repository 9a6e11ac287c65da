/**
 * JSON snapshots of consolidated grids, for offline inspection
 *
 * Best effort: a failed write is logged and reported as null.
 */

import fs from 'fs'
import path from 'path'
import { formatClockTime } from './time.js'
import type { Interval, Resource, Venue } from './types.js'

export interface VenueSnapshot {
  club_name: string
  club_id: string
  booking_date: string
  scrape_timestamp: string
  run_id: string
  courts: Array<{
    name: string
    slots: Array<{
      start_time: string
      end_time: string
      status: string
      duration_minutes: number
    }>
  }>
}

export function buildSnapshot(
  venue: Venue,
  resources: Resource[],
  intervals: Interval[],
  meta: { bookingDate: string; runId: string; observedAt: Date }
): VenueSnapshot {
  return {
    club_name: venue.name,
    club_id: venue.id,
    booking_date: meta.bookingDate,
    scrape_timestamp: meta.observedAt.toISOString(),
    run_id: meta.runId,
    courts: resources.map(resource => ({
      name: resource.name,
      slots: intervals
        .filter(interval => interval.resourceId === resource.id)
        .map(interval => ({
          start_time: formatClockTime(interval.start),
          end_time: formatClockTime(interval.end),
          status: interval.status,
          duration_minutes: interval.durationMinutes
        }))
    }))
  }
}

export function snapshotFileName(venueName: string, at: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  const stamp = `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}` +
    `_${pad(at.getHours())}-${pad(at.getMinutes())}-${pad(at.getSeconds())}`
  const safeName = venueName.trim().replace(/[^A-Za-z0-9_-]+/g, '_')
  return `court_data_${safeName}_${stamp}.json`
}

export function saveSnapshot(dir: string, snapshot: VenueSnapshot, at: Date = new Date()): string | null {
  const file = path.join(dir, snapshotFileName(snapshot.club_name, at))

  try {
    fs.mkdirSync(dir, { recursive: true })
    fs.writeFileSync(file, JSON.stringify(snapshot, null, 2))
    console.log(`[snapshot] Saved ${file}`)
    return file
  } catch (error) {
    console.error(`[snapshot] Failed to save ${file}:`, error instanceof Error ? error.message : String(error))
    return null
  }
}
