/**
 * Database operations (Supabase)
 * Can be swapped out for other databases without changing core logic
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { PermanentError } from './retry.js'
import { formatClockTime, parseClockTime } from './time.js'
import type { Calibration, DisplayWindow, Interval, Run, RunStatus, SlotStatus, Venue } from './types.js'

/** Unique (venue, name) already taken by a concurrent insert */
export class ConflictError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause })
    this.name = 'ConflictError'
  }
}

/** Interval rejected because an identical or overlapping row exists */
export class DuplicateIntervalError extends PermanentError {
  constructor(message: string, cause?: Error) {
    super(message, cause)
    this.name = 'DuplicateIntervalError'
  }
}

export interface DayScope {
  status: SlotStatus
  resourceIds: string[]
}

export type NewRun = Omit<Run, 'id'>

export type RunUpdate = Partial<Pick<Run, 'status' | 'venuesCovered' | 'intervalsProduced' | 'intervalsFailed'>>

export interface Database {
  listVenues(): Promise<Venue[]>
  findResourceId(venueId: string, name: string): Promise<string | null>
  /** @throws ConflictError when (venueId, name) already exists */
  insertResource(venueId: string, name: string): Promise<string>
  /** Delete the date's intervals of one status for the given resources */
  replaceDay(date: string, scope: DayScope): Promise<number>
  insertIntervals(intervals: Interval[]): Promise<void>
  insertRun(run: NewRun): Promise<string>
  updateRun(id: string, fields: RunUpdate): Promise<void>
}

interface ClubRow {
  id: string | number
  name: string
  url: string
  origin_pixels: number | null
  pixels_per_hour: number | null
  hour_offset: number | null
  window_start: string | null
  window_end: string | null
}

interface SlotRow {
  court_id: string
  booking_date: string
  start_time: string
  end_time: string
  availability: boolean
  duration_minutes: number
  scrape_id: string
  scrape_timestamp: string
}

interface PostgrestFailure {
  message: string
  code?: string
}

/**
 * Transform database row to Venue object
 */
export function rowToVenue(row: ClubRow): Venue {
  const venue: Venue = {
    id: String(row.id),
    name: row.name,
    url: row.url
  }

  if (row.pixels_per_hour !== null && row.origin_pixels !== null) {
    const calibration: Calibration = {
      originPixels: Number(row.origin_pixels),
      pixelsPerHour: Number(row.pixels_per_hour),
      hourOffset: Number(row.hour_offset ?? 0)
    }
    venue.calibration = calibration
  }

  const windowStart = parseClockTime(row.window_start)
  const windowEnd = parseClockTime(row.window_end)
  if (windowStart !== null && windowEnd !== null && windowEnd > windowStart) {
    const displayWindow: DisplayWindow = { start: windowStart, end: windowEnd }
    venue.displayWindow = displayWindow
  }

  return venue
}

/**
 * Transform Interval object to database row format
 */
export function intervalToRow(interval: Interval): SlotRow {
  return {
    court_id: interval.resourceId,
    booking_date: interval.date,
    start_time: formatClockTime(interval.start),
    end_time: formatClockTime(interval.end),
    availability: interval.status === 'available',
    duration_minutes: interval.durationMinutes,
    scrape_id: interval.runId,
    scrape_timestamp: interval.observedAt.toISOString()
  }
}

function runStatusToRow(status: RunStatus): string {
  return status === 'running' ? 'in_progress' : status
}

/**
 * Map a PostgREST error onto the error classes the pipeline acts on
 */
function toStoreError(context: string, error: PostgrestFailure): Error {
  const message = `${context}: ${error.message}`

  if (error.code === '23505') return new ConflictError(message)
  if (error.code === '23P01' || error.message.includes('overlaps with existing')) {
    return new DuplicateIntervalError(message)
  }
  // 22xxx data exceptions, 23xxx constraint violations, 42xxx bad statements
  if (error.code && /^(22|23|42)/.test(error.code)) return new PermanentError(message)

  return new Error(message)
}

export class SupabaseDatabase implements Database {
  private client: SupabaseClient

  constructor(url: string, key: string) {
    this.client = createClient(url, key, {
      auth: { persistSession: false }
    })
  }

  async listVenues(): Promise<Venue[]> {
    const { data, error } = await this.client
      .from('clubs')
      .select('id, name, url, origin_pixels, pixels_per_hour, hour_offset, window_start, window_end')

    if (error) {
      throw toStoreError('Failed to list venues', error)
    }

    const rows: ClubRow[] = data ?? []
    return rows.filter(row => Boolean(row.url)).map(rowToVenue)
  }

  async findResourceId(venueId: string, name: string): Promise<string | null> {
    const { data, error } = await this.client
      .from('courts')
      .select('id')
      .eq('club_id', venueId)
      .eq('name', name)
      .limit(1)

    if (error) {
      throw toStoreError(`Failed to look up court ${name}`, error)
    }

    const rows: Array<{ id: string | number }> = data ?? []
    return rows.length > 0 ? String(rows[0].id) : null
  }

  async insertResource(venueId: string, name: string): Promise<string> {
    const { data, error } = await this.client
      .from('courts')
      .insert({ club_id: venueId, name, created_at: new Date().toISOString() })
      .select('id')
      .single()

    if (error) {
      throw toStoreError(`Failed to create court ${name}`, error)
    }

    const row: { id: string | number } = data
    return String(row.id)
  }

  async replaceDay(date: string, scope: DayScope): Promise<number> {
    if (scope.resourceIds.length === 0) {
      return 0
    }

    const { count, error } = await this.client
      .from('slots')
      .delete({ count: 'exact' })
      .eq('booking_date', date)
      .eq('availability', scope.status === 'available')
      .in('court_id', scope.resourceIds)

    if (error) {
      throw toStoreError(`Failed to clear slots for ${date}`, error)
    }

    return count ?? 0
  }

  async insertIntervals(intervals: Interval[]): Promise<void> {
    if (intervals.length === 0) {
      return
    }

    const { error } = await this.client
      .from('slots')
      .insert(intervals.map(intervalToRow))

    if (error) {
      throw toStoreError('Failed to insert slots', error)
    }
  }

  async insertRun(run: NewRun): Promise<string> {
    const { data, error } = await this.client
      .from('scrape_runs')
      .insert({
        run_at: run.startedAt.toISOString(),
        booking_date: run.bookingDate,
        source: run.source,
        notes: run.notes ?? null,
        slots_scraped: run.intervalsProduced,
        slots_failed: run.intervalsFailed,
        clubs_covered: run.venuesCovered,
        scrape_status: runStatusToRow(run.status)
      })
      .select('id')
      .single()

    if (error) {
      throw toStoreError('Failed to create scrape run', error)
    }

    const row: { id: string | number } = data
    return String(row.id)
  }

  async updateRun(id: string, fields: RunUpdate): Promise<void> {
    const payload: Record<string, string | number> = {}
    if (fields.status !== undefined) payload.scrape_status = runStatusToRow(fields.status)
    if (fields.intervalsProduced !== undefined) payload.slots_scraped = fields.intervalsProduced
    if (fields.intervalsFailed !== undefined) payload.slots_failed = fields.intervalsFailed
    if (fields.venuesCovered !== undefined) payload.clubs_covered = fields.venuesCovered

    const { error } = await this.client
      .from('scrape_runs')
      .update(payload)
      .eq('id', id)

    if (error) {
      throw toStoreError(`Failed to update scrape run ${id}`, error)
    }
  }
}

export function createDatabase(): Database {
  const url = process.env.SUPABASE_URL
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY

  if (!url || !key) {
    throw new Error('Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY environment variables')
  }

  return new SupabaseDatabase(url, key)
}
