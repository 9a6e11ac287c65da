/**
 * Ingestion pipeline
 *
 * One cycle: open run -> read each venue's grid (bounded pool) -> extract
 * -> normalize -> consolidate all venues together -> persist -> snapshot
 * -> close run. A venue that fails contributes nothing; the cycle itself
 * never throws.
 */

import { consolidate } from '../core/consolidate.js'
import { markerShapeFor, selectStrategy } from '../core/calibration.js'
import { extractRow } from '../core/extract/index.js'
import { RunBootstrapError, RunLedger } from '../core/ledger.js'
import { normalizeRow } from '../core/normalize.js'
import { persistIntervals } from '../core/persist.js'
import { mapSettled } from '../core/pool.js'
import { ResourceRegistry } from '../core/registry.js'
import { buildSnapshot, saveSnapshot } from '../core/snapshot.js'
import { formatDate, isIsoDate } from '../core/time.js'
import type { Database } from '../core/database.js'
import type { ExtractionStrategy } from '../core/calibration.js'
import type { DisplayWindow, GridReader, Interval, Resource, RunStatus, SlotStatus, Venue, WriteMode } from '../core/types.js'

export interface IngestOptions {
  source: string
  /** Reference date for every interval (default: today, local time) */
  bookingDate?: string
  notes?: string
  concurrency: number
  venueTimeoutMs: number
  writeMode: WriteMode
  batchSize: number
  maxVenues: number | null
  defaultWindow: DisplayWindow | null
  statusMapping: { geometry: SlotStatus; attribute: SlotStatus }
  /** Directory for JSON snapshots (null disables them) */
  snapshotsDir: string | null
}

export interface IngestDeps {
  db: Database
  reader: GridReader
  registry?: ResourceRegistry
  ledger?: RunLedger
  now?: () => Date
}

export interface IngestResult {
  runId: string | null
  status: Exclude<RunStatus, 'running'>
  bookingDate: string
  venuesTotal: number
  venuesCovered: number
  failedVenues: string[]
  intervalsProduced: number
  intervalsInserted: number
  intervalsDuplicate: number
  intervalsFailed: number
  markersSkipped: number
  duration: number
  error?: string
}

interface VenueExtraction {
  venue: Venue
  strategy: ExtractionStrategy
  resources: Resource[]
  intervals: Interval[]
  markersSkipped: number
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function extractVenue(
  venue: Venue,
  deps: { reader: GridReader; registry: ResourceRegistry },
  options: IngestOptions,
  run: { runId: string; bookingDate: string; observedAt: Date }
): Promise<VenueExtraction> {
  const strategy = selectStrategy(venue, {
    defaultWindow: options.defaultWindow,
    statusMapping: options.statusMapping
  })

  console.log(`[ingest] ${venue.name}: reading grid (${strategy.kind} strategy)`)

  const rows = await deps.reader.readGrid(venue, {
    shape: markerShapeFor(strategy),
    date: run.bookingDate,
    timeoutMs: options.venueTimeoutMs
  })

  if (rows.length === 0) {
    throw new Error('No grid rows found')
  }

  const resources: Resource[] = []
  const intervals: Interval[] = []
  let markersSkipped = 0

  for (const row of rows) {
    let resourceId: string
    try {
      resourceId = await deps.registry.resolve(venue.id, row.resourceName)
    } catch (error) {
      console.error(`[ingest] ${venue.name}: skipping row "${row.resourceName}": ${errorMessage(error)}`)
      continue
    }

    resources.push({ id: resourceId, venueId: venue.id, name: row.resourceName.trim() })

    const raws = extractRow(row.markers, strategy, () => { markersSkipped++ })
    intervals.push(...normalizeRow(raws, {
      resourceId,
      date: run.bookingDate,
      status: strategy.status,
      runId: run.runId,
      observedAt: run.observedAt
    }))
  }

  return { venue, strategy, resources, intervals, markersSkipped }
}

/**
 * Resources each replace call is authoritative for, keyed by status
 */
function replaceScopes(extractions: VenueExtraction[]): Map<SlotStatus, string[]> {
  const scopes = new Map<SlotStatus, string[]>()

  for (const { strategy, resources } of extractions) {
    const ids = scopes.get(strategy.status) ?? []
    ids.push(...resources.map(r => r.id))
    scopes.set(strategy.status, ids)
  }

  return scopes
}

export async function runIngestion(deps: IngestDeps, options: IngestOptions): Promise<IngestResult> {
  const now = deps.now ?? (() => new Date())
  const startedAt = now()
  const startTime = Date.now()
  const bookingDate = options.bookingDate ?? formatDate(startedAt)
  const ledger = deps.ledger ?? new RunLedger(deps.db)
  const registry = deps.registry ?? new ResourceRegistry(deps.db)

  const result: IngestResult = {
    runId: null,
    status: 'failed',
    bookingDate,
    venuesTotal: 0,
    venuesCovered: 0,
    failedVenues: [],
    intervalsProduced: 0,
    intervalsInserted: 0,
    intervalsDuplicate: 0,
    intervalsFailed: 0,
    markersSkipped: 0,
    duration: 0
  }

  console.log(`\n🚀 Starting grid ingestion for ${bookingDate}\n`)

  if (!isIsoDate(bookingDate)) {
    result.error = `Invalid booking date: ${bookingDate} (expected YYYY-MM-DD)`
    console.error(`❌ ${result.error}`)
    result.duration = Date.now() - startTime
    return result
  }

  let runId: string
  try {
    runId = await ledger.open({
      bookingDate,
      source: options.source,
      notes: options.notes,
      startedAt
    })
  } catch (error) {
    const reason = error instanceof RunBootstrapError ? error.message : `Could not open run: ${errorMessage(error)}`
    console.error(`❌ ${reason}`)
    result.error = reason
    result.duration = Date.now() - startTime
    return result
  }
  result.runId = runId

  try {
    const allVenues = await deps.db.listVenues()
    const venues = options.maxVenues ? allVenues.slice(0, options.maxVenues) : allVenues
    result.venuesTotal = venues.length

    console.log(`[ingest] Run ${runId}: ${venues.length} venue(s), concurrency ${options.concurrency}`)

    const settled = await mapSettled(venues, options.concurrency, venue =>
      extractVenue(venue, { reader: deps.reader, registry }, options, {
        runId,
        bookingDate,
        observedAt: startedAt
      })
    )

    const extractions: VenueExtraction[] = []
    settled.forEach((outcome, idx) => {
      const venue = venues[idx]
      if (outcome.status === 'fulfilled') {
        extractions.push(outcome.value)
        result.markersSkipped += outcome.value.markersSkipped
        console.log(
          `✅ ${venue.name}: ${outcome.value.resources.length} court(s), ` +
          `${outcome.value.intervals.length} interval(s)`
        )
      } else {
        result.failedVenues.push(venue.name)
        console.error(`❌ ${venue.name}: ${errorMessage(outcome.reason)}`)
      }
    })
    result.venuesCovered = extractions.length

    const merged = consolidate(extractions.flatMap(e => e.intervals))
    result.intervalsProduced = merged.length

    if (options.writeMode === 'replace') {
      for (const [status, resourceIds] of replaceScopes(extractions)) {
        const removed = await deps.db.replaceDay(bookingDate, { status, resourceIds })
        console.log(`[ingest] Cleared ${removed} ${status} slot(s) for ${bookingDate}`)
      }
    }

    const persisted = await persistIntervals(deps.db, merged, { batchSize: options.batchSize })
    result.intervalsInserted = persisted.inserted
    result.intervalsDuplicate = persisted.duplicates
    result.intervalsFailed = persisted.failed

    if (options.snapshotsDir) {
      for (const extraction of extractions) {
        const resourceIds = new Set(extraction.resources.map(r => r.id))
        const snapshot = buildSnapshot(
          extraction.venue,
          extraction.resources,
          merged.filter(interval => resourceIds.has(interval.resourceId)),
          { bookingDate, runId, observedAt: startedAt }
        )
        saveSnapshot(options.snapshotsDir, snapshot, startedAt)
      }
    }

    result.status = 'completed'
  } catch (error) {
    result.error = errorMessage(error)
    console.error(`❌ Run ${runId} failed: ${result.error}`)
  }

  try {
    await ledger.close(runId, result.status, {
      venuesCovered: result.venuesCovered,
      intervalsProduced: result.intervalsProduced,
      intervalsFailed: result.intervalsFailed
    })
  } catch (error) {
    console.error(`[ingest] Could not close run ${runId}: ${errorMessage(error)}`)
  }

  result.duration = Date.now() - startTime

  console.log(`\n✨ Run ${runId} ${result.status} in ${(result.duration / 1000).toFixed(1)}s`)
  console.log(`   Venues covered: ${result.venuesCovered}/${result.venuesTotal}`)
  console.log(`   Intervals: ${result.intervalsProduced} produced, ${result.intervalsInserted} inserted, ` +
    `${result.intervalsDuplicate} duplicate, ${result.intervalsFailed} failed`)
  if (result.failedVenues.length > 0) {
    console.log(`   ⚠️  Failed venues: ${result.failedVenues.join(', ')}`)
  }

  return result
}
