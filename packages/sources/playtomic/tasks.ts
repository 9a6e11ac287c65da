/**
 * Playtomic Task Definitions
 *
 * Defines the tasks for the Playtomic grid source with their schedules
 * and execution logic. Tasks are discovered and run by the orchestrator.
 */

import config from '../../../config.js'
import { parseDisplayWindow, selectStrategy } from '../../core/calibration.js'
import { createDatabase } from '../../core/database.js'
import { isIsoDate } from '../../core/time.js'
import { runIngestion } from '../../orchestrator/ingest.js'
import type { IngestOptions } from '../../orchestrator/ingest.js'
import type { Task } from '../../orchestrator/runner.js'
import { PlaywrightGridReader } from './scrapers/grid.js'
import { playwrightProbe, proxyCandidates, ProxyPool } from './browser.js'

/**
 * Ingest options from config.ts and the environment
 * @throws Error when a booking date override is not YYYY-MM-DD
 */
export function ingestOptionsFromConfig(overrides: Partial<IngestOptions> = {}): IngestOptions {
  const { ingest, grid, output, statusMapping } = config

  const options: IngestOptions = {
    source: ingest.source,
    notes: 'Automated scrape of playtomic courts',
    concurrency: ingest.concurrency,
    venueTimeoutMs: ingest.venueTimeoutMs,
    writeMode: ingest.writeMode,
    batchSize: ingest.batchSize,
    maxVenues: ingest.maxVenues,
    defaultWindow: parseDisplayWindow(grid.displayWindow.start, grid.displayWindow.end),
    statusMapping,
    snapshotsDir: output.snapshotsEnabled ? output.snapshotsDir : null,
    ...overrides
  }

  if (options.bookingDate !== undefined && !isIsoDate(options.bookingDate)) {
    throw new Error(`Invalid booking date: ${options.bookingDate} (expected YYYY-MM-DD)`)
  }

  return options
}

// Probed once per process, shared by every venue worker
let proxyPool: ProxyPool | null = null

function getProxyPool(): ProxyPool {
  if (!proxyPool) {
    const { proxy } = config.browser
    proxyPool = new ProxyPool(
      proxyCandidates(proxy),
      playwrightProbe(proxy.probeUrl, proxy.probeTimeoutMs)
    )
  }
  return proxyPool
}

const tasks: Task[] = [
  /**
   * Task: Ingest booking grids
   * Frequency: Polling (the CLI loop re-runs it every few hours)
   * Method: Playwright per venue, Supabase for storage
   */
  {
    id: 'playtomic:grid',
    schedule: 'polling',
    description: 'Read every venue grid, consolidate court intervals and store them',

    async run() {
      const reader = new PlaywrightGridReader({
        proxyPool: getProxyPool(),
        headless: config.browser.headless,
        executablePath: config.browser.executablePath,
        selectors: config.grid.selectors,
        settleDelayMs: config.ingest.settleDelayMs,
        screenshotsDir: config.output.screenshotsEnabled ? config.output.screenshotsDir : null
      })

      const result = await runIngestion(
        { db: createDatabase(), reader },
        ingestOptionsFromConfig({ bookingDate: process.env.INGEST_BOOKING_DATE || undefined })
      )

      return {
        success: result.status === 'completed',
        itemsProcessed: result.intervalsInserted,
        detail: result
      }
    }
  },

  /**
   * Task: List venues and how each will be read
   * Frequency: Daily (catches venues registered without calibration)
   */
  {
    id: 'playtomic:venues',
    schedule: 'daily',
    description: 'List registered venues with the extraction strategy each will use',

    async run() {
      const venues = await createDatabase().listVenues()
      const { defaultWindow, statusMapping } = ingestOptionsFromConfig()

      const listing = venues.map(venue => {
        const strategy = selectStrategy(venue, { defaultWindow, statusMapping })
        console.log(`  ${venue.name} (${venue.id}): ${strategy.kind} → ${strategy.status}`)
        return { id: venue.id, name: venue.name, strategy: strategy.kind, status: strategy.status }
      })

      const uncalibrated = listing.filter(v => v.strategy === 'attribute').length
      console.log(`[playtomic:venues] ${venues.length} venue(s), ${uncalibrated} read by attribute`)

      return { success: true, itemsProcessed: venues.length, detail: listing }
    }
  },

  /**
   * Task: Probe proxy ports
   * Frequency: Daily
   */
  {
    id: 'playtomic:proxies',
    schedule: 'daily',
    description: 'Probe the configured proxy ports and report which work',
    enabled: () => Boolean(config.browser.proxy.host),

    async run() {
      const working = await getProxyPool().working()
      working.forEach(proxy => console.log(`  ✓ ${proxy.server}`))

      return {
        success: working.length > 0,
        itemsProcessed: working.length,
        detail: working.map(proxy => proxy.server)
      }
    }
  }
]

export default tasks
