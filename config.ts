/**
 * Root configuration for grid ingestion
 *
 * Defaults live here; deployment overrides and secrets come from the
 * environment (loaded from .env by the CLI).
 */

import type { SlotStatus, WriteMode } from './packages/core/types.js'

interface IngestConfig {
  /** Source label recorded on every run */
  source: string;
  /** Venues processed at once (each holds one browser) */
  concurrency: number;
  /** Page load and selector wait ceiling per venue, in ms */
  venueTimeoutMs: number;
  /** Pause after the grid appears so late cells can render, in ms */
  settleDelayMs: number;
  /** append: insert only; replace: delete the day's prior intervals first */
  writeMode: WriteMode;
  /** Records per insert request */
  batchSize: number;
  /** Cap on venues per run (null = all) */
  maxVenues: number | null;
}

interface GridConfig {
  /** First and last clock times a grid can display */
  displayWindow: { start: string; end: string };
  selectors: {
    grid: string;
    label: string;
    row: string;
    occupied: string;
    slot: string;
  };
}

interface OutputConfig {
  snapshotsEnabled: boolean;
  snapshotsDir: string;
  screenshotsEnabled: boolean;
  screenshotsDir: string;
}

interface BrowserConfig {
  headless: boolean;
  executablePath: string | null;
  proxy: {
    host: string | null;
    user: string | null;
    pass: string | null;
    ports: string[];
    probeUrl: string;
    probeTimeoutMs: number;
  };
}

interface Config {
  ingest: IngestConfig;
  grid: GridConfig;
  /** Status attached to intervals from each extraction path */
  statusMapping: { geometry: SlotStatus; attribute: SlotStatus };
  output: OutputConfig;
  browser: BrowserConfig;
  loop: { intervalHours: number };
}

function envInt(name: string, fallback: number): number {
  const value = process.env[name]
  if (!value) return fallback
  const parsed = parseInt(value, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

function envWriteMode(fallback: WriteMode): WriteMode {
  const value = process.env.INGEST_WRITE_MODE
  return value === 'append' || value === 'replace' ? value : fallback
}

const config: Config = {
  ingest: {
    source: 'playtomic',
    concurrency: envInt('INGEST_CONCURRENCY', 2),
    venueTimeoutMs: envInt('INGEST_VENUE_TIMEOUT_MS', 20000),
    settleDelayMs: 3000,
    writeMode: envWriteMode('append'),
    batchSize: 100,
    maxVenues: process.env.INGEST_MAX_VENUES ? envInt('INGEST_MAX_VENUES', 0) || null : null,
  },

  grid: {
    displayWindow: { start: '06:00', end: '23:30' },
    selectors: {
      grid: '#root .bbq2__grid',
      label: '.bbq2__resource__label',
      row: '.bbq2__slots-resource',
      // booked cells on the geometric grid
      occupied: '.bbq2__hole',
      // bookable cells carrying data-start / data-end
      slot: '[data-start]',
    },
  },

  statusMapping: {
    geometry: 'booked',
    attribute: 'available',
  },

  output: {
    snapshotsEnabled: true,
    snapshotsDir: 'data/snapshots',
    screenshotsEnabled: false,
    screenshotsDir: 'data/screenshots',
  },

  browser: {
    headless: true,
    executablePath: process.env.CHROME_EXECUTABLE_PATH || null,
    proxy: {
      host: process.env.SMARTPROXY_HOST || null,
      user: process.env.SMARTPROXY_USER || null,
      pass: process.env.SMARTPROXY_PASS || null,
      ports: (process.env.SMARTPROXY_PORTS || '10001').split(',').map(p => p.trim()).filter(Boolean),
      probeUrl: 'https://ip.decodo.com/json',
      probeTimeoutMs: 10000,
    },
  },

  loop: {
    intervalHours: envInt('LOOP_INTERVAL_HOURS', 6),
  },
}

export default config
