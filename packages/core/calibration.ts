/**
 * Calibration model and per-venue strategy selection
 *
 * A venue with a usable calibration record is read geometrically; every
 * other venue is read from its slot attributes.
 */

import { parseClockTime } from './time.js'
import type { Calibration, DisplayWindow, MarkerShape, SlotStatus, Venue } from './types.js'

export interface GeometryStrategy {
  kind: 'geometry'
  calibration: Calibration
  window: DisplayWindow | null
  status: SlotStatus
}

export interface AttributeStrategy {
  kind: 'attribute'
  status: SlotStatus
}

export type ExtractionStrategy = GeometryStrategy | AttributeStrategy

export interface StrategyOptions {
  defaultWindow: DisplayWindow | null
  statusMapping: { geometry: SlotStatus; attribute: SlotStatus }
}

export function isUsableCalibration(calibration: Calibration | undefined): calibration is Calibration {
  if (!calibration) return false
  return Number.isFinite(calibration.originPixels)
    && Number.isFinite(calibration.hourOffset)
    && Number.isFinite(calibration.pixelsPerHour)
    && calibration.pixelsPerHour > 0
}

export function selectStrategy(venue: Venue, options: StrategyOptions): ExtractionStrategy {
  if (isUsableCalibration(venue.calibration)) {
    return {
      kind: 'geometry',
      calibration: venue.calibration,
      window: venue.displayWindow ?? options.defaultWindow,
      status: options.statusMapping.geometry
    }
  }

  return { kind: 'attribute', status: options.statusMapping.attribute }
}

export function markerShapeFor(strategy: ExtractionStrategy): MarkerShape {
  return strategy.kind === 'geometry' ? 'geometric' : 'attribute'
}

/**
 * Build a display window from config strings ("06:00", "23:30")
 */
export function parseDisplayWindow(start: string, end: string): DisplayWindow {
  const startMinutes = parseClockTime(start)
  const endMinutes = parseClockTime(end)

  if (startMinutes === null || endMinutes === null || endMinutes <= startMinutes) {
    throw new Error(`Invalid display window: ${start}-${end}`)
  }

  return { start: startMinutes, end: endMinutes }
}
