/**
 * Geometry extraction
 *
 * Converts occupied grid cells (pixel x + width) into clock times using the
 * venue calibration. Times snap to the half hour and saturate at the display
 * window, since cells cut off at the grid edge are still real bookings.
 */

import { MINUTES_PER_DAY } from '../time.js'
import type { GeometryStrategy } from '../calibration.js'
import type { Calibration, DisplayWindow, GridMarker, MinuteOfDay, RawInterval } from '../types.js'
import type { SkipHandler } from './index.js'

/**
 * Floor the hour; minute is 30 when the fractional part is >= 0.5, else 0
 */
export function roundToHalfHour(hours: number): number {
  const whole = Math.floor(hours)
  const minute = hours - whole >= 0.5 ? 30 : 0
  return whole * 60 + minute
}

export function pixelToHours(px: number, calibration: Calibration): number {
  return (px - calibration.originPixels) / calibration.pixelsPerHour + calibration.hourOffset
}

function placeInDay(minutes: number, window: DisplayWindow | null): MinuteOfDay {
  if (window) {
    return Math.min(Math.max(minutes, window.start), window.end)
  }
  return ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY
}

export function* extractGeometric(
  markers: Iterable<GridMarker>,
  strategy: GeometryStrategy,
  onSkip?: SkipHandler
): Generator<RawInterval> {
  const { calibration, window } = strategy

  for (const marker of markers) {
    if (marker.kind !== 'geometric') {
      onSkip?.(marker, 'attribute marker on a geometric row')
      continue
    }
    if (!marker.occupied) continue

    if (!Number.isFinite(marker.x) || !Number.isFinite(marker.width)) {
      onSkip?.(marker, 'missing position or width')
      continue
    }
    if (marker.width < 0) {
      onSkip?.(marker, 'negative width')
      continue
    }

    const start = roundToHalfHour(pixelToHours(marker.x, calibration))
    const end = roundToHalfHour(pixelToHours(marker.x + marker.width, calibration))

    yield {
      start: placeInDay(start, window),
      end: placeInDay(end, window)
    }
  }
}
