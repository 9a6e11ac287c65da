import { extractAttribute } from './attribute.js'
import { extractGeometric } from './geometry.js'
import type { ExtractionStrategy } from '../calibration.js'
import type { GridMarker, RawInterval } from '../types.js'

export type SkipHandler = (marker: GridMarker, reason: string) => void

/**
 * Turn one resource row into raw intervals with the venue's strategy
 */
export function extractRow(
  markers: Iterable<GridMarker>,
  strategy: ExtractionStrategy,
  onSkip?: SkipHandler
): Generator<RawInterval> {
  switch (strategy.kind) {
    case 'geometry':
      return extractGeometric(markers, strategy, onSkip)
    case 'attribute':
      return extractAttribute(markers, onSkip)
  }
}

export { extractAttribute } from './attribute.js'
export { extractGeometric, roundToHalfHour, pixelToHours } from './geometry.js'
