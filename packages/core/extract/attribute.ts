/**
 * Attribute extraction
 *
 * Slot cells carry their own start/end text. Values are authoritative:
 * no calibration, no rounding.
 */

import { parseClockTime } from '../time.js'
import type { GridMarker, RawInterval } from '../types.js'
import type { SkipHandler } from './index.js'

export function* extractAttribute(
  markers: Iterable<GridMarker>,
  onSkip?: SkipHandler
): Generator<RawInterval> {
  for (const marker of markers) {
    if (marker.kind !== 'attribute') {
      onSkip?.(marker, 'geometric marker on an attribute row')
      continue
    }

    const start = parseClockTime(marker.start)
    const end = parseClockTime(marker.end)

    if (start === null || end === null) {
      onSkip?.(marker, `unreadable endpoint (${marker.start ?? '-'} to ${marker.end ?? '-'})`)
      continue
    }

    yield { start, end }
  }
}
