import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { isUsableCalibration, markerShapeFor, parseDisplayWindow, selectStrategy } from './calibration.js'
import type { StrategyOptions } from './calibration.js'
import type { Venue } from './types.js'

const options: StrategyOptions = {
  defaultWindow: { start: 360, end: 1410 },
  statusMapping: { geometry: 'booked', attribute: 'available' }
}

const venue: Venue = { id: 'v1', name: 'Club Norte', url: 'https://example.test/club/norte' }

describe('selectStrategy', () => {
  it('reads calibrated venues geometrically with the default window', () => {
    const strategy = selectStrategy(
      { ...venue, calibration: { originPixels: 350, pixelsPerHour: 39, hourOffset: -1 } },
      options
    )

    assert.deepEqual(strategy, {
      kind: 'geometry',
      calibration: { originPixels: 350, pixelsPerHour: 39, hourOffset: -1 },
      window: { start: 360, end: 1410 },
      status: 'booked'
    })
    assert.equal(markerShapeFor(strategy), 'geometric')
  })

  it('prefers the venue display window', () => {
    const strategy = selectStrategy({
      ...venue,
      calibration: { originPixels: 0, pixelsPerHour: 40, hourOffset: 0 },
      displayWindow: { start: 420, end: 1380 }
    }, options)

    assert.equal(strategy.kind, 'geometry')
    if (strategy.kind === 'geometry') {
      assert.deepEqual(strategy.window, { start: 420, end: 1380 })
    }
  })

  it('falls back to attributes without a calibration', () => {
    const strategy = selectStrategy(venue, options)

    assert.deepEqual(strategy, { kind: 'attribute', status: 'available' })
    assert.equal(markerShapeFor(strategy), 'attribute')
  })

  it('applies a remapped status', () => {
    const strategy = selectStrategy(venue, {
      ...options,
      statusMapping: { geometry: 'available', attribute: 'booked' }
    })

    assert.equal(strategy.status, 'booked')
  })
})

describe('isUsableCalibration', () => {
  it('rejects zero or non-finite scales', () => {
    assert.equal(isUsableCalibration(undefined), false)
    assert.equal(isUsableCalibration({ originPixels: 350, pixelsPerHour: 0, hourOffset: 0 }), false)
    assert.equal(isUsableCalibration({ originPixels: NaN, pixelsPerHour: 39, hourOffset: 0 }), false)
    assert.equal(isUsableCalibration({ originPixels: 350, pixelsPerHour: 39, hourOffset: 0.5 }), true)
  })
})

describe('parseDisplayWindow', () => {
  it('parses the window bounds', () => {
    assert.deepEqual(parseDisplayWindow('06:00', '23:30'), { start: 360, end: 1410 })
  })

  it('rejects inverted windows', () => {
    assert.throws(() => parseDisplayWindow('23:00', '06:00'), /Invalid display window/)
  })
})
