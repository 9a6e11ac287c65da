import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { extractAttribute } from './attribute.js'
import { extractRow } from './index.js'
import type { GridMarker } from '../types.js'

describe('extractAttribute', () => {
  it('reads HH:MM and bare hours as authoritative', () => {
    const raws = [...extractAttribute([
      { kind: 'attribute', start: '9', end: '10:30' },
      { kind: 'attribute', start: '21:00', end: '24:00' },
      { kind: 'attribute', start: '07:10', end: '08:25' }
    ])]

    assert.deepEqual(raws, [
      { start: 540, end: 630 },
      { start: 1260, end: 0 },
      { start: 430, end: 505 }
    ])
  })

  it('skips markers with a missing or unreadable endpoint', () => {
    const reasons: string[] = []
    const markers: GridMarker[] = [
      { kind: 'attribute', start: '10:00' },
      { kind: 'attribute', start: 'noon', end: '13:00' },
      { kind: 'geometric', x: 400, width: 39, occupied: true },
      { kind: 'attribute', start: '18:00', end: '19:30' }
    ]

    const raws = [...extractAttribute(markers, (_marker, reason) => reasons.push(reason))]

    assert.deepEqual(raws, [{ start: 1080, end: 1170 }])
    assert.deepEqual(reasons, [
      'unreadable endpoint (10:00 to -)',
      'unreadable endpoint (noon to 13:00)',
      'geometric marker on an attribute row'
    ])
  })

  it('is selected by the attribute strategy', () => {
    const raws = [...extractRow(
      [{ kind: 'attribute', start: '08:00', end: '09:00' }],
      { kind: 'attribute', status: 'available' }
    )]

    assert.deepEqual(raws, [{ start: 480, end: 540 }])
  })
})
