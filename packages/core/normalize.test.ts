import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { normalizeInterval, normalizeRow } from './normalize.js'
import type { NormalizeContext } from './normalize.js'

const observedAt = new Date('2025-06-01T08:00:00Z')

const context: NormalizeContext = {
  resourceId: 'court-1',
  date: '2025-06-01',
  status: 'booked',
  runId: 'run-1',
  observedAt
}

describe('normalizeInterval', () => {
  it('computes duration for a same-day span', () => {
    assert.deepEqual(normalizeInterval({ start: 540, end: 630 }, context), {
      resourceId: 'court-1',
      date: '2025-06-01',
      start: 540,
      end: 630,
      durationMinutes: 90,
      status: 'booked',
      runId: 'run-1',
      observedAt
    })
  })

  it('keeps the stored end within the day across midnight', () => {
    // 23:00 -> 00:30
    const interval = normalizeInterval({ start: 1380, end: 30 }, context)

    assert.ok(interval)
    assert.equal(interval.start, 1380)
    assert.equal(interval.end, 30)
    assert.equal(interval.durationMinutes, 90)
  })

  it('discards zero-length and out-of-range spans', () => {
    assert.equal(normalizeInterval({ start: 600, end: 600 }, context), null)
    assert.equal(normalizeInterval({ start: -30, end: 600 }, context), null)
    assert.equal(normalizeInterval({ start: 600, end: 1440 }, context), null)
    assert.equal(normalizeInterval({ start: 600.5, end: 700 }, context), null)
  })

  it('carries the status it is given', () => {
    const interval = normalizeInterval({ start: 1080, end: 1170 }, { ...context, status: 'available' })
    assert.equal(interval?.status, 'available')
  })
})

describe('normalizeRow', () => {
  it('drops degenerate markers and keeps the rest', () => {
    const intervals = normalizeRow(
      [{ start: 480, end: 540 }, { start: 540, end: 540 }, { start: 1410, end: 0 }],
      context
    )

    assert.deepEqual(
      intervals.map(i => [i.start, i.end, i.durationMinutes]),
      [[480, 540, 60], [1410, 0, 30]]
    )
  })
})
