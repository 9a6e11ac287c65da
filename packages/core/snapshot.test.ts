import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { buildSnapshot, saveSnapshot, snapshotFileName } from './snapshot.js'
import type { Interval, Resource, Venue } from './types.js'

const venue: Venue = { id: 'club-1', name: 'Club Padel Norte', url: 'https://example.test/club-1' }
const observedAt = new Date('2025-06-01T08:00:00Z')

const resources: Resource[] = [
  { id: 'court-1', venueId: 'club-1', name: 'Pista 1' },
  { id: 'court-2', venueId: 'club-1', name: 'Pista 2' }
]

function interval(resourceId: string, start: number, end: number, durationMinutes: number): Interval {
  return { resourceId, date: '2025-06-01', start, end, durationMinutes, status: 'booked', runId: 'run-1', observedAt }
}

describe('buildSnapshot', () => {
  it('groups slots under their court', () => {
    const snapshot = buildSnapshot(venue, resources, [
      interval('court-1', 540, 660, 120),
      interval('court-2', 1380, 30, 90)
    ], { bookingDate: '2025-06-01', runId: 'run-1', observedAt })

    assert.deepEqual(snapshot, {
      club_name: 'Club Padel Norte',
      club_id: 'club-1',
      booking_date: '2025-06-01',
      scrape_timestamp: '2025-06-01T08:00:00.000Z',
      run_id: 'run-1',
      courts: [
        { name: 'Pista 1', slots: [{ start_time: '09:00', end_time: '11:00', status: 'booked', duration_minutes: 120 }] },
        { name: 'Pista 2', slots: [{ start_time: '23:00', end_time: '00:30', status: 'booked', duration_minutes: 90 }] }
      ]
    })
  })
})

describe('snapshotFileName', () => {
  it('uses a filesystem-safe name and a local timestamp', () => {
    assert.equal(
      snapshotFileName('Club Padel Norte', new Date(2025, 5, 1, 9, 5, 7)),
      'court_data_Club_Padel_Norte_2025-06-01_09-05-07.json'
    )
  })
})

describe('saveSnapshot', () => {
  const snapshot = buildSnapshot(venue, resources, [], { bookingDate: '2025-06-01', runId: 'run-1', observedAt })

  it('writes pretty JSON and returns the path', () => {
    const dir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'snapshots-')), 'nested')
    const at = new Date(2025, 5, 1, 9, 5, 7)

    const file = saveSnapshot(dir, snapshot, at)

    assert.equal(file, path.join(dir, 'court_data_Club_Padel_Norte_2025-06-01_09-05-07.json'))
    assert.deepEqual(JSON.parse(fs.readFileSync(path.join(dir, snapshotFileName(venue.name, at)), 'utf8')), snapshot)
  })

  it('returns null when the directory cannot be created', () => {
    const blocker = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'snapshots-')), 'file')
    fs.writeFileSync(blocker, '')

    assert.equal(saveSnapshot(path.join(blocker, 'sub'), snapshot), null)
  })
})
