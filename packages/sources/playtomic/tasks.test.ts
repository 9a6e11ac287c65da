import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { ingestOptionsFromConfig } from './tasks.js'

describe('ingestOptionsFromConfig', () => {
  it('keeps a valid booking date override', () => {
    assert.equal(ingestOptionsFromConfig({ bookingDate: '2025-06-01' }).bookingDate, '2025-06-01')
  })

  it('leaves the booking date unset by default', () => {
    assert.equal(ingestOptionsFromConfig().bookingDate, undefined)
  })

  it('rejects a malformed booking date', () => {
    assert.throws(
      () => ingestOptionsFromConfig({ bookingDate: '01/06/2025' }),
      { message: 'Invalid booking date: 01/06/2025 (expected YYYY-MM-DD)' }
    )
  })
})
