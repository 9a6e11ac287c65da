import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { mapSettled } from './pool.js'

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms))

describe('mapSettled', () => {
  it('never runs more than the limit at once', async () => {
    let active = 0
    let peak = 0

    await mapSettled([1, 2, 3, 4, 5, 6], 2, async () => {
      active++
      peak = Math.max(peak, active)
      await sleep(5)
      active--
    })

    assert.equal(peak, 2)
  })

  it('keeps input order whatever the finish order', async () => {
    const results = await mapSettled([30, 1, 15], 3, async ms => {
      await sleep(ms)
      return ms * 2
    })

    assert.deepEqual(results, [
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 2 },
      { status: 'fulfilled', value: 30 }
    ])
  })

  it('isolates a rejected item', async () => {
    const boom = new Error('boom')
    const results = await mapSettled(['a', 'b', 'c'], 1, async item => {
      if (item === 'b') throw boom
      return item.toUpperCase()
    })

    assert.deepEqual(results, [
      { status: 'fulfilled', value: 'A' },
      { status: 'rejected', reason: boom },
      { status: 'fulfilled', value: 'C' }
    ])
  })

  it('returns nothing for no items', async () => {
    assert.deepEqual(await mapSettled([], 4, async () => 1), [])
  })
})
