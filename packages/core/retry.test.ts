import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { isTransientError, PermanentError, retry, TransientError } from './retry.js'

describe('retry', () => {
  it('retries transient failures until one succeeds', async () => {
    let calls = 0
    const retried: number[] = []

    const value = await retry(async () => {
      calls++
      if (calls < 3) throw new Error('fetch failed')
      return 'ok'
    }, { initialDelay: 1, onRetry: (_error, attempt) => retried.push(attempt) })

    assert.equal(value, 'ok')
    assert.equal(calls, 3)
    assert.deepEqual(retried, [1, 2])
  })

  it('does not retry permanent failures', async () => {
    let calls = 0

    await assert.rejects(
      retry(async () => {
        calls++
        throw new PermanentError('invalid input syntax for type time')
      }, { initialDelay: 1 }),
      { name: 'PermanentError' }
    )
    assert.equal(calls, 1)
  })

  it('gives up after maxAttempts with the last error', async () => {
    let calls = 0

    await assert.rejects(
      retry(async () => {
        calls++
        throw new TransientError(`attempt ${calls}`)
      }, { initialDelay: 1, maxAttempts: 2 }),
      { message: 'attempt 2' }
    )
    assert.equal(calls, 2)
  })
})

describe('isTransientError', () => {
  it('classifies by class, then by message', () => {
    assert.equal(isTransientError(new TransientError('x')), true)
    assert.equal(isTransientError(new PermanentError('timeout')), false)
    assert.equal(isTransientError(new Error('503 Service Unavailable')), true)
    assert.equal(isTransientError(new Error('null value in column "court_id"')), false)
  })
})
