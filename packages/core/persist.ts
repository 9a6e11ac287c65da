/**
 * Batched interval writer
 *
 * Inserts in fixed-size batches. A rejected batch is retried one record at
 * a time so a single bad row does not lose its neighbours.
 */

import { DuplicateIntervalError } from './database.js'
import { retry } from './retry.js'
import { formatClockTime } from './time.js'
import type { RetryOptions } from './retry.js'
import type { Database } from './database.js'
import type { Interval } from './types.js'

export interface PersistOptions {
  batchSize?: number
  retry?: RetryOptions
}

export interface PersistResult {
  inserted: number
  duplicates: number
  failed: number
}

export async function persistIntervals(
  db: Pick<Database, 'insertIntervals'>,
  intervals: Interval[],
  options: PersistOptions = {}
): Promise<PersistResult> {
  const { batchSize = 100 } = options
  const result: PersistResult = { inserted: 0, duplicates: 0, failed: 0 }

  const insert = (batch: Interval[]) => retry(() => db.insertIntervals(batch), {
    onRetry: (error, attempt, delay) => {
      console.warn(`[persist] Retry ${attempt} in ${delay}ms: ${error.message}`)
    },
    ...options.retry
  })

  for (let i = 0; i < intervals.length; i += batchSize) {
    const batch = intervals.slice(i, i + batchSize)

    try {
      await insert(batch)
      result.inserted += batch.length
      continue
    } catch (error) {
      console.warn(
        `[persist] Batch ${Math.floor(i / batchSize) + 1} rejected (${error instanceof Error ? error.message : String(error)}), ` +
        `inserting ${batch.length} records one by one`
      )
    }

    for (const interval of batch) {
      try {
        await insert([interval])
        result.inserted++
      } catch (error) {
        if (error instanceof DuplicateIntervalError) {
          result.duplicates++
          continue
        }
        result.failed++
        console.error(
          `[persist] Dropped slot ${interval.resourceId} ${interval.date} ` +
          `${formatClockTime(interval.start)}+${interval.durationMinutes}m: ${error instanceof Error ? error.message : String(error)}`
        )
      }
    }
  }

  return result
}
