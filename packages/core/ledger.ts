/**
 * Run ledger
 *
 * One record per extraction cycle. Opened as running, closed once; a close
 * only counts once the store accepted it. Transient store errors are retried.
 * Runs left running after a crash are not swept here.
 */

import { retry } from './retry.js'
import type { Database } from './database.js'
import type { RetryOptions } from './retry.js'
import type { RunStatus, RunTotals } from './types.js'

export class RunBootstrapError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause })
    this.name = 'RunBootstrapError'
  }
}

export interface RunMeta {
  bookingDate: string
  source: string
  notes?: string
  startedAt?: Date
}

export class RunLedger {
  private closed = new Set<string>()

  constructor(
    private db: Pick<Database, 'insertRun' | 'updateRun'>,
    private retryOptions: RetryOptions = {}
  ) {}

  private withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      onRetry: (error, attempt, delay) => {
        console.warn(`[ledger] ${label}: retry ${attempt} in ${delay}ms: ${error.message}`)
      },
      ...this.retryOptions
    })
  }

  /**
   * @throws RunBootstrapError when the run record cannot be created
   */
  async open(meta: RunMeta): Promise<string> {
    try {
      return await this.withRetry('open run', () => this.db.insertRun({
        startedAt: meta.startedAt ?? new Date(),
        status: 'running',
        venuesCovered: 0,
        intervalsProduced: 0,
        intervalsFailed: 0,
        bookingDate: meta.bookingDate,
        source: meta.source,
        notes: meta.notes
      }))
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error))
      throw new RunBootstrapError(`Could not open run: ${cause.message}`, cause)
    }
  }

  async close(runId: string, status: Exclude<RunStatus, 'running'>, totals: RunTotals): Promise<void> {
    if (this.closed.has(runId)) {
      throw new Error(`Run ${runId} is already closed`)
    }

    await this.withRetry(`close run ${runId}`, () => this.db.updateRun(runId, { status, ...totals }))
    this.closed.add(runId)
  }
}
