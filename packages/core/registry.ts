/**
 * Resource registry
 *
 * Resolves a court name to its stable id, creating the court on first
 * sight. Safe to call from concurrent venue workers.
 */

import { ConflictError } from './database.js'
import type { Database } from './database.js'

export class ResourceRegistry {
  private pending = new Map<string, Promise<string>>()

  constructor(private db: Pick<Database, 'findResourceId' | 'insertResource'>) {}

  /**
   * Look up (venueId, name), inserting when absent
   * @returns Resource id
   */
  resolve(venueId: string, name: string): Promise<string> {
    const trimmed = name.trim()
    if (!trimmed) {
      return Promise.reject(new Error(`Empty court name for venue ${venueId}`))
    }

    const key = `${venueId}\u0000${trimmed}`
    const existing = this.pending.get(key)
    if (existing) return existing

    const lookup = this.lookupOrCreate(venueId, trimmed)
    this.pending.set(key, lookup)

    // failed lookups are forgotten so the next call tries again
    void lookup.catch(() => this.pending.delete(key))

    return lookup
  }

  private async lookupOrCreate(venueId: string, name: string): Promise<string> {
    const found = await this.db.findResourceId(venueId, name)
    if (found) return found

    try {
      const id = await this.db.insertResource(venueId, name)
      console.log(`[registry] Created court "${name}" for venue ${venueId}`)
      return id
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error

      // another writer created it between our read and insert
      const raced = await this.db.findResourceId(venueId, name)
      if (!raced) {
        throw new Error(`Court "${name}" reported as existing but not found for venue ${venueId}`, { cause: error })
      }
      return raced
    }
  }
}
