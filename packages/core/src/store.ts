import { QuoteGateError } from './errors.js'
import type { ConsumeResult, QuoteRecord } from './types.js'

/**
 * Owner of every QuoteRecord. Callers only ever receive copies, so expiry and
 * consumption checks always see the latest state.
 */
export interface QuoteStore {
  put(id: string, record: QuoteRecord): Promise<void>
  get(id: string): Promise<QuoteRecord | undefined>
  /**
   * Validates and consumes a quote as one atomic step. At most one caller
   * ever observes `consumed: true` for a given id.
   */
  tryConsume(id: string, ownerId: string, now: number): Promise<ConsumeResult>
  /** Removes every record with `expiresAt <= now`. Returns how many were removed. */
  evictExpired(now: number): Promise<number>
  readonly size: number
}

/**
 * In-process store. Each method body runs without yielding to the event loop
 * between its checks and its mutation, which makes it its own critical
 * section; the returned promise only defers delivery of the result.
 */
export class MemoryQuoteStore implements QuoteStore {
  private readonly quotes = new Map<string, QuoteRecord>()

  get size(): number {
    return this.quotes.size
  }

  async put(id: string, record: QuoteRecord): Promise<void> {
    if (this.quotes.has(id)) {
      throw new QuoteGateError(`Quote id already exists: ${id}`, {
        code: 'duplicate_id',
        details: { id },
      })
    }
    this.quotes.set(id, { ...record })
  }

  async get(id: string): Promise<QuoteRecord | undefined> {
    const record = this.quotes.get(id)
    return record ? { ...record } : undefined
  }

  async tryConsume(id: string, ownerId: string, now: number): Promise<ConsumeResult> {
    const record = this.quotes.get(id)

    if (!record) {
      return { consumed: false, reason: 'not_found' }
    }
    if (now >= record.expiresAt) {
      return { consumed: false, reason: 'expired' }
    }
    if (record.ownerId !== ownerId) {
      return { consumed: false, reason: 'owner_mismatch' }
    }
    if (record.consumed) {
      return { consumed: false, reason: 'already_consumed' }
    }

    const snapshot = { ...record }
    record.consumed = true
    return { consumed: true, quote: snapshot }
  }

  async evictExpired(now: number): Promise<number> {
    let evicted = 0
    for (const [id, record] of this.quotes) {
      if (record.expiresAt <= now) {
        this.quotes.delete(id)
        evicted++
      }
    }
    return evicted
  }
}
