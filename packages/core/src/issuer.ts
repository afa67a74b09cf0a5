import { randomUUID } from 'node:crypto'
import { isQuoteGateError } from './errors.js'
import { silentLogger, type Logger } from './logger.js'
import type { QuoteStore } from './store.js'
import { systemClock, type Clock } from './types.js'

export const DEFAULT_QUOTE_TTL_SECONDS = 300

export interface IssuedQuote {
  quoteId: string
  amount: string
  expiresAt: number
}

export interface QuoteIssuerOptions {
  store: QuoteStore
  ttlSeconds?: number
  clock?: Clock
  generateId?: () => string
  logger?: Logger
}

function assertTtl(ttl: number): number {
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new RangeError(`Quote TTL must be a positive number of seconds, got ${ttl}`)
  }
  return ttl
}

export class QuoteIssuer {
  readonly ttlSeconds: number
  private readonly store: QuoteStore
  private readonly clock: Clock
  private readonly generateId: () => string
  private readonly logger: Logger

  constructor(options: QuoteIssuerOptions) {
    this.store = options.store
    this.ttlSeconds = assertTtl(options.ttlSeconds ?? DEFAULT_QUOTE_TTL_SECONDS)
    this.clock = options.clock ?? systemClock
    this.generateId = options.generateId ?? randomUUID
    this.logger = (options.logger ?? silentLogger).child({ component: 'quote-issuer' })
  }

  async issue(amount: string, ownerId: string, ttlSeconds = this.ttlSeconds): Promise<IssuedQuote> {
    const expiresAt = this.clock() + assertTtl(ttlSeconds)
    const record = { amount, ownerId, expiresAt, consumed: false }

    let quoteId = this.generateId()
    try {
      await this.store.put(quoteId, record)
    } catch (error) {
      if (!isQuoteGateError(error, 'duplicate_id')) {
        throw error
      }
      // A second collision means the id source is broken; let it propagate.
      this.logger.warn({ quoteId }, 'quote id collision, regenerating')
      quoteId = this.generateId()
      await this.store.put(quoteId, record)
    }

    this.logger.info({ quoteId, ownerId, amount, expiresAt }, 'quote issued')
    return { quoteId, amount, expiresAt }
  }
}
