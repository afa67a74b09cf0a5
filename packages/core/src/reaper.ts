import { silentLogger, type Logger } from './logger.js'
import type { QuoteStore } from './store.js'
import { systemClock, type Clock } from './types.js'

export const DEFAULT_REAPER_INTERVAL_SECONDS = 60

export interface ExpiryReaperOptions {
  store: QuoteStore
  intervalSeconds?: number
  clock?: Clock
  logger?: Logger
}

/**
 * Periodically purges expired quotes. The timer is unref'd, so a running
 * reaper never keeps the process alive on its own.
 */
export class ExpiryReaper {
  readonly intervalSeconds: number
  private readonly store: QuoteStore
  private readonly clock: Clock
  private readonly logger: Logger
  private timer: NodeJS.Timeout | undefined

  constructor(options: ExpiryReaperOptions) {
    const interval = options.intervalSeconds ?? DEFAULT_REAPER_INTERVAL_SECONDS
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new RangeError(`Reaper interval must be a positive number of seconds, got ${interval}`)
    }

    this.store = options.store
    this.intervalSeconds = interval
    this.clock = options.clock ?? systemClock
    this.logger = (options.logger ?? silentLogger).child({ component: 'expiry-reaper' })
  }

  get running(): boolean {
    return this.timer !== undefined
  }

  start(): void {
    if (this.timer) {
      return
    }
    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error({ err: error }, 'expired quote sweep failed')
      })
    }, this.intervalSeconds * 1000)
    this.timer.unref()
    this.logger.debug({ intervalSeconds: this.intervalSeconds }, 'expiry reaper started')
  }

  stop(): void {
    if (!this.timer) {
      return
    }
    clearInterval(this.timer)
    this.timer = undefined
    this.logger.debug('expiry reaper stopped')
  }

  /** Runs a single eviction pass. */
  async sweep(): Promise<number> {
    const now = this.clock()
    const evicted = await this.store.evictExpired(now)
    if (evicted > 0) {
      this.logger.debug({ evicted, remaining: this.store.size }, 'evicted expired quotes')
    }
    return evicted
  }
}
