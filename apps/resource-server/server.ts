import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { z } from 'zod'
import {
  ExpiryReaper,
  MemoryQuoteStore,
  QuoteIssuer,
  QuoteRequirementsResolver,
  isQuoteGateError,
  perUnitPricing,
  readClientId,
  silentLogger,
  systemClock,
  type Clock,
  type Logger,
  type QuoteStore,
} from '@quotegate/core'
import {
  FacilitatorClientError,
  type Facilitator,
  type FacilitatorClient,
} from '@quotegate/facilitator-client'
import { USDC_DEPLOYMENTS, paymentTemplates, type AppConfig } from './config.js'
import { PAYMENT_RESPONSE_HEADER, paymentMiddleware } from './payment.js'

const MAX_FILES_PER_QUOTE = 1_000_000

const quoteRequestSchema = z.object({
  number_of_files: z.number().int().positive().max(MAX_FILES_PER_QUOTE),
})

export interface ResourceServerOptions {
  facilitator: Facilitator
  store?: QuoteStore
  clock?: Clock
  generateId?: () => string
  logger?: Logger
}

export interface ResourceServer {
  app: Hono
  store: QuoteStore
  issuer: QuoteIssuer
  reaper: ExpiryReaper
}

export function createResourceServer(config: AppConfig, options: ResourceServerOptions): ResourceServer {
  const logger = options.logger ?? silentLogger
  const clock = options.clock ?? systemClock
  const store = options.store ?? new MemoryQuoteStore()
  const { decimals } = USDC_DEPLOYMENTS[config.network]
  const pricing = perUnitPricing({ unitPrice: config.unitPrice, decimals })

  const issuer = new QuoteIssuer({
    store,
    ttlSeconds: config.quoteTtlSeconds,
    clock,
    generateId: options.generateId,
    logger,
  })
  const resolver = new QuoteRequirementsResolver({ store, baseUrl: config.baseUrl, logger })
  const reaper = new ExpiryReaper({
    store,
    intervalSeconds: config.reaperIntervalSeconds,
    clock,
    logger,
  })

  const app = new Hono()

  app.use('/*', cors({ origin: '*', exposeHeaders: [PAYMENT_RESPONSE_HEADER] }))

  // Rejection details and internal faults never reach the client.
  app.onError((err, c) => {
    if (err instanceof FacilitatorClientError) {
      logger.error({ err, path: err.path, code: err.code }, 'facilitator request failed')
      return c.json({ error: 'facilitator_unavailable' }, 502)
    }
    if (isQuoteGateError(err)) {
      logger.error({ err, code: err.code }, 'quote processing failed')
    } else {
      logger.error({ err }, 'unhandled error')
    }
    return c.json({ error: 'internal_error' }, 500)
  })

  app.get('/health', (c) => {
    return c.json({ status: 'healthy', quotes: store.size })
  })

  app.post('/quote', async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: 'invalid_request' }, 400)
    }
    const parsed = quoteRequestSchema.safeParse(body)
    if (!parsed.success) {
      return c.json({ error: 'invalid_request' }, 400)
    }

    const ownerId = readClientId(c.req.raw.headers)
    const amount = pricing.price(parsed.data.number_of_files)
    const quote = await issuer.issue(amount, ownerId)

    return c.json({ quote_id: quote.quoteId, amount: quote.amount })
  })

  app.get(
    '/resource',
    paymentMiddleware({
      resolver,
      templates: paymentTemplates(config),
      facilitator: options.facilitator,
      clock,
      logger,
    }),
    (c) => c.json({ ok: true })
  )

  return { app, store, issuer, reaper }
}

/**
 * Asks the facilitator whether it settles exact payments on the configured
 * network. Unreachable facilitators are reported, not fatal.
 */
export async function checkFacilitatorSupport(
  facilitator: Pick<FacilitatorClient, 'supported'>,
  config: Pick<AppConfig, 'network'>,
  logger: Logger = silentLogger
): Promise<boolean> {
  try {
    const { kinds } = await facilitator.supported()
    const supported = kinds.some((kind) => kind.scheme === 'exact' && kind.network === config.network)
    if (!supported) {
      logger.warn({ network: config.network, kinds }, 'facilitator does not list the configured network')
    }
    return supported
  } catch (error) {
    logger.warn({ err: error, network: config.network }, 'facilitator /supported check failed')
    return false
  }
}
