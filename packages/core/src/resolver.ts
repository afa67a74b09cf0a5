import { toBaseUnits } from './amount.js'
import { silentLogger, type Logger } from './logger.js'
import type { QuoteStore } from './store.js'
import type { PaymentRequirements, PaymentRequirementsTemplate } from './types.js'

export const QUOTE_ID_HEADER = 'X-Quote-Id'
export const CLIENT_ID_HEADER = 'X-Client-Id'

/**
 * Owner used when a caller sends no client id. The client id header is an
 * unauthenticated placeholder for real caller identity: anyone can claim any
 * value, including this one.
 */
export const ANONYMOUS_CLIENT_ID = 'anonymous'

/** Case-insensitive header lookup; the web `Headers` class satisfies it. */
export interface HeaderReader {
  get(name: string): string | null | undefined
}

export interface ResolveRequest {
  headers: HeaderReader
  /** Request URL, absolute or path-relative. Only its path and query are used. */
  url: string | URL
  /** Unix seconds. */
  now: number
}

export type Resolution =
  | { kind: 'finalized'; requirements: PaymentRequirements[] }
  | { kind: 'payment_required'; accepts: PaymentRequirements[] }

/**
 * Given request context and a route's nominal terms, produces either finalized
 * terms for payment verification or a payment-required signal.
 */
export interface PaymentRequirementsResolver {
  resolve(
    request: ResolveRequest,
    templates: readonly PaymentRequirementsTemplate[]
  ): Promise<Resolution>
}

export interface QuoteRequirementsResolverOptions {
  store: QuoteStore
  baseUrl: string | URL
  quoteIdHeader?: string
  clientIdHeader?: string
  logger?: Logger
}

export function readHeader(headers: HeaderReader, name: string): string | undefined {
  const value = headers.get(name)?.trim()
  return value ? value : undefined
}

export function readClientId(headers: HeaderReader, name = CLIENT_ID_HEADER): string {
  return readHeader(headers, name) ?? ANONYMOUS_CLIENT_ID
}

/** Base URL with the request's path and query; any fragment is dropped. */
export function buildResourceUrl(baseUrl: string | URL, requestUrl: string | URL): string {
  const request = new URL(requestUrl, baseUrl)
  const resource = new URL(baseUrl)
  resource.pathname = request.pathname
  resource.search = request.search
  resource.hash = ''
  return resource.toString()
}

export function toPaymentRequirements(
  template: PaymentRequirementsTemplate,
  resource: string
): PaymentRequirements {
  const { assetDecimals: _assetDecimals, extra, ...requirements } = template
  // Copies `extra` so callers cannot reach into the route's template.
  return extra ? { ...requirements, resource, extra: { ...extra } } : { ...requirements, resource }
}

export class QuoteRequirementsResolver implements PaymentRequirementsResolver {
  private readonly store: QuoteStore
  private readonly baseUrl: URL
  private readonly quoteIdHeader: string
  private readonly clientIdHeader: string
  private readonly logger: Logger

  constructor(options: QuoteRequirementsResolverOptions) {
    this.store = options.store
    this.baseUrl = new URL(options.baseUrl)
    this.quoteIdHeader = options.quoteIdHeader ?? QUOTE_ID_HEADER
    this.clientIdHeader = options.clientIdHeader ?? CLIENT_ID_HEADER
    this.logger = (options.logger ?? silentLogger).child({ component: 'requirements-resolver' })
  }

  async resolve(
    request: ResolveRequest,
    templates: readonly PaymentRequirementsTemplate[]
  ): Promise<Resolution> {
    const resource = buildResourceUrl(this.baseUrl, request.url)
    const nominal = templates.map((template) => toPaymentRequirements(template, resource))

    const quoteId = readHeader(request.headers, this.quoteIdHeader)
    if (!quoteId) {
      this.logger.debug({ resource }, 'no quote presented')
      return { kind: 'payment_required', accepts: nominal }
    }

    const clientId = readClientId(request.headers, this.clientIdHeader)
    const result = await this.store.tryConsume(quoteId, clientId, request.now)

    // Every rejection answers with the same nominal terms; only the log
    // records which check failed.
    if (!result.consumed) {
      this.logger.debug({ quoteId, clientId, reason: result.reason, resource }, 'quote rejected')
      return { kind: 'payment_required', accepts: nominal }
    }

    const requirements = templates.map((template): PaymentRequirements => ({
      ...toPaymentRequirements(template, resource),
      scheme: 'exact',
      maxAmountRequired: toBaseUnits(result.quote.amount, template.assetDecimals).toString(),
    }))

    this.logger.info({ quoteId, clientId, amount: result.quote.amount, resource }, 'quote consumed')
    return { kind: 'finalized', requirements }
  }
}
