export { MemoryQuoteStore } from './store.js'
export type { QuoteStore } from './store.js'

export { QuoteIssuer, DEFAULT_QUOTE_TTL_SECONDS } from './issuer.js'
export type { IssuedQuote, QuoteIssuerOptions } from './issuer.js'

export {
  QuoteRequirementsResolver,
  QUOTE_ID_HEADER,
  CLIENT_ID_HEADER,
  ANONYMOUS_CLIENT_ID,
  buildResourceUrl,
  readClientId,
  readHeader,
  toPaymentRequirements,
} from './resolver.js'
export type {
  HeaderReader,
  PaymentRequirementsResolver,
  QuoteRequirementsResolverOptions,
  Resolution,
  ResolveRequest,
} from './resolver.js'

export { ExpiryReaper, DEFAULT_REAPER_INTERVAL_SECONDS } from './reaper.js'
export type { ExpiryReaperOptions } from './reaper.js'

export { toBaseUnits, formatMoney } from './amount.js'
export { perUnitPricing } from './pricing.js'
export type { PerUnitPricingOptions, PricingPolicy } from './pricing.js'

export { QuoteGateError, isQuoteGateError } from './errors.js'
export type { QuoteGateErrorCode } from './errors.js'

export { createLogger, silentLogger } from './logger.js'
export type { Logger, LoggerOptions } from './logger.js'

export { systemClock } from './types.js'
export type {
  Authorization,
  Clock,
  ConsumeResult,
  Network,
  PaymentPayload,
  PaymentRequiredBody,
  PaymentRequirements,
  PaymentRequirementsTemplate,
  QuoteRecord,
  QuoteRejectionReason,
  Scheme,
} from './types.js'
