import type { Context, MiddlewareHandler } from 'hono'
import { z } from 'zod'
import {
  silentLogger,
  systemClock,
  type Clock,
  type Logger,
  type PaymentPayload,
  type PaymentRequiredBody,
  type PaymentRequirements,
  type PaymentRequirementsResolver,
  type PaymentRequirementsTemplate,
} from '@quotegate/core'
import type { Facilitator, VerifyRequest } from '@quotegate/facilitator-client'

export const PAYMENT_HEADER = 'X-PAYMENT'
export const PAYMENT_RESPONSE_HEADER = 'X-PAYMENT-RESPONSE'

const paymentPayloadSchema: z.ZodType<PaymentPayload> = z.object({
  x402Version: z.literal(1),
  scheme: z.literal('exact'),
  network: z.enum(['base', 'base-sepolia']),
  payload: z.object({
    signature: z.string(),
    authorization: z.object({
      from: z.string(),
      to: z.string(),
      value: z.string(),
      validAfter: z.string(),
      validBefore: z.string(),
      nonce: z.string(),
    }),
  }),
})

export interface PaymentMiddlewareOptions {
  resolver: PaymentRequirementsResolver
  templates: readonly PaymentRequirementsTemplate[]
  facilitator: Facilitator
  clock?: Clock
  logger?: Logger
}

/** Decodes the base64 JSON X-PAYMENT header. Returns undefined when malformed. */
export function decodePaymentHeader(header: string): PaymentPayload | undefined {
  let json: unknown
  try {
    json = JSON.parse(Buffer.from(header, 'base64').toString('utf-8'))
  } catch {
    return undefined
  }
  const parsed = paymentPayloadSchema.safeParse(json)
  return parsed.success ? parsed.data : undefined
}

export function encodePaymentHeader(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf-8').toString('base64')
}

function paymentRequiredBody(error: string, accepts: PaymentRequirements[]): PaymentRequiredBody {
  return { x402Version: 1, error, accepts }
}

function paymentRequired(c: Context, error: string, accepts: PaymentRequirements[]): Response {
  return c.json(paymentRequiredBody(error, accepts), 402)
}

/**
 * Gates a route behind x402 payment. Requirements come from the resolver, so
 * a caller holding a valid quote is asked for the quoted amount and everyone
 * else for the nominal one. Payment proofs are verified before the handler
 * runs and settled only after it succeeds.
 */
export function paymentMiddleware(options: PaymentMiddlewareOptions): MiddlewareHandler {
  const clock = options.clock ?? systemClock
  const logger = (options.logger ?? silentLogger).child({ component: 'payment-middleware' })

  return async (c, next) => {
    const resolution = await options.resolver.resolve(
      { headers: c.req.raw.headers, url: c.req.url, now: clock() },
      options.templates
    )

    if (resolution.kind === 'payment_required') {
      return paymentRequired(c, 'X-PAYMENT header is required', resolution.accepts)
    }

    const accepts = resolution.requirements
    const header = c.req.header(PAYMENT_HEADER)
    if (!header) {
      return paymentRequired(c, 'X-PAYMENT header is required', accepts)
    }

    const payment = decodePaymentHeader(header)
    if (!payment) {
      return paymentRequired(c, 'Invalid X-PAYMENT header', accepts)
    }

    const paymentRequirements = accepts.find(
      (requirements) => requirements.scheme === payment.scheme && requirements.network === payment.network
    )
    if (!paymentRequirements) {
      return paymentRequired(c, 'No matching payment requirements', accepts)
    }

    const request: VerifyRequest = {
      x402Version: 1,
      paymentPayload: payment,
      paymentRequirements,
    }

    const verification = await options.facilitator.verify(request)
    if (!verification.isValid) {
      logger.info(
        { reason: verification.invalidReason, payer: verification.payer, resource: paymentRequirements.resource },
        'payment rejected by facilitator'
      )
      return paymentRequired(c, verification.invalidReason ?? 'Payment verification failed', accepts)
    }

    await next()

    if (c.res.status >= 400) {
      return
    }

    const settlement = await options.facilitator.settle(request)
    if (!settlement.success) {
      logger.warn(
        { reason: settlement.errorReason, payer: settlement.payer, resource: paymentRequirements.resource },
        'payment settlement failed'
      )
      c.res = new Response(
        JSON.stringify(paymentRequiredBody(settlement.errorReason ?? 'Payment settlement failed', accepts)),
        { status: 402, headers: { 'content-type': 'application/json' } }
      )
      return
    }

    logger.info(
      { payer: settlement.payer, transaction: settlement.transaction, resource: paymentRequirements.resource },
      'payment settled'
    )
    c.res.headers.set(PAYMENT_RESPONSE_HEADER, encodePaymentHeader(settlement))
  }
}
