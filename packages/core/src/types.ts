import type { Address } from 'viem'

export type Network = 'base' | 'base-sepolia'

export type Scheme = 'exact'

/**
 * x402 v1 payment requirement as served in a 402 body and sent to the
 * facilitator. `maxAmountRequired` is in the asset's smallest unit.
 */
export interface PaymentRequirements {
  scheme: Scheme
  network: Network
  maxAmountRequired: string
  resource: string
  description: string
  mimeType: string
  outputSchema?: Record<string, unknown>
  payTo: Address
  maxTimeoutSeconds: number
  asset: Address
  extra?: {
    name?: string
    version?: string
  }
}

/**
 * Route-level requirement lacking a resource URL. `assetDecimals` is used to
 * convert quoted money amounts and is never serialized.
 */
export interface PaymentRequirementsTemplate extends Omit<PaymentRequirements, 'resource'> {
  assetDecimals: number
}

export interface Authorization {
  from: string
  to: string
  value: string
  validAfter: string
  validBefore: string
  nonce: string
}

export interface PaymentPayload {
  x402Version: 1
  scheme: Scheme
  network: Network
  payload: {
    signature: string
    authorization: Authorization
  }
}

export interface PaymentRequiredBody {
  x402Version: 1
  error: string
  accepts: PaymentRequirements[]
}

export interface QuoteRecord {
  /** Decimal money amount as issued, e.g. "0.05". */
  amount: string
  ownerId: string
  /** Unix seconds. The record is invalid from this instant on. */
  expiresAt: number
  consumed: boolean
}

export type QuoteRejectionReason =
  | 'not_found'
  | 'expired'
  | 'owner_mismatch'
  | 'already_consumed'

export type ConsumeResult =
  | { consumed: true; quote: QuoteRecord }
  | { consumed: false; reason: QuoteRejectionReason }

/** Returns the current time in unix seconds. */
export type Clock = () => number

export const systemClock: Clock = () => Math.floor(Date.now() / 1000)
