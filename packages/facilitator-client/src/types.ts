import type { PaymentPayload, PaymentRequirements } from '@quotegate/core'

export interface VerifyRequest {
  x402Version: 1
  paymentPayload: PaymentPayload
  paymentRequirements: PaymentRequirements
}

export type SettleRequest = VerifyRequest

export interface VerifyResponse {
  isValid: boolean
  invalidReason?: string
  payer?: string
}

export interface SettleResponse {
  success: boolean
  errorReason?: string
  payer?: string
  transaction: string
  network: string
}

export interface SupportedResponse {
  kinds: Array<{
    x402Version: number
    scheme: string
    network: string
  }>
}
