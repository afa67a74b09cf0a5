import { isAddress, type Address } from 'viem'
import { z } from 'zod'
import {
  DEFAULT_QUOTE_TTL_SECONDS,
  DEFAULT_REAPER_INTERVAL_SECONDS,
  toBaseUnits,
  type Network,
  type PaymentRequirementsTemplate,
} from '@quotegate/core'
import { DEFAULT_FACILITATOR_URL, DEFAULT_TIMEOUT_MS } from '@quotegate/facilitator-client'

export interface TokenDeployment {
  address: Address
  decimals: number
  name: string
  version: string
}

export const USDC_DEPLOYMENTS: Record<Network, TokenDeployment> = {
  base: {
    address: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
    decimals: 6,
    name: 'USD Coin',
    version: '2',
  },
  'base-sepolia': {
    address: '0x036CbD53842c5426634e7929541eC2318f3dCF7e',
    decimals: 6,
    name: 'USDC',
    version: '2',
  },
}

// Longer delays overflow Node's 32-bit timer and fire immediately.
const MAX_TIMER_SECONDS = 2_147_483

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  BASE_URL: z.string().url().default('http://localhost:3001/'),
  FACILITATOR_URL: z.string().url().default(DEFAULT_FACILITATOR_URL),
  FACILITATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  PAY_TO: z.string().refine((value): value is Address => isAddress(value), 'must be an EVM address'),
  NETWORK: z.enum(['base', 'base-sepolia']).default('base-sepolia'),
  QUOTE_TTL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_QUOTE_TTL_SECONDS),
  QUOTE_REAPER_INTERVAL_SECONDS: z.coerce.number().positive().max(MAX_TIMER_SECONDS).default(DEFAULT_REAPER_INTERVAL_SECONDS),
  UNIT_PRICE: z.string().default('0.01'),
  NOMINAL_PRICE: z.string().default('0.01'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export interface AppConfig {
  port: number
  baseUrl: string
  facilitatorUrl: string
  facilitatorTimeoutMs: number
  payTo: Address
  network: Network
  quoteTtlSeconds: number
  reaperIntervalSeconds: number
  unitPrice: string
  nominalPrice: string
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL']
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${problems}`)
  }

  const vars = parsed.data
  const { decimals } = USDC_DEPLOYMENTS[vars.NETWORK]
  // Fail at startup rather than on the first quote.
  toBaseUnits(vars.UNIT_PRICE, decimals)
  toBaseUnits(vars.NOMINAL_PRICE, decimals)

  return {
    port: vars.PORT,
    baseUrl: vars.BASE_URL,
    facilitatorUrl: vars.FACILITATOR_URL,
    facilitatorTimeoutMs: vars.FACILITATOR_TIMEOUT_MS,
    payTo: vars.PAY_TO,
    network: vars.NETWORK,
    quoteTtlSeconds: vars.QUOTE_TTL_SECONDS,
    reaperIntervalSeconds: vars.QUOTE_REAPER_INTERVAL_SECONDS,
    unitPrice: vars.UNIT_PRICE,
    nominalPrice: vars.NOMINAL_PRICE,
    logLevel: vars.LOG_LEVEL,
  }
}

/** Static parts of the resource's price tag: token, payee and a nominal amount. */
export function paymentTemplates(config: AppConfig): PaymentRequirementsTemplate[] {
  const usdc = USDC_DEPLOYMENTS[config.network]
  return [
    {
      scheme: 'exact',
      network: config.network,
      maxAmountRequired: toBaseUnits(config.nominalPrice, usdc.decimals).toString(),
      description: 'Files priced by a single-use quote from POST /quote',
      mimeType: 'application/json',
      payTo: config.payTo,
      maxTimeoutSeconds: 300,
      asset: usdc.address,
      extra: { name: usdc.name, version: usdc.version },
      assetDecimals: usdc.decimals,
    },
  ]
}
