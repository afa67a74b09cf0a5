import { formatUnits, parseUnits } from 'viem'
import { QuoteGateError } from './errors.js'

const MONEY_RE = /^\$?(\d+)(?:\.(\d+))?$/

/**
 * Converts a human-readable money amount ("0.05", "$1.25") into the token's
 * smallest unit. Amounts with more fractional digits than the token carries
 * are rejected instead of rounded.
 */
export function toBaseUnits(amount: string, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new QuoteGateError(`Invalid token decimals: ${decimals}`, {
      code: 'invalid_amount',
      details: { amount, decimals },
    })
  }

  const match = MONEY_RE.exec(amount.trim())
  if (!match) {
    throw new QuoteGateError(`Invalid money amount: "${amount}"`, {
      code: 'invalid_amount',
      details: { amount, decimals },
    })
  }

  const whole = match[1] ?? '0'
  const fraction = match[2] ?? ''
  if (fraction.length > decimals) {
    throw new QuoteGateError(
      `Money amount "${amount}" exceeds token precision of ${decimals} decimals`,
      { code: 'invalid_amount', details: { amount, decimals } }
    )
  }

  return parseUnits(fraction ? `${whole}.${fraction}` : whole, decimals)
}

export function formatMoney(baseUnits: bigint, decimals: number): string {
  return formatUnits(baseUnits, decimals)
}
