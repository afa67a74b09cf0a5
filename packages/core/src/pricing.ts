import { formatMoney, toBaseUnits } from './amount.js'

/** Turns a priced request into a money amount string. */
export interface PricingPolicy<TRequest> {
  price(request: TRequest): string
}

export interface PerUnitPricingOptions {
  unitPrice: string
  decimals: number
}

/**
 * Price = quantity * unitPrice, computed in base units so that
 * 3 * "0.01" is exactly "0.03".
 */
export function perUnitPricing(options: PerUnitPricingOptions): PricingPolicy<number> {
  const unit = toBaseUnits(options.unitPrice, options.decimals)

  return {
    price(quantity: number): string {
      if (!Number.isSafeInteger(quantity) || quantity < 0) {
        throw new RangeError(`Quantity must be a non-negative integer, got ${quantity}`)
      }
      return formatMoney(unit * BigInt(quantity), options.decimals)
    },
  }
}
