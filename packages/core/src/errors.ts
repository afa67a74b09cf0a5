export type QuoteGateErrorCode =
  | 'invalid_amount'
  | 'duplicate_id'

export class QuoteGateError extends Error {
  readonly code: QuoteGateErrorCode
  readonly details?: unknown

  constructor(
    message: string,
    options: {
      code: QuoteGateErrorCode
      details?: unknown
      cause?: unknown
    }
  ) {
    super(message, { cause: options.cause })
    this.name = 'QuoteGateError'
    this.code = options.code
    this.details = options.details
  }
}

export function isQuoteGateError(error: unknown, code?: QuoteGateErrorCode): error is QuoteGateError {
  return error instanceof QuoteGateError && (code === undefined || error.code === code)
}
