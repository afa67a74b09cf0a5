import { z } from 'zod'
import type {
  SettleRequest,
  SettleResponse,
  SupportedResponse,
  VerifyRequest,
  VerifyResponse,
} from './types.js'

export type FacilitatorClientErrorCode =
  | 'timeout'
  | 'http_error'
  | 'network_error'
  | 'invalid_response'

export interface FacilitatorClientOptions {
  baseUrl?: string
  timeoutMs?: number
  fetchImpl?: typeof fetch
}

export class FacilitatorClientError extends Error {
  readonly code: FacilitatorClientErrorCode
  readonly path: string
  readonly status?: number
  readonly details?: unknown

  constructor(
    message: string,
    options: {
      code: FacilitatorClientErrorCode
      path: string
      status?: number
      details?: unknown
    }
  ) {
    super(message)
    this.name = 'FacilitatorClientError'
    this.code = options.code
    this.path = options.path
    this.status = options.status
    this.details = options.details
  }
}

/** What the payment middleware needs from a facilitator. */
export interface Facilitator {
  verify(request: VerifyRequest): Promise<VerifyResponse>
  settle(request: SettleRequest): Promise<SettleResponse>
}

export const DEFAULT_FACILITATOR_URL = 'https://facilitator.x402.rs'
export const DEFAULT_TIMEOUT_MS = 10_000

const verifyResponseSchema: z.ZodType<VerifyResponse> = z.object({
  isValid: z.boolean(),
  invalidReason: z.string().optional(),
  payer: z.string().optional(),
})

const settleResponseSchema: z.ZodType<SettleResponse> = z.object({
  success: z.boolean(),
  errorReason: z.string().optional(),
  payer: z.string().optional(),
  transaction: z.string(),
  network: z.string(),
})

const supportedResponseSchema: z.ZodType<SupportedResponse> = z.object({
  kinds: z.array(z.object({
    x402Version: z.number(),
    scheme: z.string(),
    network: z.string(),
  })),
})

export class FacilitatorClient implements Facilitator {
  readonly baseUrl: string
  readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: FacilitatorClientOptions = {}) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? DEFAULT_FACILITATOR_URL)

    const timeout = Number(options.timeoutMs ?? DEFAULT_TIMEOUT_MS)
    this.timeoutMs = Number.isFinite(timeout) && timeout > 0
      ? timeout
      : DEFAULT_TIMEOUT_MS

    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async verify(request: VerifyRequest): Promise<VerifyResponse> {
    return this.request('/verify', verifyResponseSchema, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(request),
    })
  }

  async settle(request: SettleRequest): Promise<SettleResponse> {
    return this.request('/settle', settleResponseSchema, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(request),
    })
  }

  async supported(): Promise<SupportedResponse> {
    return this.request('/supported', supportedResponseSchema)
  }

  private async request<T>(path: string, schema: z.ZodType<T>, init: RequestInit = {}): Promise<T> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        signal: controller.signal,
      })

      const rawBody = await response.text()
      const parsed = parseJson(rawBody)

      if (!response.ok) {
        throw new FacilitatorClientError(
          `Facilitator request failed (${response.status}) at ${path}`,
          {
            code: 'http_error',
            path,
            status: response.status,
            details: parsed,
          }
        )
      }

      const result = schema.safeParse(parsed)
      if (!result.success) {
        throw new FacilitatorClientError(
          `Unexpected facilitator response at ${path}`,
          { code: 'invalid_response', path, details: rawBody }
        )
      }

      return result.data
    } catch (error) {
      if (error instanceof FacilitatorClientError) {
        throw error
      }

      if (isAbortError(error)) {
        throw new FacilitatorClientError(
          `Facilitator request timed out after ${this.timeoutMs}ms at ${path}`,
          { code: 'timeout', path }
        )
      }

      throw new FacilitatorClientError(
        `Facilitator request failed due to network error at ${path}`,
        {
          code: 'network_error',
          path,
          details: error,
        }
      )
    } finally {
      clearTimeout(timeout)
    }
  }
}

export function createFacilitatorClient(options: FacilitatorClientOptions = {}): FacilitatorClient {
  return new FacilitatorClient(options)
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl
}

function parseJson(raw: string): unknown {
  if (!raw.trim()) {
    return undefined
  }

  try {
    return JSON.parse(raw)
  } catch {
    return raw
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

export type {
  SettleRequest,
  SettleResponse,
  SupportedResponse,
  VerifyRequest,
  VerifyResponse,
} from './types.js'
