import { pathToFileURL } from 'node:url'
import { serve } from '@hono/node-server'
import { config as loadDotenv } from 'dotenv'
import { createLogger } from '@quotegate/core'
import { createFacilitatorClient } from '@quotegate/facilitator-client'
import { loadConfig } from './config.js'
import { checkFacilitatorSupport, createResourceServer } from './server.js'

function isMainModule(): boolean {
  if (!process.argv[1]) {
    return false
  }
  return import.meta.url === pathToFileURL(process.argv[1]).href
}

export async function start(): Promise<void> {
  loadDotenv()
  const config = loadConfig()
  const logger = createLogger({ level: config.logLevel })

  const facilitator = createFacilitatorClient({
    baseUrl: config.facilitatorUrl,
    timeoutMs: config.facilitatorTimeoutMs,
  })
  await checkFacilitatorSupport(facilitator, config, logger)

  const { app, reaper } = createResourceServer(config, { facilitator, logger })
  reaper.start()

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port, network: config.network, baseUrl: config.baseUrl }, 'listening')
  })

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down')
    reaper.stop()
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, 'server close failed')
        process.exit(1)
      }
      process.exit(0)
    })
  }

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

if (isMainModule()) {
  start().catch((error) => {
    const message = error instanceof Error ? error.stack ?? error.message : String(error)
    console.error(message)
    process.exit(1)
  })
}

export { createResourceServer, checkFacilitatorSupport } from './server.js'
export type { ResourceServer, ResourceServerOptions } from './server.js'
export { loadConfig, paymentTemplates, USDC_DEPLOYMENTS } from './config.js'
export type { AppConfig, TokenDeployment } from './config.js'
export { paymentMiddleware, decodePaymentHeader, encodePaymentHeader } from './payment.js'
export type { PaymentMiddlewareOptions } from './payment.js'
