import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino'

export type { Logger } from 'pino'

export interface LoggerOptions {
  level?: LevelWithSilent
  name?: string
  destination?: DestinationStream
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? 'quotegate',
    level: options.level ?? 'info',
    redact: {
      paths: [
        'headers["x-payment"]',
        'req.headers["x-payment"]',
        'paymentPayload.payload.signature',
      ],
      censor: '[REDACTED]',
    },
  }
  return options.destination ? pino(settings, options.destination) : pino(settings)
}

export const silentLogger: Logger = pino({ level: 'silent' })
