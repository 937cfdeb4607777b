import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/store-config.js'

export type { Logger } from 'pino'

/** File descriptor 2; stdout carries command output. */
const STDERR = 2

export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: STDERR } },
    })
  }
  return pino({ level: config.level }, pino.destination(STDERR))
}
