import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/logging.js'

export type { Logger } from 'pino'

/**
 * Logs go to stderr (fd 2): stdout carries the feedback Alfred parses, and
 * Alfred's debugger shows whatever a script writes to stderr.
 */
export function createLogger(config: LoggingConfig): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: 2 } },
    })
  }

  return pino({ level: config.level }, pino.destination(2))
}
