import { describe, it, expect } from 'vitest'
import { createLogger } from './index.js'

describe('createLogger', () => {
  it('creates logger with specified level', () => {
    const logger = createLogger({ level: 'debug', pretty: false })
    expect(logger.level).toBe('debug')
  })

  it('uses pino-pretty when pretty: true', () => {
    // pino-pretty runs in a worker thread, so only the logger itself is
    // inspectable here.
    const logger = createLogger({ level: 'info', pretty: true })
    expect(logger).toBeDefined()
    expect(logger.level).toBe('info')
  })

  it('logger has standard pino methods', () => {
    const logger = createLogger({ level: 'info', pretty: false })

    expect(typeof logger.info).toBe('function')
    expect(typeof logger.error).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.child).toBe('function')
  })

  it('child loggers inherit the level', () => {
    const logger = createLogger({ level: 'warn', pretty: false })
    const child = logger.child({ action: 'search' })
    expect(child.level).toBe('warn')
  })
})
