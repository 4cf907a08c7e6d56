/**
 * Logger Utility
 *
 * pino logger, pretty-printed for interactive development runs.
 */

import { pino, type Logger } from 'pino'

const env = process.env.NODE_ENV
const isProduction = env === 'production'
const isTest = env === 'test'
const isPretty = !isProduction && !isTest

function defaultLevel(): string {
  if (isProduction) return 'info'
  if (isTest) return 'silent'
  return 'debug'
}

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  transport: isPretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): Logger {
  return baseLogger
}
