/**
 * Structured logging for the client and CLI, backed by pino.
 *
 * Everything is written to stderr: stdout belongs to command results. The
 * level comes from LOG_LEVEL unless a caller overrides it per logger.
 */

import pino from 'pino'
import { z } from 'zod'

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent'])
export type LogLevel = z.infer<typeof LogLevelSchema>

const isProduction = process.env.NODE_ENV === 'production'
const isTest = process.env.NODE_ENV === 'test'

/**
 * Read LOG_LEVEL, falling back to `info` when unset or unrecognised
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value)
  return parsed.success ? parsed.data : 'info'
}

const baseOptions: pino.LoggerOptions = {
  level: resolveLogLevel(process.env.LOG_LEVEL),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
}

const baseLogger =
  !isProduction && !isTest
    ? pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      })
    : pino(baseOptions, pino.destination(2))

type LogMethod = (message: string, data?: Record<string, unknown>) => void

export interface Logger {
  debug: LogMethod
  info: LogMethod
  warn: LogMethod
  error: LogMethod
}

export interface LoggerConfig {
  level?: LogLevel
  silent?: boolean
}

function method(logger: pino.Logger, level: keyof Logger): LogMethod {
  return (message, data) => {
    if (data) logger[level](data, message)
    else logger[level](message)
  }
}

/**
 * Child logger tagged with `service`
 */
export function createLogger(service: string, config: LoggerConfig = {}): Logger {
  const logger = baseLogger.child({ service })
  const level = config.silent ? 'silent' : config.level
  if (level) logger.level = level

  return {
    debug: method(logger, 'debug'),
    info: method(logger, 'info'),
    warn: method(logger, 'warn'),
    error: method(logger, 'error'),
  }
}

const loggers = new Map<string, Logger>()

/**
 * Shared logger for `service`, created on first use
 */
export function getLogger(service: string): Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/**
 * Forget cached loggers; the next getLogger call builds a fresh one
 */
export function clearLoggerCache(): void {
  loggers.clear()
}
