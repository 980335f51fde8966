/**
 * CLI logger: diagnostics go to stderr so command output stays pipeable
 */

import { createLogger, type Logger, type LogLevel } from '@evmkit/shared'

export interface LoggerOptions {
  verbose?: boolean
  silent?: boolean
}

function levelFor(options: LoggerOptions): LogLevel | undefined {
  if (options.silent) return 'silent'
  if (options.verbose) return 'debug'
  return undefined
}

export class CliLogger {
  private current: Logger = createLogger('cli')

  configure(options: LoggerOptions): void {
    this.current = createLogger('cli', { level: levelFor(options) })
  }

  get logger(): Logger {
    return this.current
  }
}
