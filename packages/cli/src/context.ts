import { getClient, type RpcClient } from '@evmkit/client'
import { type Env, resolveRpcUrl } from '@evmkit/config'
import type { Logger } from '@evmkit/shared'
import { CliLogger, type LoggerOptions } from './lib/logger'
import type { GlobalOptions } from './schemas'

export interface CliOutput {
  /** Command results, one line at a time */
  out: (line: string) => void
  /** Notices that are not part of the result */
  err: (line: string) => void
}

export type Connect = (rpcUrl: string, logger: Logger) => RpcClient

export interface CliDeps {
  env?: Env
  output?: CliOutput
  connect?: Connect
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

const defaultConnect: Connect = (rpcUrl, logger) => getClient(rpcUrl, { logger })

/**
 * State shared by every command of one program instance
 */
export class CliContext {
  readonly env: Env
  readonly output: CliOutput
  private readonly connectTo: Connect
  private readonly cliLogger = new CliLogger()

  constructor(deps: CliDeps = {}) {
    this.env = deps.env ?? process.env
    this.output = deps.output ?? consoleOutput
    this.connectTo = deps.connect ?? defaultConnect
  }

  get logger(): Logger {
    return this.cliLogger.logger
  }

  configureLogging(options: LoggerOptions): void {
    this.cliLogger.configure(options)
  }

  print(line: string): void {
    this.output.out(line)
  }

  rpcUrl(options: GlobalOptions): string {
    return resolveRpcUrl({ rpcUrl: options.rpcUrl, network: options.network }, this.env)
  }

  connect(options: GlobalOptions): RpcClient {
    const url = this.rpcUrl(options)
    this.logger.debug('Connecting', { url })
    return this.connectTo(url, this.logger)
  }

  /**
   * Run `task` with a signal that aborts on Ctrl-C
   */
  async interruptible<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController()
    const onInterrupt = () => controller.abort(new Error('Interrupted'))
    process.once('SIGINT', onInterrupt)
    try {
      return await task(controller.signal)
    } finally {
      process.off('SIGINT', onInterrupt)
    }
  }
}
