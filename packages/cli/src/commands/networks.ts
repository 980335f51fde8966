import { DEFAULT_NETWORK, listNetworks, resolveRpcUrl } from '@evmkit/config'
import { toJson } from '@evmkit/shared'
import chalk from 'chalk'
import type { Command } from 'commander'
import type { CliContext } from '../context'
import { GlobalOptionsSchema, NetworksOptionsSchema, validate } from '../schemas'

export function registerNetworkCommands(program: Command, ctx: CliContext): void {
  program
    .command('networks')
    .description('List known networks and their RPC endpoints')
    .option('--json', 'Print as JSON')
    .action((_options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), NetworksOptionsSchema, 'options')
      const networks = listNetworks()

      if (options.json) {
        ctx.print(toJson(networks))
        return
      }

      const width = Math.max(...networks.map((n) => n.name.length))
      for (const network of networks) {
        const marker = network.name === DEFAULT_NETWORK ? chalk.dim(' (default)') : ''
        ctx.print(`${chalk.cyan(network.name.padEnd(width))}  ${network.rpcUrl}${marker}`)
      }
    })

  program
    .command('url')
    .description('Print the RPC endpoint commands would connect to')
    .argument('[network]', 'Network name; ignores --rpc-url and WEB3_RPC_URL when given')
    .action((network: string | undefined, _options: unknown, command: Command) => {
      if (network !== undefined) {
        ctx.print(resolveRpcUrl({ network }, {}))
        return
      }
      const options = validate(command.optsWithGlobals(), GlobalOptionsSchema, 'options')
      ctx.print(ctx.rpcUrl(options))
    })
}
