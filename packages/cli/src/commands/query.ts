/**
 * Read-only node queries
 */

import { identityToJson } from '@evmkit/client'
import { formatEth, toJson } from '@evmkit/shared'
import type { Command } from 'commander'
import type { CliContext } from '../context'
import {
  BalanceOptionsSchema,
  BlockNumberSchema,
  GlobalOptionsSchema,
  StateQueryOptionsSchema,
  validate,
} from '../schemas'

export function registerQueryCommands(program: Command, ctx: CliContext): void {
  program
    .command('balance')
    .description('Show the balance of an account')
    .argument('<address>', 'Account address')
    .option('-b, --block <number>', 'Block number (default: latest)')
    .option('--wei', 'Print the raw amount in wei')
    .action(async (address: string, _options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), BalanceOptionsSchema, 'options')
      const balance = await ctx.connect(options).getBalance(address, options.block)
      ctx.print(options.wei ? balance.toString() : formatEth(balance))
    })

  program
    .command('code')
    .description('Show the bytecode deployed at an address')
    .argument('<address>', 'Contract address')
    .option('-b, --block <number>', 'Block number (default: latest)')
    .action(async (address: string, _options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), StateQueryOptionsSchema, 'options')
      ctx.print(await ctx.connect(options).getCode(address, options.block))
    })

  program
    .command('block')
    .description('Show a block with its transactions')
    .argument('[number]', 'Block number (default: latest)')
    .action(async (number: string | undefined, _options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), GlobalOptionsSchema, 'options')
      const blockNumber = validate(number, BlockNumberSchema.optional(), 'block number')
      ctx.print(toJson(await ctx.connect(options).getBlockByNumber(blockNumber)))
    })

  program
    .command('tx')
    .description('Show a transaction and whether it is still pending')
    .argument('<hash>', 'Transaction hash')
    .action(async (hash: string, _options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), GlobalOptionsSchema, 'options')
      const { transaction, isPending } = await ctx.connect(options).getTransactionByHash(hash)
      ctx.print(toJson({ ...transaction, pending: isPending }))
    })

  program
    .command('id')
    .description('Show the network ID, chain ID and genesis hash')
    .action(async (_options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), GlobalOptionsSchema, 'options')
      ctx.print(toJson(identityToJson(await ctx.connect(options).getID())))
    })

  program
    .command('snapshot')
    .description('Show the clique signer snapshot at the latest block')
    .action(async (_options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), GlobalOptionsSchema, 'options')
      ctx.print(toJson(await ctx.connect(options).getSnapshot()))
    })
}
