/**
 * Contract deployment and receipt polling
 */

import { existsSync, readFileSync } from 'node:fs'
import {
  DEFAULT_DEPLOY_GAS,
  RECEIPT_MAX_RETRIES,
  RECEIPT_POLL_INTERVAL_MS,
  type RpcClient,
} from '@evmkit/client'
import { formatGasPrice, toJson } from '@evmkit/shared'
import chalk from 'chalk'
import type { Command } from 'commander'
import type { TransactionReceipt } from 'viem'
import type { CliContext } from '../context'
import { DeployOptionsSchema, ReceiptOptionsSchema, validate } from '../schemas'

/**
 * Bytecode given inline, or read from a file such as `solc --bin` output
 */
export function readBytecode(source: string): string {
  if (source.startsWith('0x') || !existsSync(source)) return source
  const contents = readFileSync(source, 'utf-8').trim()
  return contents.startsWith('0x') ? contents : `0x${contents}`
}

function describeReceipt(receipt: TransactionReceipt): string {
  const status =
    receipt.status === 'success' ? chalk.green(receipt.status) : chalk.red(receipt.status)
  return `${chalk.dim('Status:')} ${status} (block ${receipt.blockNumber})`
}

async function waitFor(
  ctx: CliContext,
  client: RpcClient,
  hash: string,
  options: { retries?: number; interval?: number },
): Promise<TransactionReceipt> {
  return ctx.interruptible((signal) =>
    client.waitForReceipt(hash, {
      signal,
      retries: options.retries,
      intervalMs: options.interval,
    }),
  )
}

export function registerDeployCommands(program: Command, ctx: CliContext): void {
  program
    .command('deploy')
    .description('Deploy a contract from its creation bytecode')
    .argument('<bytecode>', '0x-prefixed bytecode, or a file containing it')
    .option('-k, --private-key <key>', 'Signing key (default: WEB3_PRIVATE_KEY)')
    .option('--gas <limit>', `Gas limit (default: ${DEFAULT_DEPLOY_GAS})`)
    .option('--chain-id <id>', 'Sign with EIP-155 replay protection for this chain')
    .option('-w, --wait', 'Wait for the receipt')
    .option('--retries <count>', `Receipt retries (default: ${RECEIPT_MAX_RETRIES})`)
    .option('--interval <ms>', `Delay between receipt lookups (default: ${RECEIPT_POLL_INTERVAL_MS})`)
    .action(async (bytecode: string, _options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), DeployOptionsSchema, 'options')
      const privateKey = options.privateKey ?? ctx.env.WEB3_PRIVATE_KEY
      if (!privateKey) {
        throw new Error('Missing private key: pass --private-key or set WEB3_PRIVATE_KEY')
      }

      const client = ctx.connect(options)
      const deployed = await client.deployContract(privateKey, readBytecode(bytecode), {
        gas: options.gas,
        chainId: options.chainId,
      })

      ctx.print(`${chalk.dim('Transaction hash:')} ${deployed.hash}`)
      ctx.print(`${chalk.dim('Contract address:')} ${deployed.contractAddress}`)
      ctx.print(`${chalk.dim('Gas:')} ${deployed.gas} at ${formatGasPrice(deployed.gasPrice)}`)

      if (!options.wait) return

      const receipt = await waitFor(ctx, client, deployed.hash, options)
      ctx.print(describeReceipt(receipt))
      if (receipt.status !== 'success') {
        throw new Error(`Contract creation reverted in block ${receipt.blockNumber}`)
      }
    })

  program
    .command('receipt')
    .description('Wait for a transaction receipt')
    .argument('<hash>', 'Transaction hash')
    .option('--retries <count>', `Retries after the first lookup (default: ${RECEIPT_MAX_RETRIES})`)
    .option('--interval <ms>', `Delay between lookups (default: ${RECEIPT_POLL_INTERVAL_MS})`)
    .action(async (hash: string, _options: unknown, command: Command) => {
      const options = validate(command.optsWithGlobals(), ReceiptOptionsSchema, 'options')
      const receipt = await waitFor(ctx, ctx.connect(options), hash, options)
      ctx.print(toJson(receipt))
    })
}
