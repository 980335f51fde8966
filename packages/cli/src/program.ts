import { existsSync, readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { errorMessage } from '@evmkit/client'
import { DEFAULT_NETWORK } from '@evmkit/config'
import chalk from 'chalk'
import { Command } from 'commander'
import { registerDeployCommands } from './commands/deploy'
import { registerNetworkCommands } from './commands/networks'
import { registerQueryCommands } from './commands/query'
import { type CliDeps, CliContext } from './context'
import { CommanderErrorSchema, GlobalOptionsSchema, PackageJsonSchema, validate } from './schemas'

export const CLI_NAME = 'evmkit'

function getVersion(): string {
  const __filename = fileURLToPath(import.meta.url)
  const __dirname = dirname(__filename)
  const pkgPath = join(__dirname, '..', 'package.json')
  if (existsSync(pkgPath)) {
    const pkg = validate(
      JSON.parse(readFileSync(pkgPath, 'utf-8')),
      PackageJsonSchema,
      'package.json',
    )
    return pkg.version
  }
  return '0.1.0'
}

const withoutTrailingNewline = (text: string) => text.replace(/\n$/, '')

export function createProgram(ctx: CliContext): Command {
  const program = new Command()

  // Settings below are inherited by subcommands created with .command()
  program
    .name(CLI_NAME)
    .description('Query EVM JSON-RPC nodes and deploy contracts')
    .version(getVersion())
    .option('-n, --network <name>', `Network to use (default: WEB3_NETWORK or ${DEFAULT_NETWORK})`)
    .option('--rpc-url <url>', 'RPC endpoint; overrides --network (default: WEB3_RPC_URL)')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet mode')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.output.out(withoutTrailingNewline(text)),
      writeErr: (text) => ctx.output.err(withoutTrailingNewline(text)),
    })
    .hook('preAction', (thisCommand) => {
      const opts = validate(thisCommand.opts(), GlobalOptionsSchema, 'options')
      ctx.configureLogging({
        verbose: opts.verbose,
        silent: opts.quiet,
      })
    })

  registerNetworkCommands(program, ctx)
  registerQueryCommands(program, ctx)
  registerDeployCommands(program, ctx)

  return program
}

/**
 * Parse `argv` and run the selected command; resolves to the exit code
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const ctx = new CliContext(deps)
  const program = createProgram(ctx)

  try {
    await program.parseAsync(argv)
    return 0
  } catch (error) {
    // Commander throws objects with code/exitCode; it has already printed its message
    const parsed = CommanderErrorSchema.safeParse(error)
    if (parsed.success && parsed.data.code?.startsWith('commander.')) {
      if (parsed.data.code === 'commander.unknownCommand') {
        ctx.output.err(chalk.red(`Run '${CLI_NAME} --help' for available commands.`))
      }
      return parsed.data.exitCode ?? 1
    }

    ctx.output.err(chalk.red(`Error: ${errorMessage(error)}`))
    return 1
  }
}
