/**
 * CLI Zod Schemas
 *
 * Option and argument parsing for commands. Commander hands every value over
 * as a string; these turn them into the types the client expects and fail
 * fast with the offending option named.
 */

import { z } from 'zod'

export { validate } from '@evmkit/shared'

export const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
})

export const CommanderErrorSchema = z.object({
  code: z.string().optional(),
  exitCode: z.number().optional(),
  message: z.string().optional(),
})
export type CommanderErrorLike = z.infer<typeof CommanderErrorSchema>

/** Decimal or 0x-prefixed block number */
export const BlockNumberSchema = z
  .string()
  .regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'Expected a decimal or 0x-prefixed number')
  .transform((value) => BigInt(value))

const IntegerStringSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')

export const GasSchema = IntegerStringSchema.transform((value) => BigInt(value)).refine(
  (gas) => gas > 0n,
  'Gas limit must be positive',
)

export const ChainIdSchema = IntegerStringSchema.transform(Number).refine(
  (id) => Number.isSafeInteger(id) && id > 0,
  'Chain ID must be a positive integer',
)

export const CountSchema = IntegerStringSchema.transform(Number)

// ============================================================================
// Command options
// ============================================================================

export const GlobalOptionsSchema = z.object({
  network: z.string().min(1).optional(),
  rpcUrl: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
})
export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>

export const NetworksOptionsSchema = GlobalOptionsSchema.extend({
  json: z.boolean().optional(),
})

export const StateQueryOptionsSchema = GlobalOptionsSchema.extend({
  block: BlockNumberSchema.optional(),
})

export const BalanceOptionsSchema = StateQueryOptionsSchema.extend({
  wei: z.boolean().optional(),
})

export const ReceiptOptionsSchema = GlobalOptionsSchema.extend({
  retries: CountSchema.optional(),
  interval: CountSchema.optional(),
})

export const DeployOptionsSchema = ReceiptOptionsSchema.extend({
  privateKey: z.string().min(1).optional(),
  gas: GasSchema.optional(),
  chainId: ChainIdSchema.optional(),
  wait: z.boolean().optional(),
})
export type DeployCommandOptions = z.infer<typeof DeployOptionsSchema>
