/**
 * @evmkit/client - Type Definitions
 */

import {
  AddressSchema,
  HashSchema,
  type Logger,
  QuantitySchema,
} from '@evmkit/shared'
import {
  type Address,
  BaseError,
  type Hash,
  type Hex,
  type Transport,
} from 'viem'
import { z } from 'zod'

/**
 * Error codes for client operations
 */
export const Web3ErrorCode = {
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  INVALID_HASH: 'INVALID_HASH',
  INVALID_PRIVATE_KEY: 'INVALID_PRIVATE_KEY',
  INVALID_CONTRACT_DATA: 'INVALID_CONTRACT_DATA',
  GAS_PRICE_UNAVAILABLE: 'GAS_PRICE_UNAVAILABLE',
  NONCE_UNAVAILABLE: 'NONCE_UNAVAILABLE',
  SEND_FAILED: 'SEND_FAILED',
  RECEIPT_UNAVAILABLE: 'RECEIPT_UNAVAILABLE',
  CANCELLED: 'CANCELLED',
  RPC_ERROR: 'RPC_ERROR',
} as const

export type Web3ErrorCode = (typeof Web3ErrorCode)[keyof typeof Web3ErrorCode]

/**
 * Message of an underlying error. For viem errors this is the node's own
 * message when there is one, otherwise viem's one-line summary.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof BaseError) return error.details || error.shortMessage
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Client error class
 */
export class Web3Error extends Error {
  public readonly details?: Record<string, unknown>

  constructor(
    public readonly code: Web3ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'Web3Error'
    this.details = options?.details
  }

  /**
   * Prefix an underlying failure with what was being attempted
   */
  static wrap(code: Web3ErrorCode, context: string, cause: unknown): Web3Error {
    return new Web3Error(code, `${context}: ${errorMessage(cause)}`, { cause })
  }
}

/**
 * Client configuration
 */
export interface RpcClientConfig {
  /** JSON-RPC endpoint (http or https) */
  url: string
  /** Override the transport, e.g. a `custom` EIP-1193 provider in tests */
  transport?: Transport
  /** Logger for non-fatal lookup failures; defaults to the `rpc-client` logger */
  logger?: Logger
}

export type GetClientOptions = Omit<RpcClientConfig, 'url'>

/**
 * Identity of the network a client is connected to.
 * Fields whose lookup failed are left unset.
 */
export interface ChainIdentity {
  networkId?: bigint
  chainId?: bigint
  genesisHash?: Hash
}

/**
 * JSON form of a ChainIdentity
 */
export interface ChainIdentityJson {
  network_id?: string
  chain_id?: string
  genesis_hash?: Hash
}

export function identityToJson(id: ChainIdentity): ChainIdentityJson {
  const json: ChainIdentityJson = {}
  if (id.networkId !== undefined) json.network_id = id.networkId.toString()
  if (id.chainId !== undefined) json.chain_id = id.chainId.toString()
  if (id.genesisHash !== undefined) json.genesis_hash = id.genesisHash
  return json
}

// Clique proof-of-authority snapshot as served by clique_getSnapshot

export const CliqueVoteSchema = z.object({
  signer: AddressSchema,
  block: QuantitySchema,
  address: AddressSchema,
  authorize: z.boolean(),
})
export type CliqueVote = z.infer<typeof CliqueVoteSchema>

export const CliqueTallySchema = z.object({
  authorize: z.boolean(),
  votes: z.number().int().nonnegative(),
})
export type CliqueTally = z.infer<typeof CliqueTallySchema>

export const CliqueSnapshotSchema = z.object({
  number: QuantitySchema,
  hash: HashSchema,
  /** Authorised signers and the last block each one signed */
  signers: z.record(z.string(), QuantitySchema),
  /** Addresses allowed to vote, where the node tracks them separately */
  voters: z
    .record(z.string(), z.unknown())
    .nullish()
    .transform((voters) => (voters ? Object.keys(voters) : undefined)),
  votes: z
    .array(CliqueVoteSchema)
    .nullish()
    .transform((votes) => votes ?? []),
  tally: z
    .record(z.string(), CliqueTallySchema)
    .nullish()
    .transform((tally) => tally ?? {}),
})
export type CliqueSnapshot = z.output<typeof CliqueSnapshotSchema>

/**
 * Deploy options
 */
export interface DeployOptions {
  /** Gas limit (default: 2,000,000) */
  gas?: bigint
  /** Wei sent to the constructor (default: 0) */
  value?: bigint
  /** Sign with EIP-155 replay protection for this chain; unprotected when unset */
  chainId?: number
}

/**
 * A signed and broadcast contract-creation transaction
 */
export interface DeployedContract {
  hash: Hash
  from: Address
  nonce: number
  gas: bigint
  gasPrice: bigint
  value: bigint
  data: Hex
  rawTransaction: Hex
  /** Address the contract will have once the transaction is mined */
  contractAddress: Address
}

export const WaitForReceiptOptionsSchema = z.object({
  retries: z.number().int().nonnegative().optional(),
  intervalMs: z.number().int().nonnegative().optional(),
})

/**
 * Receipt polling options
 */
export interface WaitForReceiptOptions {
  /** Aborts polling between attempts */
  signal?: AbortSignal
  /** Retries after the first attempt (default: 5) */
  retries?: number
  /** Delay between attempts in ms (default: 2000) */
  intervalMs?: number
}
