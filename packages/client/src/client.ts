/**
 * RPC Client
 *
 * Thin convenience layer over a viem public client: every accessor is a
 * pass-through that rewraps the underlying error with what was being
 * attempted. Deployment and receipt polling are the only multi-step
 * operations.
 *
 * @example
 * ```typescript
 * import { getClient } from '@evmkit/client'
 * import { networkURL } from '@evmkit/config'
 *
 * const client = getClient(networkURL('testnet'))
 * const balance = await client.getBalance('0x52908400098527886e0f7030069857d2e4169ee7')
 *
 * const deployed = await client.deployContract(privateKey, bytecode)
 * const receipt = await client.waitForReceipt(deployed.hash)
 * ```
 */

import {
  AddressSchema,
  formatIssues,
  getLogger,
  HashSchema,
  HexBytesSchema,
  type Logger,
  RpcUrlSchema,
  validate,
} from '@evmkit/shared'
import {
  type Address,
  createPublicClient,
  getContractAddress,
  type Hash,
  type Hex,
  http,
  rpcSchema,
  type TransactionReceipt,
  type Transport,
} from 'viem'
import { type PrivateKeyAccount, privateKeyToAccount } from 'viem/accounts'
import {
  type ChainIdentity,
  type CliqueSnapshot,
  CliqueSnapshotSchema,
  type DeployedContract,
  type DeployOptions,
  errorMessage,
  type GetClientOptions,
  type RpcClientConfig,
  type WaitForReceiptOptions,
  WaitForReceiptOptionsSchema,
  Web3Error,
  Web3ErrorCode,
} from './types'

/** Gas limit for contract-creation transactions */
export const DEFAULT_DEPLOY_GAS = 2_000_000n
/** Receipt lookups after the first one before giving up */
export const RECEIPT_MAX_RETRIES = 5
/** Delay between receipt lookups */
export const RECEIPT_POLL_INTERVAL_MS = 2_000

/**
 * Node methods that viem has no action for
 */
export type NodeRpcSchema = [
  {
    Method: 'net_version'
    Parameters?: undefined
    ReturnType: string
  },
  {
    Method: 'clique_getSnapshot'
    Parameters: ['latest' | Hex]
    ReturnType: unknown
  },
]

// No transport-level retries: each call is exactly one request
function defaultTransport(url: string): Transport {
  return http(url, { retryCount: 0 })
}

function createNodeClient(transport: Transport) {
  return createPublicClient({
    transport,
    rpcSchema: rpcSchema<NodeRpcSchema>(),
  })
}

export type NodeClient = ReturnType<typeof createNodeClient>

/**
 * Parse a hex private key, with or without the 0x prefix, into a signing account
 */
export function parsePrivateKey(privateKeyHex: string): PrivateKeyAccount {
  const key =
    privateKeyHex.length > 2 && privateKeyHex.startsWith('0x')
      ? privateKeyHex.slice(2)
      : privateKeyHex
  if (!/^[0-9a-fA-F]{64}$/.test(key)) {
    throw new Web3Error(
      Web3ErrorCode.INVALID_PRIVATE_KEY,
      'Wrong private key: expected 32 bytes of hex',
    )
  }
  try {
    return privateKeyToAccount(`0x${key}`)
  } catch (error) {
    throw Web3Error.wrap(Web3ErrorCode.INVALID_PRIVATE_KEY, 'Wrong private key', error)
  }
}

/**
 * Decode 0x-prefixed contract bytecode
 */
export function parseContractData(contractData: string): Hex {
  const result = HexBytesSchema.safeParse(contractData)
  if (!result.success) {
    throw new Web3Error(
      Web3ErrorCode.INVALID_CONTRACT_DATA,
      `Cannot decode contract data: ${result.error.issues[0]?.message ?? 'invalid hex'}`,
    )
  }
  return result.data
}

function cancelled(signal: AbortSignal): Web3Error {
  return new Web3Error(
    Web3ErrorCode.CANCELLED,
    'Waiting for the receipt was cancelled',
    { cause: signal.reason },
  )
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled(signal))
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      if (signal) reject(cancelled(signal))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Settle with `promise`, or reject as cancelled as soon as `signal` aborts
 */
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(cancelled(signal))
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      },
    )
  })
}

/**
 * Connection to a single JSON-RPC endpoint
 */
export class RpcClient {
  readonly url: string
  readonly publicClient: NodeClient
  private logger: Logger

  constructor(config: RpcClientConfig) {
    const parsed = RpcUrlSchema.safeParse(config.url)
    if (!parsed.success) {
      throw new Web3Error(
        Web3ErrorCode.CONNECTION_FAILED,
        `Cannot connect to the network "${config.url}": ${parsed.error.issues[0]?.message ?? 'invalid URL'}`,
      )
    }
    this.url = parsed.data
    this.publicClient = createNodeClient(config.transport ?? defaultTransport(this.url))
    this.logger = config.logger ?? getLogger('rpc-client')
  }

  /**
   * Balance in wei at a block (latest when omitted)
   */
  async getBalance(address: string, blockNumber?: bigint): Promise<bigint> {
    const account = this.parseAddress(address)
    return this.rpc('Cannot get balance', () =>
      this.publicClient.getBalance({ address: account, blockNumber }),
    )
  }

  /**
   * Contract bytecode at a block (latest when omitted); '0x' for accounts without code
   */
  async getCode(address: string, blockNumber?: bigint): Promise<Hex> {
    const account = this.parseAddress(address)
    const code = await this.rpc('Cannot get code', () =>
      this.publicClient.getCode({ address: account, blockNumber }),
    )
    return code ?? '0x'
  }

  /**
   * Block with full transactions (latest when omitted)
   */
  async getBlockByNumber(number?: bigint) {
    return this.rpc('Cannot get block', () =>
      this.publicClient.getBlock({ blockNumber: number, includeTransactions: true }),
    )
  }

  /**
   * Transaction by hash, and whether it is still waiting to be mined
   */
  async getTransactionByHash(hash: string) {
    const txHash = this.parseHash(hash)
    const transaction = await this.rpc('Cannot get transaction', () =>
      this.publicClient.getTransaction({ hash: txHash }),
    )
    // Nodes return a null block number while the transaction is in the pool
    const blockNumber: bigint | null = transaction.blockNumber
    return { transaction, isPending: blockNumber === null }
  }

  /**
   * Clique consensus snapshot at the latest block
   */
  async getSnapshot(): Promise<CliqueSnapshot> {
    const raw = await this.rpc('Cannot get snapshot', () =>
      this.publicClient.request({
        method: 'clique_getSnapshot',
        params: ['latest'],
      }),
    )
    const result = CliqueSnapshotSchema.safeParse(raw)
    if (!result.success) {
      throw new Web3Error(
        Web3ErrorCode.RPC_ERROR,
        `Cannot get snapshot: unexpected response (${formatIssues(result.error)})`,
        { details: { response: raw } },
      )
    }
    return result.data
  }

  /**
   * Network ID, chain ID and genesis hash. Lookups that fail are logged and
   * left unset; this never throws.
   */
  async getID(): Promise<ChainIdentity> {
    const id: ChainIdentity = {}

    try {
      id.networkId = BigInt(await this.publicClient.request({ method: 'net_version' }))
    } catch (error) {
      this.logger.warn('Failed to get network ID', { url: this.url, error: errorMessage(error) })
    }

    try {
      id.chainId = BigInt(await this.publicClient.getChainId())
    } catch (error) {
      this.logger.warn('Failed to get chain ID', { url: this.url, error: errorMessage(error) })
    }

    try {
      const genesis = await this.publicClient.getBlock({ blockNumber: 0n })
      id.genesisHash = genesis.hash
    } catch (error) {
      this.logger.warn('Failed to get genesis block', {
        url: this.url,
        error: errorMessage(error),
      })
    }

    return id
  }

  /**
   * Sign and broadcast a legacy contract-creation transaction.
   *
   * Uses the node's suggested gas price and the sender's pending nonce. The
   * transaction is signed without replay protection unless `chainId` is given.
   */
  async deployContract(
    privateKeyHex: string,
    contractData: string,
    options: DeployOptions = {},
  ): Promise<DeployedContract> {
    const account = parsePrivateKey(privateKeyHex)
    const data = parseContractData(contractData)
    const gas = options.gas ?? DEFAULT_DEPLOY_GAS
    const value = options.value ?? 0n

    const gasPrice = await this.rpc(
      'Cannot get gas price',
      () => this.publicClient.getGasPrice(),
      Web3ErrorCode.GAS_PRICE_UNAVAILABLE,
    )

    const nonce = await this.rpc(
      'Cannot get nonce',
      () =>
        this.publicClient.getTransactionCount({
          address: account.address,
          blockTag: 'pending',
        }),
      Web3ErrorCode.NONCE_UNAVAILABLE,
    )

    const rawTransaction = await account.signTransaction({
      type: 'legacy',
      chainId: options.chainId,
      nonce,
      gas,
      gasPrice,
      value,
      data,
    })

    const hash = await this.rpc(
      'Cannot send transaction',
      () => this.publicClient.sendRawTransaction({ serializedTransaction: rawTransaction }),
      Web3ErrorCode.SEND_FAILED,
    )

    const contractAddress = getContractAddress({
      from: account.address,
      nonce: BigInt(nonce),
    })

    this.logger.info('Contract creation transaction sent', {
      hash,
      from: account.address,
      nonce,
      contractAddress,
    })

    return {
      hash,
      from: account.address,
      nonce,
      gas,
      gasPrice,
      value,
      data,
      rawTransaction,
      contractAddress,
    }
  }

  /**
   * Poll for a transaction receipt.
   *
   * Looks once, then retries every `intervalMs` up to `retries` more times.
   * Aborting `signal` stops both an in-flight lookup and the wait between
   * attempts.
   */
  async waitForReceipt(
    hash: string,
    options: WaitForReceiptOptions = {},
  ): Promise<TransactionReceipt> {
    const txHash = this.parseHash(hash)
    const { retries, intervalMs } = validate(
      { retries: options.retries, intervalMs: options.intervalMs },
      WaitForReceiptOptionsSchema,
      'waitForReceipt options',
    )
    const maxRetries = retries ?? RECEIPT_MAX_RETRIES
    const delayMs = intervalMs ?? RECEIPT_POLL_INTERVAL_MS
    const { signal } = options

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) throw cancelled(signal)

      try {
        return await abortable(
          this.publicClient.getTransactionReceipt({ hash: txHash }),
          signal,
        )
      } catch (error) {
        if (signal?.aborted) throw cancelled(signal)
        if (attempt >= maxRetries) {
          throw Web3Error.wrap(
            Web3ErrorCode.RECEIPT_UNAVAILABLE,
            'Cannot get the receipt',
            error,
          )
        }
        this.logger.debug('Receipt not available yet', {
          hash: txHash,
          attempt: attempt + 1,
          error: errorMessage(error),
        })
      }

      await sleep(delayMs, signal)
    }
  }

  private parseAddress(address: string): Address {
    const result = AddressSchema.safeParse(address)
    if (!result.success) {
      throw new Web3Error(Web3ErrorCode.INVALID_ADDRESS, `Invalid address "${address}"`)
    }
    return result.data
  }

  private parseHash(hash: string): Hash {
    const result = HashSchema.safeParse(hash)
    if (!result.success) {
      throw new Web3Error(Web3ErrorCode.INVALID_HASH, `Invalid transaction hash "${hash}"`)
    }
    return result.data
  }

  private async rpc<T>(
    context: string,
    call: () => Promise<T>,
    code: Web3ErrorCode = Web3ErrorCode.RPC_ERROR,
  ): Promise<T> {
    try {
      return await call()
    } catch (error) {
      throw Web3Error.wrap(code, context, error)
    }
  }
}

/**
 * Connect to an RPC endpoint
 */
export function getClient(rpcUrl: string, options: GetClientOptions = {}): RpcClient {
  return new RpcClient({ url: rpcUrl, ...options })
}
