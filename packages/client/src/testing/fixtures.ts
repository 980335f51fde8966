/**
 * RPC-shaped payloads (hex quantities) for the mock node
 */

import type { Logger } from '@evmkit/shared'
import type { Address, Hash, Hex } from 'viem'

export const TEST_ADDRESS: Address = '0x52908400098527886e0f7030069857d2e4169ee7'
export const TEST_TX_HASH: Hash = `0x${'ab'.repeat(32)}`
export const TEST_BLOCK_HASH: Hash = `0x${'cd'.repeat(32)}`
export const TEST_GENESIS_HASH: Hash = `0x${'01'.repeat(32)}`

/** Placeholder key; never funded anywhere */
export const TEST_PRIVATE_KEY: Hex = `0x${'11'.repeat(32)}`

const ZERO_HASH: Hash = `0x${'00'.repeat(32)}`
const EMPTY_BLOOM = `0x${'00'.repeat(256)}`

export function rpcBlock(number: number, hash: Hash = TEST_BLOCK_HASH) {
  return {
    number: `0x${number.toString(16)}`,
    hash,
    parentHash: ZERO_HASH,
    nonce: '0x0000000000000000',
    sha3Uncles: ZERO_HASH,
    logsBloom: EMPTY_BLOOM,
    transactionsRoot: ZERO_HASH,
    stateRoot: ZERO_HASH,
    receiptsRoot: ZERO_HASH,
    miner: '0x0000000000000000000000000000000000000000',
    difficulty: '0x1',
    totalDifficulty: '0x1',
    extraData: '0x',
    size: '0x220',
    gasLimit: '0x7a1200',
    gasUsed: '0x0',
    timestamp: '0x5c1a2b3c',
    transactions: [],
    uncles: [],
  }
}

export function rpcTransaction(blockNumber: number | null) {
  return {
    hash: TEST_TX_HASH,
    nonce: '0x1',
    blockHash: blockNumber === null ? null : TEST_BLOCK_HASH,
    blockNumber: blockNumber === null ? null : `0x${blockNumber.toString(16)}`,
    transactionIndex: blockNumber === null ? null : '0x0',
    from: TEST_ADDRESS,
    to: '0x0000000000000000000000000000000000000001',
    value: '0x0',
    gas: '0x5208',
    gasPrice: '0x3b9aca00',
    input: '0x',
    v: '0x1b',
    r: `0x${'22'.repeat(32)}`,
    s: `0x${'33'.repeat(32)}`,
    type: '0x0',
  }
}

export function rpcReceipt(contractAddress: Address | null = null) {
  return {
    transactionHash: TEST_TX_HASH,
    transactionIndex: '0x0',
    blockHash: TEST_BLOCK_HASH,
    blockNumber: '0x2a',
    from: TEST_ADDRESS,
    to: null,
    cumulativeGasUsed: '0x1e8480',
    gasUsed: '0x1e8480',
    effectiveGasPrice: '0x3b9aca00',
    contractAddress,
    logs: [],
    logsBloom: EMPTY_BLOOM,
    status: '0x1',
    type: '0x0',
  }
}

export interface RecordingLogger extends Logger {
  entries: Array<{ level: keyof Logger; message: string; data?: Record<string, unknown> }>
}

/**
 * Logger that keeps entries in memory instead of writing them
 */
export function createRecordingLogger(): RecordingLogger {
  const entries: RecordingLogger['entries'] = []
  const record =
    (level: keyof Logger) => (message: string, data?: Record<string, unknown>) => {
      entries.push({ level, message, data })
    }
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  }
}
