import { afterEach, describe, expect, it, vi } from 'vitest'
import { getClient, RECEIPT_MAX_RETRIES, RECEIPT_POLL_INTERVAL_MS } from './client'
import {
  createMockNode,
  createRecordingLogger,
  type RpcHandler,
  rpcReceipt,
  TEST_TX_HASH,
} from './testing'
import { Web3Error, Web3ErrorCode } from './types'

const CONTRACT = '0x3333333333333333333333333333333333333333'

/** Answers "not mined" (null) until the given attempt, then the receipt */
function minedOnAttempt(attempt: number): RpcHandler {
  let calls = 0
  return () => {
    calls++
    return calls >= attempt ? rpcReceipt(CONTRACT) : null
  }
}

function setup(receiptHandler: RpcHandler) {
  const node = createMockNode({ eth_getTransactionReceipt: receiptHandler })
  const logger = createRecordingLogger()
  const client = getClient('http://localhost:8545', { transport: node.transport, logger })
  const attempts = () => node.count('eth_getTransactionReceipt')
  return { node, logger, client, attempts }
}

/** Let the pending RPC round trip settle; immediates are not faked below */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

async function caught(promise: Promise<unknown>): Promise<Web3Error> {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err,
  )
  if (!(error instanceof Web3Error)) {
    throw new Error(`expected a Web3Error, got ${String(error)}`)
  }
  return error
}

describe('waitForReceipt', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('polls five retries two seconds apart by default', () => {
    expect(RECEIPT_MAX_RETRIES).toBe(5)
    expect(RECEIPT_POLL_INTERVAL_MS).toBe(2000)
  })

  it('returns the receipt as soon as it is available', async () => {
    const { client, attempts, node } = setup(minedOnAttempt(1))

    const receipt = await client.waitForReceipt(TEST_TX_HASH)
    expect(receipt.status).toBe('success')
    expect(receipt.contractAddress).toBe(CONTRACT)
    expect(receipt.blockNumber).toBe(42n)
    expect(attempts()).toBe(1)
    expect(node.calls[0]?.params).toEqual([TEST_TX_HASH])
  })

  it('keeps polling until the transaction is mined', async () => {
    const { client, attempts, logger } = setup(minedOnAttempt(3))

    const receipt = await client.waitForReceipt(TEST_TX_HASH, { intervalMs: 1 })
    expect(receipt.transactionHash).toBe(TEST_TX_HASH)
    expect(attempts()).toBe(3)
    expect(logger.entries.filter((e) => e.level === 'debug')).toHaveLength(2)
  })

  it('gives up after the first attempt plus five retries', async () => {
    const { client, attempts } = setup(() => null)

    const error = await caught(client.waitForReceipt(TEST_TX_HASH, { intervalMs: 1 }))
    expect(attempts()).toBe(6)
    expect(error.code).toBe(Web3ErrorCode.RECEIPT_UNAVAILABLE)
    expect(error.message).toContain(
      `Cannot get the receipt: Transaction receipt with hash "${TEST_TX_HASH}" could not be found.`,
    )
  })

  it('honours a custom retry count', async () => {
    const { client, attempts } = setup(() => null)

    const error = await caught(
      client.waitForReceipt(TEST_TX_HASH, { retries: 0, intervalMs: 1 }),
    )
    expect(error.code).toBe(Web3ErrorCode.RECEIPT_UNAVAILABLE)
    expect(attempts()).toBe(1)
  })

  it('waits the default interval between attempts', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
    const { client, attempts } = setup(minedOnAttempt(2))

    const pending = client.waitForReceipt(TEST_TX_HASH)
    await flush()
    expect(attempts()).toBe(1)

    await vi.advanceTimersByTimeAsync(RECEIPT_POLL_INTERVAL_MS - 1)
    expect(attempts()).toBe(1)

    await vi.advanceTimersByTimeAsync(1)
    const receipt = await pending
    expect(receipt.status).toBe('success')
    expect(attempts()).toBe(2)
  })

  it('does not call the node when already cancelled', async () => {
    const { client, attempts } = setup(minedOnAttempt(1))
    const controller = new AbortController()
    controller.abort()

    const error = await caught(
      client.waitForReceipt(TEST_TX_HASH, { signal: controller.signal }),
    )
    expect(error.code).toBe(Web3ErrorCode.CANCELLED)
    expect(attempts()).toBe(0)
  })

  it('stops waiting as soon as the signal aborts', async () => {
    const { client, attempts } = setup(() => null)
    const controller = new AbortController()
    const reason = new Error('shutting down')

    const pending = caught(
      client.waitForReceipt(TEST_TX_HASH, {
        signal: controller.signal,
        intervalMs: 60_000,
      }),
    )
    await flush()
    expect(attempts()).toBe(1)
    controller.abort(reason)

    const error = await pending
    expect(error.code).toBe(Web3ErrorCode.CANCELLED)
    expect(error.message).toBe('Waiting for the receipt was cancelled')
    expect(error.cause).toBe(reason)
    expect(attempts()).toBe(1)
  })

  it('cancels a lookup that is still in flight', async () => {
    const { client, attempts } = setup(() => new Promise(() => {}))
    const controller = new AbortController()
    const reason = new Error('shutting down')

    const pending = caught(
      client.waitForReceipt(TEST_TX_HASH, { signal: controller.signal }),
    )
    await flush()
    expect(attempts()).toBe(1)
    controller.abort(reason)

    const error = await pending
    expect(error.code).toBe(Web3ErrorCode.CANCELLED)
    expect(error.cause).toBe(reason)
    expect(attempts()).toBe(1)
  })

  it('rejects malformed hashes and options', async () => {
    const { client, attempts } = setup(() => null)

    const badHash = await caught(client.waitForReceipt('0x1234'))
    expect(badHash.code).toBe(Web3ErrorCode.INVALID_HASH)

    await expect(client.waitForReceipt(TEST_TX_HASH, { retries: -1 })).rejects.toThrow(
      'Validation failed in waitForReceipt options: retries: Number must be greater than or equal to 0',
    )
    expect(attempts()).toBe(0)
  })
})
