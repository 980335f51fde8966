export { createMockNode, type MockNode, type RpcCall, type RpcHandler, RpcNodeError } from './mock-node'
export {
  createRecordingLogger,
  type RecordingLogger,
  rpcBlock,
  rpcReceipt,
  rpcTransaction,
  TEST_ADDRESS,
  TEST_BLOCK_HASH,
  TEST_GENESIS_HASH,
  TEST_PRIVATE_KEY,
  TEST_TX_HASH,
} from './fixtures'
