/**
 * @evmkit/client
 *
 * Network-agnostic wrapper around a node's JSON-RPC API: pass-through
 * accessors, contract deployment and bounded receipt polling.
 */

export {
  DEFAULT_DEPLOY_GAS,
  getClient,
  type NodeClient,
  type NodeRpcSchema,
  parseContractData,
  parsePrivateKey,
  RECEIPT_MAX_RETRIES,
  RECEIPT_POLL_INTERVAL_MS,
  RpcClient,
} from './client'

export {
  // Error handling
  errorMessage,
  Web3Error,
  Web3ErrorCode,
  // Schemas
  CliqueSnapshotSchema,
  CliqueTallySchema,
  CliqueVoteSchema,
  // Types
  type ChainIdentity,
  type ChainIdentityJson,
  type CliqueSnapshot,
  type CliqueTally,
  type CliqueVote,
  type DeployedContract,
  type DeployOptions,
  type GetClientOptions,
  identityToJson,
  type RpcClientConfig,
  type WaitForReceiptOptions,
} from './types'
