/**
 * @fileoverview Network Configuration
 * @module config
 *
 * Config-First Architecture:
 * - Public endpoints in networks.json
 * - Environment variables only for overrides (WEB3_NETWORK, WEB3_RPC_URL)
 *
 * @example
 * ```ts
 * import { networkURL, resolveRpcUrl } from '@evmkit/config';
 *
 * networkURL('testnet'); // 'https://testnet-rpc.gochain.io'
 * resolveRpcUrl({ network: 'localhost' }); // 'http://localhost:8545'
 * ```
 */

export {
  DEFAULT_NETWORK,
  type Env,
  listNetworks,
  type NetworkEntry,
  NetworkEntrySchema,
  type NetworksConfig,
  NetworksConfigSchema,
  networkURL,
  type RpcTarget,
  resolveRpcUrl,
} from './networks'
