/**
 * Network Configuration
 *
 * Maps well-known network names to their public JSON-RPC endpoints.
 * The table itself lives in networks.json; environment variables only
 * override which endpoint a caller ends up with.
 */

import { RpcUrlSchema, validate } from '@evmkit/shared'
import { z } from 'zod'
import networksJsonRaw from './networks.json'

export const NetworkEntrySchema = z.object({
  name: z.string().min(1),
  rpcUrl: RpcUrlSchema,
})
export type NetworkEntry = z.infer<typeof NetworkEntrySchema>

export const NetworksConfigSchema = z
  .object({
    defaultNetwork: z.string().min(1),
    networks: z.array(NetworkEntrySchema).min(1),
  })
  .refine(
    (config) => config.networks.some((n) => n.name === config.defaultNetwork),
    { message: 'defaultNetwork must name one of the networks' },
  )
export type NetworksConfig = z.infer<typeof NetworksConfigSchema>

const networksConfig = validate(
  networksJsonRaw,
  NetworksConfigSchema,
  'networks.json',
)

const networkUrls = new Map(
  networksConfig.networks.map((n) => [n.name, n.rpcUrl] as const),
)

/** Name used when a caller does not pick a network */
export const DEFAULT_NETWORK = networksConfig.defaultNetwork

/**
 * Resolve a network name to its RPC URL.
 *
 * The empty string means the default network. Unknown names resolve to ''.
 */
export function networkURL(network: string): string {
  return networkUrls.get(network === '' ? DEFAULT_NETWORK : network) ?? ''
}

/**
 * All known networks in table order
 */
export function listNetworks(): NetworkEntry[] {
  return networksConfig.networks.map((n) => ({ ...n }))
}

export interface RpcTarget {
  /** Explicit endpoint; wins over everything else */
  rpcUrl?: string
  /** Network name looked up in the table */
  network?: string
}

export type Env = Record<string, string | undefined>

/**
 * Pick the RPC endpoint for a command or script.
 *
 * Order: explicit rpcUrl, WEB3_RPC_URL, then the network table entry for
 * `network`, WEB3_NETWORK or the default network.
 */
export function resolveRpcUrl(target: RpcTarget = {}, env: Env = process.env): string {
  if (target.rpcUrl) return target.rpcUrl
  if (env.WEB3_RPC_URL) return env.WEB3_RPC_URL

  const network = target.network ?? env.WEB3_NETWORK ?? DEFAULT_NETWORK
  const url = networkURL(network)
  if (!url) {
    const known = networksConfig.networks.map((n) => n.name).join(', ')
    throw new Error(`Unknown network "${network}" (known: ${known})`)
  }
  return url
}
