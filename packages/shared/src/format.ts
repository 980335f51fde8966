/**
 * Formatting Utilities
 *
 * Import from @evmkit/shared for consistent output across packages.
 */

import { formatEther, formatGwei } from 'viem'

// Wei Formatting

/**
 * Format wei as ether without losing precision
 * @example formatEth(1500000000000000000n) // "1.5 ETH"
 */
export function formatEth(wei: bigint | string): string {
  const weiValue = typeof wei === 'string' ? BigInt(wei) : wei
  return `${formatEther(weiValue)} ETH`
}

/**
 * Format a wei gas price in gwei
 * @example formatGasPrice(1000000000n) // "1 gwei"
 */
export function formatGasPrice(wei: bigint): string {
  return `${formatGwei(wei)} gwei`
}

// JSON

/**
 * JSON.stringify that renders bigints as decimal strings
 */
export function toJson(value: unknown, indent = 2): string {
  return JSON.stringify(
    value,
    (_key, val: unknown) => (typeof val === 'bigint' ? val.toString() : val),
    indent,
  )
}
