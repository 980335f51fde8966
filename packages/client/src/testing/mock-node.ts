/**
 * In-process EIP-1193 stand-in for a JSON-RPC node.
 *
 * Handlers are keyed by method name and receive the positional params.
 * A missing handler answers like a node that does not expose the method.
 */

import { custom, type Transport } from 'viem'

export type RpcHandler = (params: unknown[]) => unknown

export interface RpcCall {
  method: string
  params: unknown[]
}

/**
 * Error as a node reports it: a JSON-RPC error code and message
 */
export class RpcNodeError extends Error {
  constructor(
    message: string,
    public readonly code = -32000,
  ) {
    super(message)
    this.name = 'RpcNodeError'
  }
}

export interface MockNode {
  transport: Transport
  calls: RpcCall[]
  count: (method: string) => number
}

export function createMockNode(handlers: Record<string, RpcHandler>): MockNode {
  const calls: RpcCall[] = []

  const transport = custom(
    {
      async request({ method, params }: { method: string; params?: unknown }) {
        const positional = Array.isArray(params) ? params : []
        calls.push({ method, params: positional })
        const handler = handlers[method]
        if (!handler) {
          throw new RpcNodeError(
            `the method ${method} does not exist/is not available`,
            -32601,
          )
        }
        return handler(positional)
      },
    },
    { retryCount: 0 },
  )

  return {
    transport,
    calls,
    count: (method) => calls.filter((call) => call.method === method).length,
  }
}
