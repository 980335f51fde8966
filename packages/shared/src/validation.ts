/**
 * Zod schemas and helpers for validating values that cross the RPC boundary.
 */

import { type Address, type Hash, type Hex, isHex } from 'viem'
import { z } from 'zod'

export const HexSchema = z.custom<Hex>(
  (val): val is Hex => typeof val === 'string' && isHex(val, { strict: true }),
  { message: 'Invalid hex string' },
)

export const AddressSchema = z.custom<Address>(
  (val): val is Address =>
    typeof val === 'string' && /^0x[a-fA-F0-9]{40}$/.test(val),
  { message: 'Invalid address' },
)

export const HashSchema = z.custom<Hash>(
  (val): val is Hash => typeof val === 'string' && /^0x[a-fA-F0-9]{64}$/.test(val),
  { message: 'Invalid 32-byte hash' },
)

/** Hex bytes: 0x-prefixed with a whole number of bytes */
export const HexBytesSchema = HexSchema.refine((val) => val.length % 2 === 0, {
  message: 'Hex string has odd length',
})

/** A JSON-RPC quantity, given either as a JSON number or a hex string */
export const QuantitySchema = z
  .union([z.number().int().nonnegative(), z.string().regex(/^0x[0-9a-fA-F]+$/)])
  .transform((val) => BigInt(val))

export const RpcUrlSchema = z
  .string()
  .url()
  .refine((val) => /^https?:\/\//.test(val), {
    message: 'RPC URL must use http or https',
  })

/**
 * Render zod issues as `path: message` pairs
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ')
}

/**
 * Validate data with a schema, throwing on failure
 */
export function validate<T>(
  data: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context?: string,
): T {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw new Error(
      `Validation failed${context ? ` in ${context}` : ''}: ${formatIssues(result.error)}`,
    )
  }
  return result.data
}
