import { isValidHex } from '@subreg/core'
import type { Safe } from '@subreg/types'
import { TransportError, safeError, safeResult } from '@subreg/types'
import { z } from 'zod'

const hexString = z
  .string()
  .refine(isValidHex, { message: 'Expected 0x-prefixed hex' })

/** `state_getStorage`: hex value, or null when nothing is stored */
export const storageResultSchema = z.string().nullable()

export const blockHashSchema = hexString

export const headerSchema = z
  .object({
    number: hexString,
    parentHash: hexString.optional(),
    stateRoot: hexString.optional(),
  })
  .passthrough()

export const extrinsicHashSchema = hexString

/**
 * Validate a `result` member against `schema`
 */
export function parseRpcResult<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  result: unknown,
  method: string,
): Safe<T, TransportError> {
  const parsed = schema.safeParse(result)
  if (!parsed.success) {
    return safeError(
      new TransportError(
        `Malformed ${method} result: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        { method },
      ),
    )
  }
  return safeResult(parsed.data)
}
