import type { AccountId, DecodingResult, Safe } from '@subreg/types'
import {
  ACCOUNT_ID_LENGTH,
  DecodeError,
  EncodeError,
  safeError,
  safeResult,
} from '@subreg/types'
import { concat } from 'viem'

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return concat(parts)
}

/**
 * Validate that `bytes` is a 32-byte account identifier
 */
export function encodeAccountId(bytes: Uint8Array): Safe<AccountId, EncodeError> {
  if (bytes.length !== ACCOUNT_ID_LENGTH) {
    return safeError(
      new EncodeError(
        `AccountId must be ${ACCOUNT_ID_LENGTH} bytes, got ${bytes.length}`,
      ),
    )
  }
  return safeResult(bytes)
}

export function decodeFixedBytes(
  data: Uint8Array,
  length: number,
): Safe<DecodingResult<Uint8Array>, DecodeError> {
  if (data.length < length) {
    return safeError(
      new DecodeError(
        `Insufficient data for ${length} raw bytes (got ${data.length} bytes)`,
      ),
    )
  }
  return safeResult({
    value: data.slice(0, length),
    remaining: data.slice(length),
    consumed: length,
  })
}
