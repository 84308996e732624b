/**
 * System.Account decoding
 *
 * Canonical layout (80 bytes):
 *   nonce u32 ∥ consumers u32 ∥ providers u32 ∥ sufficients u32 ∥
 *   free u128 ∥ reserved u128 ∥ frozen u128 ∥ flags u128
 *
 * Runtimes have shipped shorter AccountData layouts, so a fixed-offset
 * fallback is tried when the canonical decode fails.
 */

import type { AccountInfo, Safe } from '@subreg/types'
import { DecodeError, safeError, safeResult } from '@subreg/types'
import { decodeFixedLength } from '../core/fixed-length'

export const ACCOUNT_INFO_LENGTH = 80

/**
 * Byte offsets of the fallback layout. Revise together with the runtime
 * version they were observed on.
 */
export const ACCOUNT_INFO_FALLBACK_LAYOUT = {
  minLength: 56,
  freeOffset: 16,
  reservedOffset: 32,
  reservedMinLength: 48,
  frozenOffset: 48,
  frozenMinLength: 56,
} as const

export function emptyAccountInfo(): AccountInfo {
  return {
    nonce: 0,
    consumers: 0,
    providers: 0,
    sufficients: 0,
    data: { free: 0n, reserved: 0n, frozen: 0n, flags: 0n },
  }
}

/**
 * Canonical decode. Trailing bytes past the 80-byte record are ignored.
 */
export function decodeAccountInfoCanonical(
  raw: Uint8Array,
): Safe<AccountInfo, DecodeError> {
  if (raw.length < ACCOUNT_INFO_LENGTH) {
    return safeError(
      new DecodeError(
        `AccountInfo needs ${ACCOUNT_INFO_LENGTH} bytes, got ${raw.length}`,
      ),
    )
  }

  const counters: number[] = []
  let cursor = raw
  for (let i = 0; i < 4; i++) {
    const [error, result] = decodeFixedLength(cursor, 4)
    if (error) return safeError(error)
    counters.push(Number(result.value))
    cursor = result.remaining
  }

  const balances: bigint[] = []
  for (let i = 0; i < 4; i++) {
    const [error, result] = decodeFixedLength(cursor, 16)
    if (error) return safeError(error)
    balances.push(result.value)
    cursor = result.remaining
  }

  const [nonce, consumers, providers, sufficients] = counters
  const [free, reserved, frozen, flags] = balances
  return safeResult({
    nonce,
    consumers,
    providers,
    sufficients,
    data: { free, reserved, frozen, flags },
  })
}

function readUint(raw: Uint8Array, offset: number, length: 4 | 8 | 16): bigint {
  const [error, result] = decodeFixedLength(raw.subarray(offset), length)
  return error ? 0n : result.value
}

/**
 * Fixed-offset decode. Every field is zero below the minimum length.
 */
export function decodeAccountInfoFallback(raw: Uint8Array): AccountInfo {
  const layout = ACCOUNT_INFO_FALLBACK_LAYOUT
  if (raw.length < layout.minLength) return emptyAccountInfo()

  return {
    nonce: Number(readUint(raw, 0, 4)),
    consumers: Number(readUint(raw, 4, 4)),
    providers: Number(readUint(raw, 8, 4)),
    sufficients: Number(readUint(raw, 12, 4)),
    data: {
      free: readUint(raw, layout.freeOffset, 16),
      reserved:
        raw.length >= layout.reservedMinLength
          ? readUint(raw, layout.reservedOffset, 16)
          : 0n,
      // u64 on the older layout, widened
      frozen:
        raw.length >= layout.frozenMinLength
          ? readUint(raw, layout.frozenOffset, 8)
          : 0n,
      flags: 0n,
    },
  }
}

export function decodeAccountInfo(raw: Uint8Array): AccountInfo {
  const [error, info] = decodeAccountInfoCanonical(raw)
  if (!error) return info
  return decodeAccountInfoFallback(raw)
}
