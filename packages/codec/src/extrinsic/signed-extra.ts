import type { Safe } from '@subreg/types'
import { type EncodeError, safeError, safeResult } from '@subreg/types'
import { concatBytes } from '../core/bytes'
import { encodeFixedLength } from '../core/fixed-length'

export const SIGNED_EXTRA_LENGTH = 18

/**
 * era(2) ∥ nonce u64 LE ∥ tip u64 LE
 */
export function encodeSignedExtra(
  era: Uint8Array,
  nonce: bigint,
  tip = 0n,
): Safe<Uint8Array, EncodeError> {
  const [nonceError, encodedNonce] = encodeFixedLength(nonce, 8)
  if (nonceError) return safeError(nonceError)
  const [tipError, encodedTip] = encodeFixedLength(tip, 8)
  if (tipError) return safeError(tipError)
  return safeResult(concatBytes(era, encodedNonce, encodedTip))
}
