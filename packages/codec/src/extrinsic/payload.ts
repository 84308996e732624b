import { blake2_256 } from '@subreg/core'
import { SIGNING_PAYLOAD_HASH_THRESHOLD } from '@subreg/types'
import { concatBytes } from '../core/bytes'

/**
 * call ∥ extra, replaced by its blake2_256 hash when longer than 256 bytes
 */
export function createSigningPayload(
  call: Uint8Array,
  extra: Uint8Array,
): Uint8Array {
  const payload = concatBytes(call, extra)
  return payload.length > SIGNING_PAYLOAD_HASH_THRESHOLD
    ? blake2_256(payload)
    : payload
}
