/**
 * Storage key derivation
 *
 *   key = twox128(pallet) ∥ twox128(item) ∥ hashed key components
 *
 * The hasher for the components comes from `STORAGE_ITEMS`.
 */

import { blake2_128, blake2_256, logger, twox128 } from '@subreg/core'
import type { AccountId, Safe } from '@subreg/types'
import { EncodeError, StorageKeyError, safeError, safeResult } from '@subreg/types'
import { bytesToHex, type Hex } from 'viem'
import { concatBytes } from '../core/bytes'
import { encodeFixedLength } from '../core/fixed-length'
import { lookupHasher } from './hashers'

export function storagePrefix(pallet: string, item: string): Uint8Array {
  return concatBytes(twox128(pallet), twox128(item))
}

export function deriveMapKey(
  pallet: string,
  item: string,
  parts: Uint8Array[],
): Safe<Uint8Array, StorageKeyError> {
  const [hasherError, hasher] = lookupHasher(pallet, item)
  if (hasherError) return safeError(hasherError)

  const prefix = storagePrefix(pallet, item)

  switch (hasher) {
    case 'plain': {
      if (parts.length !== 0) {
        return safeError(
          new StorageKeyError(
            `${pallet}.${item} is a storage value and takes no key, got ${parts.length}`,
          ),
        )
      }
      return safeResult(prefix)
    }
    case 'identity': {
      if (parts.length === 0) {
        return safeError(
          new StorageKeyError(`${pallet}.${item} requires at least one key`),
        )
      }
      return safeResult(concatBytes(prefix, ...parts))
    }
    case 'blake2_256': {
      if (parts.length === 0) {
        return safeError(
          new StorageKeyError(`${pallet}.${item} requires at least one key`),
        )
      }
      return safeResult(concatBytes(prefix, blake2_256(concatBytes(...parts))))
    }
    case 'blake2_128_concat': {
      if (parts.length !== 1) {
        return safeError(
          new StorageKeyError(
            `${pallet}.${item} takes exactly one key, got ${parts.length}`,
          ),
        )
      }
      const [key] = parts
      return safeResult(concatBytes(prefix, blake2_128(key), key))
    }
  }
}

/**
 * Wire form of a storage key: `0x`-prefixed hex
 */
export function storageKeyHex(
  pallet: string,
  item: string,
  parts: Uint8Array[],
): Safe<Hex, StorageKeyError> {
  const [error, key] = deriveMapKey(pallet, item, parts)
  if (error) return safeError(error)
  const hex = bytesToHex(key)
  logger.debug(`storage key ${pallet}.${item}: ${hex}`)
  return safeResult(hex)
}

/** u16 little-endian, the on-chain width of a netuid */
export function encodeNetuid(netuid: number): Safe<Uint8Array, EncodeError> {
  if (!Number.isInteger(netuid)) {
    return safeError(new EncodeError(`netuid must be an integer: ${netuid}`))
  }
  return encodeFixedLength(BigInt(netuid), 2)
}

export function encodeUid(uid: number): Safe<Uint8Array, EncodeError> {
  if (!Number.isInteger(uid)) {
    return safeError(new EncodeError(`uid must be an integer: ${uid}`))
  }
  return encodeFixedLength(BigInt(uid), 2)
}

/**
 * Key components of `Uids(netuid, hotkey)`
 */
export function uidsKeyParts(
  netuid: number,
  hotkey: AccountId,
): Safe<Uint8Array[], EncodeError> {
  const [error, encodedNetuid] = encodeNetuid(netuid)
  if (error) return safeError(error)
  return safeResult([encodedNetuid, hotkey])
}
