/**
 * Hashing, hex and sr25519 helpers used by storage keys and extrinsics
 */

import { blake2b } from '@noble/hashes/blake2b'
import {
  cryptoWaitReady,
  decodeAddress,
  encodeAddress,
  sr25519Verify,
  xxhashAsU8a,
} from '@polkadot/util-crypto'
import {
  DecodeError,
  KeyLoadError,
  type Safe,
  SS58_FORMAT,
  safeError,
  safeResult,
} from '@subreg/types'
import { bytesToHex, type Hex, hexToBytes } from 'viem'

/**
 * Check if a string is a valid hex string
 */
export function isValidHex(value: string): value is Hex {
  return /^0x[0-9a-fA-F]*$/.test(value)
}

/**
 * 128-bit xxhash (two seeded xxhash64 rounds), used for storage prefixes
 */
export function twox128(data: string | Uint8Array): Uint8Array {
  return xxhashAsU8a(data, 128)
}

export function blake2_128(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 16 })
}

export function blake2_256(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 32 })
}

/**
 * Decode a `0x`-prefixed, even-length hex string as returned by the node
 */
export function decodeHexPayload(value: string): Safe<Uint8Array, DecodeError> {
  if (!isValidHex(value)) {
    return safeError(
      new DecodeError(`Expected 0x-prefixed hex, got "${value.slice(0, 18)}"`),
    )
  }
  if (value.length % 2 !== 0) {
    return safeError(
      new DecodeError(`Hex payload has odd length ${value.length - 2}`),
    )
  }
  return safeResult(hexToBytes(value))
}

export function toHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes)
}

export function encodeSs58(accountId: Uint8Array): string {
  return encodeAddress(accountId, SS58_FORMAT)
}

export function decodeSs58(address: string): Safe<Uint8Array, KeyLoadError> {
  try {
    return safeResult(decodeAddress(address, false, SS58_FORMAT))
  } catch (error) {
    return safeError(
      new KeyLoadError(`Invalid SS58 address: ${address}`, { cause: error }),
    )
  }
}

/**
 * Verify an sr25519 signature. `waitForCrypto()` must have resolved first.
 */
export function verifySr25519(
  message: Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array,
): boolean {
  return sr25519Verify(message, signature, publicKey)
}

/**
 * Resolve once the WASM crypto backend used by sr25519 is ready
 */
export async function waitForCrypto(): Promise<boolean> {
  return cryptoWaitReady()
}
