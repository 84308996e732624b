/**
 * Scalar decoders for storage values.
 *
 * Each reads the leading N bytes and yields zero when fewer are present.
 * Callers tell "absent" from "zero" by checking the read result before
 * decoding.
 */

import type { AccountId } from '@subreg/types'
import { ACCOUNT_ID_LENGTH } from '@subreg/types'
import { decodeFixedBytes } from '../core/bytes'
import { decodeFixedLength } from '../core/fixed-length'

export function decodeU16OrZero(raw: Uint8Array): number {
  const [error, result] = decodeFixedLength(raw, 2)
  return error ? 0 : Number(result.value)
}

export function decodeU32OrZero(raw: Uint8Array): number {
  const [error, result] = decodeFixedLength(raw, 4)
  return error ? 0 : Number(result.value)
}

export function decodeU64OrZero(raw: Uint8Array): bigint {
  const [error, result] = decodeFixedLength(raw, 8)
  return error ? 0n : result.value
}

export function decodeU128OrZero(raw: Uint8Array): bigint {
  const [error, result] = decodeFixedLength(raw, 16)
  return error ? 0n : result.value
}

export function decodeU256OrZero(raw: Uint8Array): bigint {
  const [error, result] = decodeFixedLength(raw, 32)
  return error ? 0n : result.value
}

export function decodeAccountIdOrZero(raw: Uint8Array): AccountId {
  const [error, result] = decodeFixedBytes(raw, ACCOUNT_ID_LENGTH)
  return error ? new Uint8Array(ACCOUNT_ID_LENGTH) : result.value
}
