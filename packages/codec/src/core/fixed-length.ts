/**
 * Fixed-Length Integer Serialization
 *
 * Values are encoded in little-endian order using exactly `length` bytes:
 *
 *   encode[l](x) = ⟨x mod 256⟩ ∥ encode[l-1](⌊x/256⌋),  encode[0](x) = ⟨⟩
 *
 * Example: encode[4](0x12345678) = [0x78, 0x56, 0x34, 0x12]
 *
 * Widths are restricted to {1, 2, 4, 8, 16, 32} bytes, covering u8 up to u256.
 */

import type { DecodingResult, FixedLengthSize, Safe } from '@subreg/types'
import { DecodeError, EncodeError, safeError, safeResult } from '@subreg/types'

/**
 * Encode a natural number using fixed-length little-endian encoding
 *
 * @param length - width in bytes
 */
export function encodeFixedLength(
  value: bigint,
  length: FixedLengthSize,
): Safe<Uint8Array, EncodeError> {
  if (value < 0n) {
    return safeError(
      new EncodeError(`Natural number cannot be negative: ${value}`),
    )
  }

  const maxValue = 2n ** (8n * BigInt(length)) - 1n
  if (value > maxValue) {
    return safeError(
      new EncodeError(
        `Value ${value} exceeds maximum for ${length}-byte encoding: ${maxValue}`,
      ),
    )
  }

  const result = new Uint8Array(length)
  for (let i = 0; i < length; i++) {
    result[i] = Number((value >> (8n * BigInt(i))) & 0xffn)
  }

  return safeResult(result)
}

/**
 * Decode a natural number from fixed-length little-endian encoding
 *
 * @returns the value plus the bytes that follow it
 */
export function decodeFixedLength(
  data: Uint8Array,
  length: FixedLengthSize,
): Safe<DecodingResult<bigint>, DecodeError> {
  if (data.length < length) {
    return safeError(
      new DecodeError(
        `Insufficient data for ${length}-byte decoding (got ${data.length} bytes)`,
      ),
    )
  }

  let value = 0n
  for (let i = 0; i < length; i++) {
    value |= BigInt(data[i]) << BigInt(8 * i)
  }

  return safeResult({
    value,
    remaining: data.slice(length),
    consumed: length,
  })
}
