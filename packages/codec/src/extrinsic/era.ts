/**
 * Mortal era encoding
 *
 * Two bytes: the low nibble of the first carries the period class
 * (trailing zeros of the period minus one, floored at 1), the high nibble the
 * quantized phase of the current block within the period. The second byte is
 * always zero for periods up to 64.
 */

import type { MortalEra, Safe } from '@subreg/types'
import { DecodeError, MORTAL_ERA_PERIOD, safeError, safeResult } from '@subreg/types'

function trailingZeros(value: bigint): number {
  let count = 0
  let rest = value
  while (rest > 0n && (rest & 1n) === 0n) {
    rest >>= 1n
    count++
  }
  return count
}

export function encodeMortalEra(currentBlock: bigint): Uint8Array {
  const period = MORTAL_ERA_PERIOD
  const low = Math.max(1, trailingZeros(period) - 1)
  const high = Number(((currentBlock % period) / (period >> 4n)) & 0xfn)
  return new Uint8Array([low | (high << 4), 0])
}

export function decodeMortalEra(era: Uint8Array): Safe<MortalEra, DecodeError> {
  if (era.length !== 2 || era[0] === 0) {
    return safeError(new DecodeError('Era is not a two-byte mortal era'))
  }
  const low = era[0] & 0xf
  const high = BigInt(era[0] >> 4)
  const period = 2n << BigInt(low)
  return safeResult({ period, phase: high * (period >> 4n) })
}
