/**
 * Argument parsers for commander options
 */

import { InvalidArgumentError } from 'commander'
import { z } from 'zod'

export const rpcUrlSchema = z
  .string()
  .url()
  .refine((value) => /^wss?:\/\//.test(value), {
    message: 'Expected a ws:// or wss:// URL',
  })

const UINT_PATTERN = /^\d+$/

export function parseNetuid(value: string): number {
  if (!UINT_PATTERN.test(value) || Number(value) > 0xffff) {
    throw new InvalidArgumentError('Subnet must be an integer from 0 to 65535.')
  }
  return Number(value)
}

export function parseRpcUrl(value: string): string {
  const parsed = rpcUrlSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidArgumentError('RPC URL must be a ws:// or wss:// URL.')
  }
  return parsed.data
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!UINT_PATTERN.test(value) || !Number.isSafeInteger(parsed) || parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

/**
 * Amount in RAO, kept as bigint so u64 values survive intact
 */
export function parseRao(value: string): bigint {
  if (!UINT_PATTERN.test(value) || BigInt(value) > 0xffff_ffff_ffff_ffffn) {
    throw new InvalidArgumentError('Amount must be an unsigned 64-bit RAO value.')
  }
  return BigInt(value)
}

export interface NeuronTarget {
  netuid: number
  hotkey: string
}

/**
 * `subnet:hotkey`, the hotkey being anything `accountIdFromString` accepts
 */
export function parseNeuronTarget(value: string): NeuronTarget {
  const separator = value.indexOf(':')
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError(`Invalid format: ${value}. Use subnet:hotkey`)
  }
  return {
    netuid: parseNetuid(value.slice(0, separator)),
    hotkey: value.slice(separator + 1),
  }
}

export function collectNeuronTargets(
  value: string,
  previous: NeuronTarget[] = [],
): NeuronTarget[] {
  return [...previous, parseNeuronTarget(value)]
}
