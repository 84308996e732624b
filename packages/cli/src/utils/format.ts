import { encodeSs58 } from '@subreg/core'
import type { AccountId } from '@subreg/types'
import { RAO_PER_TAO } from '@subreg/types'

/** Reference price used for rough USD estimates */
export const ESTIMATE_USD_PER_TAO = 200

export function formatTao(rao: bigint): string {
  const tao = Number(rao) / Number(RAO_PER_TAO)
  if (tao >= 1000) return `${(tao / 1000).toFixed(1)}K TAO`
  if (tao >= 1) return `${tao.toFixed(3)} TAO`
  if (rao >= 1_000_000n) return `${(Number(rao) / 1e6).toFixed(1)}M RAO`
  if (rao >= 1_000n) return `${(Number(rao) / 1e3).toFixed(1)}K RAO`
  return `${rao} RAO`
}

const DIFFICULTY_UNITS: ReadonlyArray<[bigint, number, string]> = [
  [10n ** 18n, 1e18, 'E'],
  [10n ** 15n, 1e15, 'P'],
  [10n ** 12n, 1e12, 'T'],
  [10n ** 9n, 1e9, 'G'],
  [10n ** 6n, 1e6, 'M'],
]

export function formatDifficulty(difficulty: bigint): string {
  for (const [threshold, divisor, suffix] of DIFFICULTY_UNITS) {
    if (difficulty > threshold) {
      return `${(Number(difficulty) / divisor).toFixed(2)}${suffix}`
    }
  }
  return difficulty.toString()
}

export function formatSs58Short(ss58: string): string {
  if (ss58.length <= 16) return ss58
  return `${ss58.slice(0, 8)}...${ss58.slice(-8)}`
}

export function formatAccountShort(accountId: AccountId): string {
  return formatSs58Short(encodeSs58(accountId))
}

export function estimateUsd(rao: bigint, usdPerTao = ESTIMATE_USD_PER_TAO): string {
  return `~$${((Number(rao) / Number(RAO_PER_TAO)) * usdPerTao).toFixed(2)}`
}
