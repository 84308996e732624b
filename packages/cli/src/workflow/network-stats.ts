import type { ChainClient } from '@subreg/client'
import { logger } from '@subreg/core'
import type { SafePromise, SubnetSnapshot, SubregError } from '@subreg/types'
import { SubnetNotFoundError, safeError, safeResult } from '@subreg/types'

export const NETWORK_STATS_SUBNETS: readonly number[] = Array.from(
  { length: 12 },
  (_, netuid) => netuid,
)

export interface NetworkStats {
  subnets: SubnetSnapshot[]
  totalNeurons: number
  currentBlock: bigint
}

/**
 * Snapshot every subnet in `netuids`. Subnets that do not exist are left
 * out of the result.
 */
export async function collectNetworkStats(
  client: ChainClient,
  netuids: readonly number[] = NETWORK_STATS_SUBNETS,
): SafePromise<NetworkStats, SubregError> {
  const subnets: SubnetSnapshot[] = []

  for (const netuid of netuids) {
    const [error, snapshot] = await client.getSubnetInfo(netuid)
    if (error instanceof SubnetNotFoundError) {
      logger.debug(`Subnet ${netuid} does not exist, skipping`)
      continue
    }
    if (error) return safeError(error)
    subnets.push(snapshot)
  }

  const [blockError, currentBlock] = await client.getCurrentBlock()
  if (blockError) return safeError(blockError)

  return safeResult({
    subnets,
    totalNeurons: subnets.reduce((sum, subnet) => sum + subnet.subnetworkN, 0),
    currentBlock,
  })
}
