import { logger } from '@subreg/core'
import { safeError, safeResult } from '@subreg/types'
import { Command, type OptionValues } from 'commander'
import { networkStatsLines } from '../utils/report'
import { runWithClient } from '../utils/run'
import { collectNetworkStats } from '../workflow/network-stats'

export function createNetworkStatsCommand(): Command {
  return new Command('network-stats')
    .description('Summarize the first subnets of the network')
    .action(async (_options: OptionValues, command: Command) => {
      await runWithClient(command, async (client) => {
        logger.info('Collecting network statistics...')
        const [error, stats] = await collectNetworkStats(client)
        if (error) return safeError(error)

        for (const line of networkStatsLines(stats)) logger.info(line)
        return safeResult(undefined)
      })
    })
}
