import { logger } from '@subreg/core'
import { safeError, safeResult } from '@subreg/types'
import { Command } from 'commander'
import { estimateLines } from '../utils/report'
import { runWithClient } from '../utils/run'
import { parseNetuid } from '../utils/validation'

export function createEstimateCommand(): Command {
  return new Command('estimate')
    .description('Estimate the cost of a burned registration')
    .requiredOption('-s, --subnet <netuid>', 'Subnet to price', parseNetuid)
    .action(async (options: { subnet: number }, command: Command) => {
      await runWithClient(command, async (client) => {
        const [error, subnet] = await client.getSubnetInfo(options.subnet)
        if (error) return safeError(error)

        for (const line of estimateLines(subnet)) logger.info(line)
        return safeResult(undefined)
      })
    })
}
