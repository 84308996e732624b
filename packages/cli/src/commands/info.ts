import { logger } from '@subreg/core'
import { safeError, safeResult } from '@subreg/types'
import { Command } from 'commander'
import { subnetInfoLines } from '../utils/report'
import { runWithClient } from '../utils/run'
import { parseNetuid } from '../utils/validation'

export function createInfoCommand(): Command {
  return new Command('info')
    .description('Show subnet parameters and the current block')
    .requiredOption('-s, --subnet <netuid>', 'Subnet to describe', parseNetuid)
    .action(async (options: { subnet: number }, command: Command) => {
      await runWithClient(command, async (client) => {
        const [error, subnet] = await client.getSubnetInfo(options.subnet)
        if (error) return safeError(error)

        for (const line of subnetInfoLines(subnet)) logger.info(line)
        return safeResult(undefined)
      })
    })
}
