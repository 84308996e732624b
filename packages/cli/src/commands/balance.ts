import { decodeSs58, logger } from '@subreg/core'
import { safeError, safeResult } from '@subreg/types'
import { Command } from 'commander'
import { balanceLines } from '../utils/report'
import { runWithClient } from '../utils/run'

export function createBalanceCommand(): Command {
  return new Command('balance')
    .description('Show the free balance of an account')
    .requiredOption('-a, --address <ss58>', 'SS58 address of the account')
    .action(async (options: { address: string }, command: Command) => {
      const [addressError, account] = decodeSs58(options.address)
      if (addressError) {
        logger.error(`Invalid SS58 address: ${options.address}`, addressError)
        process.exit(1)
      }

      await runWithClient(command, async (client) => {
        const [error, free] = await client.getAccountBalance(account)
        if (error) return safeError(error)

        for (const line of balanceLines(options.address, free)) logger.info(line)
        return safeResult(undefined)
      })
    })
}
