import { logger } from '@subreg/core'
import { safeError, safeResult } from '@subreg/types'
import { Command } from 'commander'
import { accountIdFromString } from '../utils/key-loading'
import { statusLines } from '../utils/report'
import { runWithClient } from '../utils/run'
import { parseNetuid } from '../utils/validation'
import { checkStatus } from '../workflow/status'

interface StatusOptions {
  subnet: number
  hotkey: string
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Check whether a hotkey is registered on a subnet')
    .requiredOption('-s, --subnet <netuid>', 'Subnet to check', parseNetuid)
    .requiredOption('-H, --hotkey <source>', 'Hotkey to look up')
    .action(async (options: StatusOptions, command: Command) => {
      await runWithClient(command, async (client) => {
        const [keyError, hotkey] = await accountIdFromString(options.hotkey)
        if (keyError) return safeError(keyError)

        const [error, status] = await checkStatus(client, options.subnet, hotkey)
        if (error) return safeError(error)

        for (const line of statusLines(status)) logger.info(line)
        return safeResult(undefined)
      })
    })
}
