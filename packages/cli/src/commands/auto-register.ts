import { logger } from '@subreg/core'
import { safeError, safeResult } from '@subreg/types'
import { Command } from 'commander'
import { DEFAULT_MAX_RETRIES } from '../utils/batch-config'
import { accountIdFromString, loadKeypair } from '../utils/key-loading'
import { runWithClient } from '../utils/run'
import { parseNetuid, parsePositiveInt } from '../utils/validation'
import { RegistrationWorkflow } from '../workflow/registration-workflow'
import { reportOutcome } from './register'

interface AutoRegisterOptions {
  subnet: number
  wallet: string
  hotkey: string
  maxRetries: number
}

export function createAutoRegisterCommand(): Command {
  return new Command('auto-register')
    .description('Register with retries, pausing 30s between attempts')
    .requiredOption('-s, --subnet <netuid>', 'Subnet to register on', parseNetuid)
    .requiredOption('-w, --wallet <source>', 'Coldkey paying the burn')
    .requiredOption('-H, --hotkey <source>', 'Hotkey to register')
    .option(
      '--max-retries <count>',
      'Maximum registration attempts',
      parsePositiveInt,
      DEFAULT_MAX_RETRIES,
    )
    .action(async (options: AutoRegisterOptions, command: Command) => {
      await runWithClient(command, async (client) => {
        const [walletError, coldkey] = await loadKeypair(options.wallet)
        if (walletError) return safeError(walletError)
        const [hotkeyError, hotkey] = await accountIdFromString(options.hotkey)
        if (hotkeyError) return safeError(hotkeyError)

        const [error, outcome] = await new RegistrationWorkflow(
          client,
        ).autoRegister(
          { netuid: options.subnet, coldkey, hotkey },
          options.maxRetries,
        )
        if (error) return safeError(error)

        logger.info('Auto registration completed')
        reportOutcome(outcome)
        return safeResult(undefined)
      })
    })
}
