import { logger } from '@subreg/core'
import { safeError, safeResult } from '@subreg/types'
import { Command } from 'commander'
import { formatTao } from '../utils/format'
import { accountIdFromString, loadKeypair } from '../utils/key-loading'
import { runWithClient } from '../utils/run'
import { parseNetuid, parseRao } from '../utils/validation'
import {
  type RegistrationOutcome,
  RegistrationWorkflow,
} from '../workflow/registration-workflow'

interface RegisterOptions {
  subnet: number
  wallet: string
  hotkey: string
  burnAmount?: bigint
}

export function reportOutcome(outcome: RegistrationOutcome): void {
  if (outcome.status === 'already-registered') {
    logger.info(`Nothing to do: hotkey already holds UID ${outcome.uid}`)
    return
  }
  logger.info(`Transaction hash: ${outcome.txHash}`)
  logger.info(`Burned: ${formatTao(outcome.burn)}`)
  if (outcome.verifiedUid !== undefined) {
    logger.info(`Assigned UID: ${outcome.verifiedUid}`)
  }
}

export function createRegisterCommand(): Command {
  return new Command('register')
    .description('Register a hotkey on a subnet by burning TAO')
    .requiredOption('-s, --subnet <netuid>', 'Subnet to register on', parseNetuid)
    .requiredOption(
      '-w, --wallet <source>',
      'Coldkey paying the burn (dev URI, key file, seed or mnemonic)',
    )
    .requiredOption(
      '-H, --hotkey <source>',
      'Hotkey to register (dev URI, key file, SS58 address or seed)',
    )
    .option(
      '--burn-amount <rao>',
      'Burn amount in RAO, defaults to the current subnet burn',
      parseRao,
    )
    .action(async (options: RegisterOptions, command: Command) => {
      await runWithClient(command, async (client) => {
        const [walletError, coldkey] = await loadKeypair(options.wallet)
        if (walletError) return safeError(walletError)
        const [hotkeyError, hotkey] = await accountIdFromString(options.hotkey)
        if (hotkeyError) return safeError(hotkeyError)

        logger.info(`Registering on subnet ${options.subnet}`)
        const [error, outcome] = await new RegistrationWorkflow(client).register({
          netuid: options.subnet,
          coldkey,
          hotkey,
          burnAmount: options.burnAmount,
        })
        if (error) return safeError(error)

        reportOutcome(outcome)
        return safeResult(undefined)
      })
    })
}
