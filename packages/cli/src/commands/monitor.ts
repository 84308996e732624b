import type { ChainClient } from '@subreg/client'
import { logger } from '@subreg/core'
import type { SafePromise } from '@subreg/types'
import { TransportError, safeError, safeResult } from '@subreg/types'
import { Command } from 'commander'
import { sleep } from 'radash'
import { formatAccountShort } from '../utils/format'
import { accountIdFromString } from '../utils/key-loading'
import { statusLines } from '../utils/report'
import { describeFailure, runWithClient } from '../utils/run'
import {
  type NeuronTarget,
  collectNeuronTargets,
  parsePositiveInt,
} from '../utils/validation'
import { checkStatus } from '../workflow/status'

interface MonitorOptions {
  neurons: NeuronTarget[]
  interval: number
}

/**
 * One pass over every target; resolves with the number of targets that
 * failed. A lost connection ends the pass with the transport error.
 */
export async function monitorOnce(
  client: ChainClient,
  targets: NeuronTarget[],
): SafePromise<number, TransportError> {
  let failures = 0
  logger.info(`Monitoring ${targets.length} registration(s)...`)

  for (const target of targets) {
    const [keyError, hotkey] = await accountIdFromString(target.hotkey)
    if (keyError) {
      failures++
      logger.error(`Subnet ${target.netuid}: ${keyError.message}`)
      continue
    }

    logger.info(`Subnet ${target.netuid} - ${formatAccountShort(hotkey)}`)
    const [error, status] = await checkStatus(client, target.netuid, hotkey)
    if (error instanceof TransportError) return safeError(error)
    if (error) {
      failures++
      const failure = await describeFailure(client, error)
      logger.error(`Error: ${failure.message}`)
      continue
    }
    for (const line of statusLines(status)) logger.info(line)
  }

  return safeResult(failures)
}

export function createMonitorCommand(): Command {
  return new Command('monitor')
    .description('Repeatedly check the status of several neurons')
    .requiredOption(
      '-n, --neurons <subnet:hotkey...>',
      'Neurons to watch, as subnet:hotkey pairs',
      collectNeuronTargets,
    )
    .option(
      '--interval <seconds>',
      'Seconds between checks',
      parsePositiveInt,
      60,
    )
    .action(async (options: MonitorOptions, command: Command) => {
      await runWithClient(command, async (client) => {
        for (;;) {
          const [error, failures] = await monitorOnce(client, options.neurons)
          if (error) return safeError(error)
          if (failures > 0) logger.warn(`${failures} check(s) failed`)

          logger.info(`Waiting ${options.interval}s before next check...`)
          await sleep(options.interval * 1000)
        }
      })
    })
}
