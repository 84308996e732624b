import { logger } from '@subreg/core'
import { safeResult } from '@subreg/types'
import { Command } from 'commander'
import { loadBatchConfig } from '../utils/batch-config'
import { accountIdFromString, loadKeypair } from '../utils/key-loading'
import { runWithClient } from '../utils/run'
import { BatchRunner } from '../workflow/batch-runner'
import { RegistrationWorkflow } from '../workflow/registration-workflow'

export function createBatchCommand(): Command {
  return new Command('batch')
    .description('Run register, check_status and auto_register operations from a file')
    .requiredOption('-c, --config <file>', 'Batch configuration JSON file')
    .action(async (options: { config: string }, command: Command) => {
      logger.info(`Executing batch operations from: ${options.config}`)
      const [configError, config] = await loadBatchConfig(options.config)
      if (configError) {
        logger.error(configError.message, configError.cause)
        process.exit(1)
      }

      await runWithClient(command, async (client) => {
        const runner = new BatchRunner(client, new RegistrationWorkflow(client), {
          loadSigner: loadKeypair,
          loadAccountId: accountIdFromString,
        })
        await runner.run(config)
        return safeResult(undefined)
      })
    })
}
