import type { ChainClient } from '@subreg/client'
import { logger } from '@subreg/core'
import type { AccountId, Safe, SafePromise, Signer } from '@subreg/types'
import { safeError, safeResult } from '@subreg/types'
import { sleep } from 'radash'
import {
  type BatchConfig,
  type BatchOperation,
  DEFAULT_MAX_RETRIES,
} from '../utils/batch-config'
import { statusLines } from '../utils/report'
import type { RegistrationWorkflow } from './registration-workflow'
import { checkStatus } from './status'

export interface KeySources {
  loadSigner(source: string): SafePromise<Signer, Error>
  loadAccountId(source: string): SafePromise<AccountId, Error>
}

export interface BatchSummary {
  completed: number
  failed: number
  skipped: number
}

type OperationResult = 'completed' | 'failed' | 'skipped'

/**
 * Run the operations in order. A failing or skipped operation is reported
 * and the batch moves on.
 */
export class BatchRunner {
  constructor(
    private readonly client: ChainClient,
    private readonly workflow: RegistrationWorkflow,
    private readonly keys: KeySources,
  ) {}

  async run(config: BatchConfig): Promise<BatchSummary> {
    const summary: BatchSummary = { completed: 0, failed: 0, skipped: 0 }
    const { operations } = config
    logger.info(`Found ${operations.length} operations`)

    for (const [index, operation] of operations.entries()) {
      logger.info(
        `Operation ${index + 1}/${operations.length}: ${operation.operation}`,
      )
      const result = await this.runOperation(operation)
      summary[result]++

      if (index < operations.length - 1) {
        logger.info(
          `Waiting ${this.workflow.batchDelayMs / 1000}s before next operation...`,
        )
        await sleep(this.workflow.batchDelayMs)
      }
    }

    logger.info(
      `Batch operations completed: ${summary.completed} completed, ${summary.failed} failed, ${summary.skipped} skipped`,
    )
    return summary
  }

  private async runOperation(operation: BatchOperation): Promise<OperationResult> {
    switch (operation.operation) {
      case 'check_status':
        return this.report('Status check', await this.status(operation))
      case 'register':
      case 'auto_register': {
        if (operation.wallet === undefined) {
          logger.warn(`${operation.operation} needs a wallet, skipping`)
          return 'skipped'
        }
        const label =
          operation.operation === 'register' ? 'Registration' : 'Auto registration'
        return this.report(
          label,
          await this.register(operation, operation.wallet),
        )
      }
      default:
        logger.warn(`Unknown operation: ${operation.operation}`)
        return 'skipped'
    }
  }

  private report(
    label: string,
    [error]: Safe<unknown, Error>,
  ): OperationResult {
    if (error) {
      logger.error(`${label} failed: ${error.message}`)
      return 'failed'
    }
    logger.info(`${label} completed`)
    return 'completed'
  }

  private async status(operation: BatchOperation): SafePromise<void, Error> {
    const [keyError, hotkey] = await this.keys.loadAccountId(operation.hotkey)
    if (keyError) return safeError(keyError)

    const [error, status] = await checkStatus(this.client, operation.subnet, hotkey)
    if (error) return safeError(error)
    for (const line of statusLines(status)) logger.info(line)
    return safeResult(undefined)
  }

  private async register(
    operation: BatchOperation,
    wallet: string,
  ): SafePromise<void, Error> {
    const [signerError, coldkey] = await this.keys.loadSigner(wallet)
    if (signerError) return safeError(signerError)
    const [hotkeyError, hotkey] = await this.keys.loadAccountId(operation.hotkey)
    if (hotkeyError) return safeError(hotkeyError)

    const params = { netuid: operation.subnet, coldkey, hotkey }
    const [error] =
      operation.operation === 'register'
        ? await this.workflow.register(params)
        : await this.workflow.autoRegister(
            params,
            operation.max_retries ?? DEFAULT_MAX_RETRIES,
          )
    if (error) return safeError(error)
    return safeResult(undefined)
  }
}
