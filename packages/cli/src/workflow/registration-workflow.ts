import type { ChainClient } from '@subreg/client'
import { logger } from '@subreg/core'
import type {
  AccountId,
  SafePromise,
  Signer,
  SubregError,
} from '@subreg/types'
import {
  InsufficientBalanceError,
  RetriesExhaustedError,
  safeError,
  safeResult,
} from '@subreg/types'
import { sleep } from 'radash'
import type { Hex } from 'viem'
import { formatTao } from '../utils/format'

export interface WorkflowDelays {
  /** pause before each verification poll */
  verifyMs: number
  /** pause between auto-registration attempts */
  retryMs: number
  /** pause between batch operations */
  batchMs: number
}

export const DEFAULT_DELAYS: WorkflowDelays = {
  verifyMs: 12_000,
  retryMs: 30_000,
  batchMs: 5_000,
}

export const VERIFY_ATTEMPTS = 5

export interface RegisterParams {
  netuid: number
  coldkey: Signer
  hotkey: AccountId
  /** overrides the subnet's current burn */
  burnAmount?: bigint
}

export type RegistrationOutcome =
  | { status: 'already-registered'; uid: number }
  | {
      status: 'submitted'
      txHash: Hex
      burn: bigint
      /** UID seen while verifying, undefined if it never showed up */
      verifiedUid: number | undefined
    }

/**
 * Burned registration end to end: skip when the hotkey already holds a UID,
 * check the coldkey can pay, submit, then poll until the UID appears.
 */
export class RegistrationWorkflow {
  constructor(
    private readonly client: ChainClient,
    private readonly delays: WorkflowDelays = DEFAULT_DELAYS,
  ) {}

  get batchDelayMs(): number {
    return this.delays.batchMs
  }

  async register(
    params: RegisterParams,
  ): SafePromise<RegistrationOutcome, SubregError> {
    const { netuid, coldkey, hotkey } = params

    const [checkError, existing] = await this.client.checkRegistration(
      netuid,
      hotkey,
    )
    if (checkError) return safeError(checkError)
    if (existing) {
      logger.info(
        `Hotkey already registered on subnet ${netuid} with UID ${existing.uid}`,
      )
      return safeResult({ status: 'already-registered', uid: existing.uid })
    }

    const [infoError, subnet] = await this.client.getSubnetInfo(netuid)
    if (infoError) return safeError(infoError)
    const burn = params.burnAmount ?? subnet.burn
    logger.info(`Burn cost: ${formatTao(burn)}`)

    const [blockError, currentBlock] = await this.client.getCurrentBlock()
    if (blockError) return safeError(blockError)

    const [balanceError, balance] = await this.client.getAccountBalance(
      coldkey.publicKey,
    )
    if (balanceError) return safeError(balanceError)
    if (balance < burn) {
      return safeError(new InsufficientBalanceError(burn, balance))
    }
    logger.info(`Coldkey balance: ${formatTao(balance)}`)

    const [submitError, txHash] = await this.client.submitBurnedRegistration(
      {
        netuid,
        hotkey,
        coldkey: coldkey.publicKey,
        burnAmount: burn,
        blockNumber: currentBlock,
      },
      coldkey,
    )
    if (submitError) return safeError(submitError)
    logger.info(`Registration submitted: ${txHash}`)

    const [verifyError, verifiedUid] = await this.verify(netuid, hotkey)
    if (verifyError) return safeError(verifyError)

    return safeResult({ status: 'submitted', txHash, burn, verifiedUid })
  }

  /**
   * Poll for the hotkey's UID. Resolves with `undefined` when every attempt
   * came back empty.
   */
  async verify(
    netuid: number,
    hotkey: AccountId,
  ): SafePromise<number | undefined, SubregError> {
    logger.info('Verifying registration...')

    for (let attempt = 1; attempt <= VERIFY_ATTEMPTS; attempt++) {
      logger.info(`Attempt ${attempt}/${VERIFY_ATTEMPTS}...`)
      await sleep(this.delays.verifyMs)

      const [error, neuron] = await this.client.checkRegistration(netuid, hotkey)
      if (error) return safeError(error)
      if (neuron) {
        logger.info(`Registration verified! Assigned UID: ${neuron.uid}`)
        return safeResult(neuron.uid)
      }
    }

    logger.warn(
      'Registration may still be processing. Check status manually in a few minutes.',
    )
    return safeResult(undefined)
  }

  /**
   * Run `register` up to `maxRetries` times; fails with the last error.
   */
  async autoRegister(
    params: RegisterParams,
    maxRetries: number,
  ): SafePromise<RegistrationOutcome, SubregError> {
    logger.info(`Auto registration with retry (max ${maxRetries} attempts)`)

    let lastError: SubregError | undefined
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      logger.info(`Registration attempt ${attempt}/${maxRetries}`)
      const [error, outcome] = await this.register(params)
      if (!error) return safeResult(outcome)

      lastError = error
      logger.warn(`Attempt ${attempt} failed: ${error.message}`)
      if (attempt < maxRetries) {
        logger.info(`Waiting ${this.delays.retryMs / 1000}s before retry...`)
        await sleep(this.delays.retryMs)
      }
    }

    return safeError(lastError ?? new RetriesExhaustedError(maxRetries))
  }
}
