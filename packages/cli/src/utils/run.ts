import { ChainClient } from '@subreg/client'
import { logger } from '@subreg/core'
import type { SafePromise } from '@subreg/types'
import { SubnetNotFoundError } from '@subreg/types'
import type { Command } from 'commander'
import { z } from 'zod'
import { rpcUrlSchema } from './validation'

const globalOptionsSchema = z.object({
  rpcUrl: rpcUrlSchema.optional(),
})

export function fail(message: string, error?: unknown): never {
  logger.error(message, error)
  process.exit(1)
}

/**
 * Add the subnet count to a missing-subnet error when the chain can tell us
 */
export async function describeFailure(
  client: ChainClient,
  error: Error,
): Promise<Error> {
  if (!(error instanceof SubnetNotFoundError)) return error
  const [totalError, total] = await client.getTotalNetworks()
  if (totalError) {
    logger.debug('Could not read the subnet count', totalError)
    return error
  }
  return new SubnetNotFoundError(error.netuid, total)
}

/**
 * Connect using the global `--rpc-url`, run `task`, close the connection and
 * exit non-zero when the task failed.
 */
export async function runWithClient(
  command: Command,
  task: (client: ChainClient) => SafePromise<void, Error>,
): Promise<void> {
  const options = globalOptionsSchema.safeParse(command.optsWithGlobals())
  if (!options.success) {
    fail(`Invalid --rpc-url: ${options.error.issues[0]?.message ?? 'unknown issue'}`)
  }
  const { rpcUrl } = options.data

  const [connectError, client] = await ChainClient.connect({ url: rpcUrl })
  if (connectError) fail('Failed to connect', connectError)

  const [taskError] = await task(client)
  const failure = taskError ? await describeFailure(client, taskError) : undefined
  await client.close()

  if (failure) fail(`${command.name()} failed: ${failure.message}`, failure)
}
