import type { ChainClient } from '@subreg/client'
import type {
  AccountId,
  NeuronRecord,
  SafePromise,
  SubnetSnapshot,
  SubregError,
} from '@subreg/types'
import { safeError, safeResult } from '@subreg/types'

export interface RegistrationStatus {
  netuid: number
  hotkey: AccountId
  /** undefined when the hotkey holds no UID on the subnet */
  neuron: NeuronRecord | undefined
  subnet: SubnetSnapshot
}

export async function checkStatus(
  client: ChainClient,
  netuid: number,
  hotkey: AccountId,
): SafePromise<RegistrationStatus, SubregError> {
  const [checkError, neuron] = await client.checkRegistration(netuid, hotkey)
  if (checkError) return safeError(checkError)

  const [infoError, subnet] = await client.getSubnetInfo(netuid)
  if (infoError) return safeError(infoError)

  return safeResult({ netuid, hotkey, neuron, subnet })
}
