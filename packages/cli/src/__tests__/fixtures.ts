import { Keyring } from '@polkadot/keyring'
import type { KeyringPair } from '@polkadot/keyring/types'
import { InMemoryRpcChannel } from '@subreg/client'
import { encodeFixedLength, encodeUid, uidsKeyParts } from '@subreg/codec'
import type { AccountId, SubnetSnapshot } from '@subreg/types'
import { SS58_FORMAT } from '@subreg/types'
import { concat, hexToBytes } from 'viem'
import type { WorkflowDelays } from '../workflow/registration-workflow'

export const ALICE = hexToBytes(
  '0xd43593c715fdd31c61141abd04a99fd6822c8558854ccde39a5684e7a56da27d',
)
export const BOB = hexToBytes(
  '0x8eaf04151687736326c9fea17e25fc5287613693c912909cb226aa4794f26a48',
)
export const ALICE_SS58 = '5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY'

export const NO_DELAYS: WorkflowDelays = { verifyMs: 0, retryMs: 0, batchMs: 0 }

export function devPair(uri: string): KeyringPair {
  return new Keyring({ type: 'sr25519', ss58Format: SS58_FORMAT }).addFromUri(uri)
}

export function le(value: bigint, length: 2 | 4 | 8 | 16 | 32): Uint8Array {
  const [error, encoded] = encodeFixedLength(value, length)
  if (error) throw error
  return encoded
}

export function accountInfo(nonce: number, free: bigint): Uint8Array {
  return concat([
    le(BigInt(nonce), 4),
    le(0n, 4),
    le(1n, 4),
    le(0n, 4),
    le(free, 16),
    le(0n, 16),
    le(0n, 16),
    le(0n, 16),
  ])
}

/**
 * A chain at block 100 with subnet `netuid` (10 of 256 slots, 1 TAO burn)
 * and Alice holding `free` RAO at nonce 3
 */
export function chainWithSubnet(
  netuid: number,
  free: bigint,
): InMemoryRpcChannel {
  const key = le(BigInt(netuid), 2)
  return new InMemoryRpcChannel(100n)
    .setStorageItem('SubtensorModule', 'SubnetworkN', [key], le(10n, 2))
    .setStorageItem('SubtensorModule', 'MaxAllowedUids', [key], le(256n, 2))
    .setStorageItem('SubtensorModule', 'Burn', [key], le(1_000_000_000n, 8))
    .setStorageItem('SubtensorModule', 'Difficulty', [key], le(1_000_000n, 32))
    .setStorageItem('SubtensorModule', 'SubnetOwner', [key], ALICE)
    .setStorageItem('System', 'Account', [ALICE], accountInfo(3, free))
}

/** Store a UID and a neuron value for `hotkey` */
export function registerNeuron(
  channel: InMemoryRpcChannel,
  netuid: number,
  hotkey: AccountId,
  uid: number,
): void {
  const [partsError, parts] = uidsKeyParts(netuid, hotkey)
  if (partsError) throw partsError
  const [uidError, uidKey] = encodeUid(uid)
  if (uidError) throw uidError
  channel
    .setStorageItem('SubtensorModule', 'Uids', parts, le(BigInt(uid), 2))
    .setStorageItem('SubtensorModule', 'Neurons', [parts[0], uidKey], new Uint8Array(12))
}

export function snapshot(overrides: Partial<SubnetSnapshot> = {}): SubnetSnapshot {
  return {
    netuid: 1,
    difficulty: 1_000_000n,
    tempo: 99,
    immunityPeriod: 4096,
    minAllowedWeights: 1,
    maxWeightLimit: 65535,
    maxAllowedValidators: 64,
    maxN: 256,
    subnetworkN: 10,
    burn: 1_000_000_000n,
    owner: ALICE,
    ownerSs58: ALICE_SS58,
    modality: 0,
    emissionValue: 0n,
    rho: 10,
    kappa: 32767,
    scalingLawPower: 50,
    blocksSinceEpoch: 12n,
    currentBlock: 100n,
    registrationOpen: true,
    ...overrides,
  }
}
