/**
 * Hasher applied to the key components of each storage item.
 *
 * This mirrors the chain's metadata for the items the client reads. It is a
 * property of the runtime schema and cannot be inferred from the shape of a
 * key: reading with the wrong hasher yields an empty value, not an error.
 */

import type { Safe } from '@subreg/types'
import { StorageKeyError, safeError, safeResult } from '@subreg/types'

export type StorageHasher =
  /** storage value, no key components */
  | 'plain'
  /** raw little-endian key encodings appended as is */
  | 'identity'
  /** blake2_256 over the concatenated key encodings */
  | 'blake2_256'
  /** blake2_128 of the key followed by the key itself */
  | 'blake2_128_concat'

export const STORAGE_ITEMS = {
  SubtensorModule: {
    TotalNetworks: 'plain',
    SubnetworkN: 'identity',
    Difficulty: 'identity',
    Tempo: 'identity',
    ImmunityPeriod: 'identity',
    MinAllowedWeights: 'identity',
    MaxWeightsLimit: 'identity',
    MaxAllowedValidators: 'identity',
    MaxAllowedUids: 'identity',
    Burn: 'identity',
    SubnetOwner: 'identity',
    NetworkModality: 'identity',
    EmissionValues: 'identity',
    Rho: 'identity',
    Kappa: 'identity',
    ScalingLawPower: 'identity',
    BlocksSinceLastStep: 'identity',
    Uids: 'blake2_256',
    Neurons: 'identity',
  },
  System: {
    Account: 'blake2_128_concat',
  },
} as const satisfies Record<string, Record<string, StorageHasher>>

export type PalletName = keyof typeof STORAGE_ITEMS
export type StorageItemName<P extends PalletName> = keyof (typeof STORAGE_ITEMS)[P]
export type SubtensorItem = StorageItemName<'SubtensorModule'>

const HASHER_TABLE: Readonly<
  Record<string, Readonly<Record<string, StorageHasher>>>
> = STORAGE_ITEMS

export function lookupHasher(
  pallet: string,
  item: string,
): Safe<StorageHasher, StorageKeyError> {
  if (!Object.hasOwn(HASHER_TABLE, pallet)) {
    return safeError(new StorageKeyError(`Unknown pallet: ${pallet}`))
  }
  const items = HASHER_TABLE[pallet]
  if (!Object.hasOwn(items, item)) {
    return safeError(
      new StorageKeyError(`Unknown storage item: ${pallet}.${item}`),
    )
  }
  return safeResult(items[item])
}
