/**
 * Domain types for subnet state, neurons, balances and extrinsics
 */

/** Raw 32-byte account identifier */
export type AccountId = Uint8Array

export type FixedLengthSize = 1 | 2 | 4 | 8 | 16 | 32

export interface DecodingResult<T> {
  value: T
  remaining: Uint8Array
  consumed: number
}

export interface SubnetSnapshot {
  netuid: number
  difficulty: bigint
  tempo: number
  immunityPeriod: number
  minAllowedWeights: number
  maxWeightLimit: number
  maxAllowedValidators: number
  /** MaxAllowedUids */
  maxN: number
  /** registered neurons */
  subnetworkN: number
  burn: bigint
  owner: AccountId
  ownerSs58: string
  modality: number
  emissionValue: bigint
  rho: number
  kappa: number
  scalingLawPower: number
  blocksSinceEpoch: bigint
  currentBlock: bigint
  registrationOpen: boolean
}

export interface AxonInfo {
  block: bigint
  version: number
  ip: bigint
  port: number
  ipType: number
  protocol: number
}

export interface PrometheusInfo {
  block: bigint
  version: number
  ip: bigint
  port: number
  ipType: number
}

export interface NeuronRecord {
  hotkey: AccountId
  coldkey: AccountId
  uid: number
  netuid: number
  active: boolean
  axonInfo: AxonInfo
  prometheusInfo: PrometheusInfo
  stake: Array<[AccountId, bigint]>
  rank: number
  emission: bigint
  incentive: number
  consensus: number
  trust: number
  validatorTrust: number
  dividends: number
  lastUpdate: bigint
  validatorPermit: boolean
  weights: Array<[number, number]>
  bonds: Array<[number, number]>
  pruningScore: number
  /** byte length of the raw neuron storage value */
  rawLength: number
}

export interface AccountData {
  free: bigint
  reserved: bigint
  frozen: bigint
  flags: bigint
}

export interface AccountInfo {
  nonce: number
  consumers: number
  providers: number
  sufficients: number
  data: AccountData
}

export interface RegistrationRequest {
  netuid: number
  hotkey: AccountId
  coldkey: AccountId
  burnAmount: bigint
  blockNumber: bigint
}

/**
 * Anything that can produce an sr25519 signature over a message.
 * A `KeyringPair` from @polkadot/keyring satisfies it.
 */
export interface Signer {
  readonly publicKey: Uint8Array
  sign(message: Uint8Array): Uint8Array
}

export interface MortalEra {
  period: bigint
  phase: bigint
}

export interface DecodedExtrinsic {
  /** envelope length carried by the prefix */
  length: number
  version: number
  signer: AccountId
  signature: Uint8Array
  era: Uint8Array
  nonce: bigint
  tip: bigint
  call: Uint8Array
}
