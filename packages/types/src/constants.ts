/**
 * Chain constants for the subtensor network
 */

export const SS58_FORMAT = 42

export const DEFAULT_RPC_ENDPOINTS = [
  'wss://entrypoint-finney.opentensor.ai:443',
  'wss://archive.chain.opentensor.ai:443',
] as const

export const DEFAULT_RPC_URL = DEFAULT_RPC_ENDPOINTS[0]

export const NETWORK_NAME = 'finney'

// Call indices
export const SUBTENSOR_MODULE_INDEX = 8
export const BURNED_REGISTER_CALL_INDEX = 1

export const BLOCK_TIME_SECONDS = 12
export const TAO_DECIMALS = 9
export const RAO_PER_TAO = 1_000_000_000n

// Extrinsic format
export const EXTRINSIC_VERSION_SIGNED = 0x84
export const MORTAL_ERA_PERIOD = 64n
export const SIGNING_PAYLOAD_HASH_THRESHOLD = 256
export const SIGNATURE_LENGTH = 64
export const ACCOUNT_ID_LENGTH = 32
