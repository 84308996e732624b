/**
 * Error classes shared by every package.
 *
 * Each class carries a stable `code` so the CLI can map failures to exit
 * messages without string matching.
 */

export const ERROR_CODES = {
  TRANSPORT: 'TRANSPORT',
  DECODE: 'DECODE',
  SUBNET_NOT_FOUND: 'SUBNET_NOT_FOUND',
  NEURON_DATA_MISSING: 'NEURON_DATA_MISSING',
  INSUFFICIENT_BALANCE: 'INSUFFICIENT_BALANCE',
  KEY_LOAD: 'KEY_LOAD',
  STORAGE_KEY: 'STORAGE_KEY',
  ENCODE: 'ENCODE',
  RETRIES_EXHAUSTED: 'RETRIES_EXHAUSTED',
  BATCH_CONFIG: 'BATCH_CONFIG',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class SubregError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SubregError'
    this.code = code
  }
}

/**
 * Channel failure: timeout, disconnect, malformed JSON-RPC envelope or an
 * error object returned by the node.
 */
export class TransportError extends SubregError {
  readonly method: string | undefined

  constructor(
    message: string,
    options?: { method?: string; cause?: unknown },
  ) {
    super(ERROR_CODES.TRANSPORT, message, options)
    this.name = 'TransportError'
    this.method = options?.method
  }
}

export class DecodeError extends SubregError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.DECODE, message, options)
    this.name = 'DecodeError'
  }
}

export class StorageKeyError extends SubregError {
  constructor(message: string) {
    super(ERROR_CODES.STORAGE_KEY, message)
    this.name = 'StorageKeyError'
  }
}

export class EncodeError extends SubregError {
  constructor(message: string) {
    super(ERROR_CODES.ENCODE, message)
    this.name = 'EncodeError'
  }
}

export class SubnetNotFoundError extends SubregError {
  readonly netuid: number

  constructor(netuid: number, totalNetworks?: number) {
    super(
      ERROR_CODES.SUBNET_NOT_FOUND,
      totalNetworks === undefined
        ? `Subnet ${netuid} does not exist`
        : `Subnet ${netuid} does not exist (total networks: ${totalNetworks})`,
    )
    this.name = 'SubnetNotFoundError'
    this.netuid = netuid
  }
}

export class NeuronDataMissingError extends SubregError {
  readonly netuid: number
  readonly uid: number

  constructor(netuid: number, uid: number) {
    super(
      ERROR_CODES.NEURON_DATA_MISSING,
      `Neuron data missing for UID ${uid} on subnet ${netuid}`,
    )
    this.name = 'NeuronDataMissingError'
    this.netuid = netuid
    this.uid = uid
  }
}

export class InsufficientBalanceError extends SubregError {
  readonly required: bigint
  readonly available: bigint

  constructor(required: bigint, available: bigint) {
    super(
      ERROR_CODES.INSUFFICIENT_BALANCE,
      `Insufficient balance: need ${required} RAO, have ${available} RAO`,
    )
    this.name = 'InsufficientBalanceError'
    this.required = required
    this.available = available
  }
}

export class KeyLoadError extends SubregError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.KEY_LOAD, message, options)
    this.name = 'KeyLoadError'
  }
}

export class RetriesExhaustedError extends SubregError {
  readonly attempts: number

  constructor(attempts: number) {
    super(
      ERROR_CODES.RETRIES_EXHAUSTED,
      `All ${attempts} registration attempts failed`,
    )
    this.name = 'RetriesExhaustedError'
    this.attempts = attempts
  }
}

/** Unreadable, malformed or schema-violating batch file */
export class BatchConfigError extends SubregError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.BATCH_CONFIG, message, options)
    this.name = 'BatchConfigError'
  }
}
