import { decodeHexPayload, logger } from '@subreg/core'
import { deriveMapKey } from '@subreg/codec'
import type { SafePromise, StorageKeyError } from '@subreg/types'
import { DecodeError, TransportError, safeError, safeResult } from '@subreg/types'
import { bytesToHex } from 'viem'
import type { RpcChannel } from './rpc/channel'
import { storageResultSchema } from './rpc/schemas'

export type ReadError = TransportError | DecodeError

/**
 * One `state_getStorage` round trip per read. A key with nothing stored
 * reads as `undefined`, never as an error.
 */
export class StateReader {
  constructor(private readonly channel: RpcChannel) {}

  async read(address: Uint8Array): SafePromise<Uint8Array | undefined, ReadError> {
    const key = bytesToHex(address)
    const [error, result] = await this.channel.request('state_getStorage', [key])
    if (error) return safeError(error)

    const parsed = storageResultSchema.safeParse(result)
    if (!parsed.success) {
      return safeError(
        new DecodeError(`state_getStorage returned a non-string value for ${key}`),
      )
    }
    if (parsed.data === null) {
      logger.debug(`no value at ${key}`)
      return safeResult(undefined)
    }

    const [decodeError, bytes] = decodeHexPayload(parsed.data)
    if (decodeError) return safeError(decodeError)
    logger.debug(`read ${bytes.length} bytes at ${key}`)
    return safeResult(bytes)
  }

  /**
   * Derive the key for `pallet.item` and read it. Errors name the item.
   */
  async readItem(
    pallet: string,
    item: string,
    parts: Uint8Array[],
  ): SafePromise<Uint8Array | undefined, ReadError | StorageKeyError> {
    const [keyError, address] = deriveMapKey(pallet, item, parts)
    if (keyError) return safeError(keyError)

    const [error, value] = await this.read(address)
    if (error instanceof TransportError) {
      return safeError(
        new TransportError(`Reading ${pallet}.${item}: ${error.message}`, {
          method: error.method,
          cause: error,
        }),
      )
    }
    if (error) {
      return safeError(
        new DecodeError(`Reading ${pallet}.${item}: ${error.message}`, {
          cause: error,
        }),
      )
    }
    return safeResult(value)
  }
}
