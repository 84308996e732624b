import { blake2_256 } from '@subreg/core'
import { storageKeyHex } from '@subreg/codec'
import type { SafePromise } from '@subreg/types'
import { TransportError, safeError, safeResult } from '@subreg/types'
import { bytesToHex, type Hex, hexToBigInt, hexToBytes, numberToHex } from 'viem'
import type { RpcChannel } from './channel'

export interface RecordedCall {
  method: string
  params: unknown[]
}

type Handler = (params: unknown[]) => unknown

/**
 * In-process chain node for tests and dry runs.
 *
 * Serves `state_getStorage` from a map, numbers blocks so that a block's
 * hash is its number as a 32-byte hex string, and records every call and
 * every submitted extrinsic.
 */
export class InMemoryRpcChannel implements RpcChannel {
  readonly calls: RecordedCall[] = []
  readonly submitted: Hex[] = []
  private readonly storage = new Map<string, string>()
  private readonly handlers = new Map<string, Handler>()
  private readonly failures = new Map<string, TransportError>()
  private readonly failingKeys = new Set<string>()
  private closed = false

  constructor(public blockNumber = 0n) {}

  get isClosed(): boolean {
    return this.closed
  }

  setStorage(key: Hex, value: Uint8Array | string): this {
    this.storage.set(
      key.toLowerCase(),
      typeof value === 'string' ? value : bytesToHex(value),
    )
    return this
  }

  setStorageItem(
    pallet: string,
    item: string,
    parts: Uint8Array[],
    value: Uint8Array | string,
  ): this {
    const [error, key] = storageKeyHex(pallet, item, parts)
    if (error) throw error
    return this.setStorage(key, value)
  }

  /** Replace the built-in behaviour of one method */
  handle(method: string, handler: Handler): this {
    this.handlers.set(method, handler)
    return this
  }

  failMethod(method: string, message = `${method} unavailable`): this {
    this.failures.set(method, new TransportError(message, { method }))
    return this
  }

  /** Fail `state_getStorage` for one key only */
  failStorageKey(key: Hex): this {
    this.failingKeys.add(key.toLowerCase())
    return this
  }

  callsTo(method: string): unknown[][] {
    return this.calls
      .filter((call) => call.method === method)
      .map((call) => call.params)
  }

  blockHash(blockNumber: bigint): Hex {
    return numberToHex(blockNumber, { size: 32 })
  }

  async request(
    method: string,
    params: unknown[],
  ): SafePromise<unknown, TransportError> {
    this.calls.push({ method, params })

    if (this.closed) {
      return safeError(new TransportError('Channel is closed', { method }))
    }
    const failure = this.failures.get(method)
    if (failure) return safeError(failure)

    const handler = this.handlers.get(method)
    if (handler) return safeResult(handler(params))

    switch (method) {
      case 'state_getStorage': {
        const [key] = params
        if (typeof key !== 'string') return this.invalidParams(method)
        if (this.failingKeys.has(key.toLowerCase())) {
          return safeError(
            new TransportError(`Storage read failed for ${key}`, { method }),
          )
        }
        return safeResult(this.storage.get(key.toLowerCase()) ?? null)
      }
      case 'chain_getBlockHash': {
        if (params.length === 0) return safeResult(this.blockHash(this.blockNumber))
        const [requested] = params
        if (typeof requested !== 'number') return this.invalidParams(method)
        if (BigInt(requested) > this.blockNumber) return safeResult(null)
        return safeResult(this.blockHash(BigInt(requested)))
      }
      case 'chain_getHeader': {
        const [hash] = params
        if (typeof hash !== 'string' || !hash.startsWith('0x')) {
          return this.invalidParams(method)
        }
        const number = hexToBigInt(`0x${hash.slice(2)}`)
        return safeResult({
          number: numberToHex(number),
          parentHash: this.blockHash(number > 0n ? number - 1n : 0n),
        })
      }
      case 'author_submitExtrinsic': {
        const [extrinsic] = params
        if (typeof extrinsic !== 'string' || !extrinsic.startsWith('0x')) {
          return this.invalidParams(method)
        }
        const hex: Hex = `0x${extrinsic.slice(2)}`
        this.submitted.push(hex)
        return safeResult(bytesToHex(blake2_256(hexToBytes(hex))))
      }
      default:
        return safeError(
          new TransportError(`Method not found: ${method}`, { method }),
        )
    }
  }

  async close(): Promise<void> {
    this.closed = true
  }

  private invalidParams(method: string): [TransportError, undefined] {
    return safeError(new TransportError(`Invalid params for ${method}`, { method }))
  }
}
