import type { SafePromise } from '@subreg/types'
import { TransportError, safeError, safeResult } from '@subreg/types'
import { bytesToHex, type Hex, hexToBigInt } from 'viem'
import type { RpcChannel } from './rpc/channel'
import {
  blockHashSchema,
  extrinsicHashSchema,
  headerSchema,
  parseRpcResult,
} from './rpc/schemas'

/**
 * Block and author RPCs used around storage reads
 */
export class ChainRpc {
  constructor(private readonly channel: RpcChannel) {}

  /**
   * Hash of `blockNumber`, or of the best block when omitted
   */
  async getBlockHash(blockNumber?: number): SafePromise<Hex, TransportError> {
    const method = 'chain_getBlockHash'
    const [error, result] = await this.channel.request(
      method,
      blockNumber === undefined ? [] : [blockNumber],
    )
    if (error) return safeError(error)
    if (result === null) {
      return safeError(
        new TransportError(`Block ${blockNumber ?? 'head'} is not known`, {
          method,
        }),
      )
    }
    const [parseError, hash] = parseRpcResult(blockHashSchema, result, method)
    if (parseError) return safeError(parseError)
    return safeResult(hash)
  }

  async getBlockNumber(hash: Hex): SafePromise<bigint, TransportError> {
    const method = 'chain_getHeader'
    const [error, result] = await this.channel.request(method, [hash])
    if (error) return safeError(error)
    const [parseError, header] = parseRpcResult(headerSchema, result, method)
    if (parseError) return safeError(parseError)
    return safeResult(hexToBigInt(header.number))
  }

  async getCurrentBlock(): SafePromise<bigint, TransportError> {
    const [hashError, hash] = await this.getBlockHash()
    if (hashError) return safeError(hashError)
    return this.getBlockNumber(hash)
  }

  async getGenesisHash(): SafePromise<Hex, TransportError> {
    return this.getBlockHash(0)
  }

  async submitExtrinsic(extrinsic: Uint8Array): SafePromise<Hex, TransportError> {
    const method = 'author_submitExtrinsic'
    const [error, result] = await this.channel.request(method, [
      bytesToHex(extrinsic),
    ])
    if (error) return safeError(error)
    const [parseError, hash] = parseRpcResult(extrinsicHashSchema, result, method)
    if (parseError) return safeError(parseError)
    return safeResult(hash)
  }
}
