import { logger } from '@subreg/core'
import { buildAndSign } from '@subreg/codec'
import type { AccountId, SafePromise, Signer, SubregError } from '@subreg/types'
import { safeError, safeResult } from '@subreg/types'
import { fetchAccountInfo } from './account'
import type { ChainRpc } from './chain-rpc'
import type { StateReader } from './state-reader'

/**
 * Reads the signer's nonce and the current block, then signs.
 *
 * Both reads complete before the extrinsic is assembled. Two builds for the
 * same signer must not overlap or they will share a nonce.
 */
export class ExtrinsicBuilder {
  constructor(
    private readonly reader: StateReader,
    private readonly chain: ChainRpc,
  ) {}

  async getNonce(account: AccountId): SafePromise<bigint, SubregError> {
    const [error, info] = await fetchAccountInfo(this.reader, account)
    if (error) return safeError(error)
    return safeResult(BigInt(info.nonce))
  }

  async buildSigned(
    call: Uint8Array,
    signer: Signer,
  ): SafePromise<Uint8Array, SubregError> {
    const [nonceError, nonce] = await this.getNonce(signer.publicKey)
    if (nonceError) return safeError(nonceError)

    const [blockError, currentBlock] = await this.chain.getCurrentBlock()
    if (blockError) return safeError(blockError)

    const [buildError, extrinsic] = buildAndSign(call, signer, nonce, currentBlock)
    if (buildError) return safeError(buildError)

    logger.debug(
      `built ${extrinsic.length}-byte extrinsic (nonce ${nonce}, block ${currentBlock})`,
    )
    return safeResult(extrinsic)
  }
}
