/**
 * Signed extrinsic envelope
 *
 *   prefix u32 LE (length | 0x80000000) ∥ 0x84 ∥ signer(32) ∥ signature(64)
 *     ∥ era(2) ∥ nonce u64 ∥ tip u64 ∥ call
 */

import { logger } from '@subreg/core'
import type { AccountId, DecodedExtrinsic, Safe, Signer } from '@subreg/types'
import {
  ACCOUNT_ID_LENGTH,
  DecodeError,
  EXTRINSIC_VERSION_SIGNED,
  EncodeError,
  SIGNATURE_LENGTH,
  safeError,
  safeResult,
} from '@subreg/types'
import { concatBytes, decodeFixedBytes, encodeAccountId } from '../core/bytes'
import { decodeFixedLength, encodeFixedLength } from '../core/fixed-length'
import { encodeMortalEra } from './era'
import { createSigningPayload } from './payload'
import { encodeSignedExtra } from './signed-extra'

const LENGTH_FLAG = 0x80000000
const MAX_ENVELOPE_LENGTH = 0x7fffffff

export interface EnvelopeParts {
  signer: AccountId
  signature: Uint8Array
  extra: Uint8Array
  call: Uint8Array
}

/**
 * Envelope length with the top bit set, as u32 LE.
 * Lengths of 2^31 and above cannot be represented and abort.
 */
export function encodeLengthPrefix(length: number): Uint8Array {
  if (!Number.isInteger(length) || length < 0 || length > MAX_ENVELOPE_LENGTH) {
    throw new RangeError(`Extrinsic length ${length} cannot be prefixed`)
  }
  const [error, prefix] = encodeFixedLength(
    BigInt((length | LENGTH_FLAG) >>> 0),
    4,
  )
  if (error) throw error
  return prefix
}

export function encodeSignedExtrinsic(
  parts: EnvelopeParts,
): Safe<Uint8Array, EncodeError> {
  const [signerError, signer] = encodeAccountId(parts.signer)
  if (signerError) return safeError(signerError)
  if (parts.signature.length !== SIGNATURE_LENGTH) {
    return safeError(
      new EncodeError(
        `Signature must be ${SIGNATURE_LENGTH} bytes, got ${parts.signature.length}`,
      ),
    )
  }

  const envelope = concatBytes(
    new Uint8Array([EXTRINSIC_VERSION_SIGNED]),
    signer,
    parts.signature,
    parts.extra,
    parts.call,
  )
  return safeResult(concatBytes(encodeLengthPrefix(envelope.length), envelope))
}

/**
 * Build the signed extra for `nonce` at `currentBlock`, sign call ∥ extra
 * and wrap everything in the versioned envelope.
 */
export function buildAndSign(
  call: Uint8Array,
  signer: Signer,
  nonce: bigint,
  currentBlock: bigint,
): Safe<Uint8Array, EncodeError> {
  const era = encodeMortalEra(currentBlock)
  const [extraError, extra] = encodeSignedExtra(era, nonce)
  if (extraError) return safeError(extraError)

  const payload = createSigningPayload(call, extra)
  const signature = signer.sign(payload)
  logger.debug(
    `signed ${payload.length}-byte payload at block ${currentBlock} with nonce ${nonce}`,
  )

  return encodeSignedExtrinsic({
    signer: signer.publicKey,
    signature,
    extra,
    call,
  })
}

export function decodeSignedExtrinsic(
  bytes: Uint8Array,
): Safe<DecodedExtrinsic, DecodeError> {
  const [prefixError, prefix] = decodeFixedLength(bytes, 4)
  if (prefixError) return safeError(prefixError)

  const flagged = Number(prefix.value)
  if ((flagged & LENGTH_FLAG) === 0) {
    return safeError(new DecodeError('Length prefix is missing its flag bit'))
  }
  const length = flagged & MAX_ENVELOPE_LENGTH
  if (prefix.remaining.length !== length) {
    return safeError(
      new DecodeError(
        `Length prefix says ${length} bytes, envelope has ${prefix.remaining.length}`,
      ),
    )
  }

  const [versionError, version] = decodeFixedLength(prefix.remaining, 1)
  if (versionError) return safeError(versionError)
  if (version.value !== BigInt(EXTRINSIC_VERSION_SIGNED)) {
    return safeError(
      new DecodeError(
        `Unsupported extrinsic version 0x${version.value.toString(16)}`,
      ),
    )
  }
  let cursor = version.remaining

  const [signerError, signer] = decodeFixedBytes(cursor, ACCOUNT_ID_LENGTH)
  if (signerError) return safeError(signerError)
  cursor = signer.remaining

  const [signatureError, signature] = decodeFixedBytes(cursor, SIGNATURE_LENGTH)
  if (signatureError) return safeError(signatureError)
  cursor = signature.remaining

  // an immortal era is a single zero byte
  const eraLength = cursor[0] === 0 ? 1 : 2
  const [eraError, era] = decodeFixedBytes(cursor, eraLength)
  if (eraError) return safeError(eraError)
  cursor = era.remaining

  const [nonceError, nonce] = decodeFixedLength(cursor, 8)
  if (nonceError) return safeError(nonceError)
  const [tipError, tip] = decodeFixedLength(nonce.remaining, 8)
  if (tipError) return safeError(tipError)

  return safeResult({
    length,
    version: EXTRINSIC_VERSION_SIGNED,
    signer: signer.value,
    signature: signature.value,
    era: era.value,
    nonce: nonce.value,
    tip: tip.value,
    call: tip.remaining,
  })
}
