import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { Keyring } from '@polkadot/keyring'
import type { KeyringPair } from '@polkadot/keyring/types'
import { isHex } from '@polkadot/util'
import { decodeSs58, logger, waitForCrypto } from '@subreg/core'
import type { AccountId, SafePromise } from '@subreg/types'
import { KeyLoadError, SS58_FORMAT, safeError, safeResult, safeTry } from '@subreg/types'
import { z } from 'zod'

const keyFileSchema = z.object({
  secretSeed: z.string().optional(),
  seed: z.string().optional(),
  secretPhrase: z.string().optional(),
  phrase: z.string().optional(),
})

const SS58_PATTERN = /^[a-zA-Z0-9]{48}$/

async function pairFromSecret(secret: string): SafePromise<KeyringPair, KeyLoadError> {
  if (isHex(secret) && !isHex(secret, 256)) {
    return safeError(new KeyLoadError('Hex seeds must be 32 bytes'))
  }
  await waitForCrypto()
  const keyring = new Keyring({ type: 'sr25519', ss58Format: SS58_FORMAT })
  try {
    return safeResult(keyring.addFromUri(secret))
  } catch (error) {
    return safeError(
      new KeyLoadError('Could not derive a key pair from the given secret', {
        cause: error,
      }),
    )
  }
}

async function pairFromFile(path: string): SafePromise<KeyringPair, KeyLoadError> {
  const [readError, contents] = await safeTry(readFile(path, 'utf-8'))
  if (readError) {
    return safeError(
      new KeyLoadError(`Failed to read key file: ${path}`, { cause: readError }),
    )
  }

  const trimmed = contents.trim()
  if (!trimmed.startsWith('{')) return pairFromSecret(trimmed)

  let json: unknown
  try {
    json = JSON.parse(trimmed)
  } catch (error) {
    return safeError(
      new KeyLoadError(`Invalid JSON key file format: ${path}`, { cause: error }),
    )
  }
  const parsed = keyFileSchema.safeParse(json)
  if (!parsed.success) {
    return safeError(new KeyLoadError(`Invalid JSON key file format: ${path}`))
  }

  const secret =
    parsed.data.secretSeed ??
    parsed.data.seed ??
    parsed.data.secretPhrase ??
    parsed.data.phrase
  if (secret === undefined) {
    return safeError(
      new KeyLoadError('Key file missing secretSeed or secretPhrase'),
    )
  }
  return pairFromSecret(secret)
}

/**
 * Load an sr25519 pair from a dev URI (`//Alice`), a key file, or a seed or
 * mnemonic given inline
 */
export async function loadKeypair(
  source: string,
): SafePromise<KeyringPair, KeyLoadError> {
  if (source.startsWith('//')) {
    logger.debug(`Using dev key ${source}`)
    return pairFromSecret(source)
  }
  if (existsSync(source)) return pairFromFile(source)
  if (source.length === 0) {
    return safeError(new KeyLoadError('Empty key source provided'))
  }
  logger.debug('Using provided seed or phrase')
  return pairFromSecret(source)
}

/**
 * Resolve an account id from a dev URI, key file, SS58 address or seed
 */
export async function accountIdFromString(
  source: string,
): SafePromise<AccountId, KeyLoadError> {
  if (source.length === 0) {
    return safeError(new KeyLoadError('Empty account string provided'))
  }
  if (!source.startsWith('//') && !existsSync(source) && SS58_PATTERN.test(source)) {
    return decodeSs58(source)
  }
  const [error, pair] = await loadKeypair(source)
  if (error) return safeError(error)
  return safeResult(pair.publicKey)
}
