import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { logger } from '@subreg/core'
import { KeyLoadError } from '@subreg/types'
import { hexToBytes } from 'viem'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { accountIdFromString, loadKeypair } from '../utils/key-loading'

const ALICE = hexToBytes(
  '0xd43593c715fdd31c61141abd04a99fd6822c8558854ccde39a5684e7a56da27d',
)
const BOB = hexToBytes(
  '0x8eaf04151687736326c9fea17e25fc5287613693c912909cb226aa4794f26a48',
)
const ALICE_SS58 = '5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY'
const TEST_SEED = `0x${'01'.repeat(32)}`

let keysDir: string

function keyFile(name: string, contents: string): string {
  const path = join(keysDir, name)
  writeFileSync(path, contents)
  return path
}

beforeAll(() => {
  logger.init()
  keysDir = mkdtempSync(join(tmpdir(), 'subreg-keys-'))
})

afterAll(() => {
  rmSync(keysDir, { recursive: true, force: true })
})

describe('loadKeypair', () => {
  it('derives dev accounts from their URI', async () => {
    const [error, pair] = await loadKeypair('//Alice')
    expect(error).toBeUndefined()
    expect(pair?.publicKey).toEqual(ALICE)
  })

  it('reads a secret phrase from a JSON key file', async () => {
    const path = keyFile('bob.json', JSON.stringify({ secretPhrase: '//Bob' }))
    const [error, pair] = await loadKeypair(path)
    expect(error).toBeUndefined()
    expect(pair?.publicKey).toEqual(BOB)
  })

  it('prefers secretSeed over secretPhrase', async () => {
    const path = keyFile(
      'both.json',
      JSON.stringify({ secretSeed: '//Alice', secretPhrase: '//Bob' }),
    )
    const [, pair] = await loadKeypair(path)
    expect(pair?.publicKey).toEqual(ALICE)
  })

  it('reads a raw secret from a plain text file', async () => {
    const path = keyFile('alice.txt', '//Alice\n')
    const [, pair] = await loadKeypair(path)
    expect(pair?.publicKey).toEqual(ALICE)
  })

  it('gives the same key for a seed inline and in a file', async () => {
    const [inlineError, inline] = await loadKeypair(TEST_SEED)
    const [fileError, fromFile] = await loadKeypair(
      keyFile('seed.json', JSON.stringify({ seed: TEST_SEED })),
    )
    expect(inlineError).toBeUndefined()
    expect(fileError).toBeUndefined()
    expect(inline?.publicKey).toHaveLength(32)
    expect(fromFile?.publicKey).toEqual(inline?.publicKey)
  })

  it('rejects hex seeds that are not 32 bytes', async () => {
    const [error] = await loadKeypair('0x1234')
    expect(error).toBeInstanceOf(KeyLoadError)
    expect(error?.message).toBe('Hex seeds must be 32 bytes')
  })

  it('rejects a JSON key file without a secret', async () => {
    const path = keyFile('empty.json', JSON.stringify({ address: ALICE_SS58 }))
    const [error] = await loadKeypair(path)
    expect(error?.message).toBe('Key file missing secretSeed or secretPhrase')
  })

  it('rejects a malformed JSON key file', async () => {
    const path = keyFile('broken.json', '{"secretSeed": ')
    const [error] = await loadKeypair(path)
    expect(error?.message).toBe(`Invalid JSON key file format: ${path}`)
  })

  it('rejects a long phrase that is not a valid mnemonic', async () => {
    const [error] = await loadKeypair(
      'this phrase is not a mnemonic and is too long to be a seed',
    )
    expect(error).toBeInstanceOf(KeyLoadError)
    expect(error?.message).toBe(
      'Could not derive a key pair from the given secret',
    )
  })
})

describe('accountIdFromString', () => {
  it('decodes SS58 addresses without a secret', async () => {
    const [error, account] = await accountIdFromString(ALICE_SS58)
    expect(error).toBeUndefined()
    expect(account).toEqual(ALICE)
  })

  it('uses the public key of a dev URI', async () => {
    const [, account] = await accountIdFromString('//Bob')
    expect(account).toEqual(BOB)
  })

  it('uses the public key of a key file', async () => {
    const path = keyFile('hot.json', JSON.stringify({ secretPhrase: '//Bob' }))
    const [, account] = await accountIdFromString(path)
    expect(account).toEqual(BOB)
  })

  it('rejects an empty string', async () => {
    const [error] = await accountIdFromString('')
    expect(error).toBeInstanceOf(KeyLoadError)
    expect(error?.message).toBe('Empty account string provided')
  })
})
