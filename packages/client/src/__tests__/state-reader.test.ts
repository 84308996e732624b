import { logger } from '@subreg/core'
import { DecodeError, StorageKeyError, TransportError } from '@subreg/types'
import { hexToBytes } from 'viem'
import { beforeAll, describe, expect, it } from 'vitest'
import { InMemoryRpcChannel } from '../rpc/in-memory-channel'
import { StateReader } from '../state-reader'

const ALICE = hexToBytes(
  '0xd43593c715fdd31c61141abd04a99fd6822c8558854ccde39a5684e7a56da27d',
)

beforeAll(() => {
  logger.init()
})

describe('StateReader', () => {
  it('returns stored bytes', async () => {
    const channel = new InMemoryRpcChannel().setStorage('0xabcd', '0x0102')
    const reader = new StateReader(channel)

    const [error, value] = await reader.read(new Uint8Array([0xab, 0xcd]))
    expect(error).toBeUndefined()
    expect(value).toEqual(new Uint8Array([1, 2]))
    expect(channel.callsTo('state_getStorage')).toEqual([['0xabcd']])
  })

  it('reads an absent key as undefined', async () => {
    const reader = new StateReader(new InMemoryRpcChannel())
    const [error, value] = await reader.read(new Uint8Array([1]))
    expect(error).toBeUndefined()
    expect(value).toBeUndefined()
  })

  it('reports undecodable hex as a DecodeError naming the item', async () => {
    const channel = new InMemoryRpcChannel().setStorageItem(
      'System',
      'Account',
      [ALICE],
      'zz',
    )
    const reader = new StateReader(channel)

    const [error] = await reader.readItem('System', 'Account', [ALICE])
    expect(error).toBeInstanceOf(DecodeError)
    expect(error?.message).toBe(
      'Reading System.Account: Expected 0x-prefixed hex, got "zz"',
    )
  })

  it('reports a non-string result as a DecodeError', async () => {
    const channel = new InMemoryRpcChannel().handle('state_getStorage', () => 42)
    const [error] = await new StateReader(channel).read(new Uint8Array([0xff]))
    expect(error).toBeInstanceOf(DecodeError)
    expect(error?.message).toBe(
      'state_getStorage returned a non-string value for 0xff',
    )
  })

  it('propagates channel failures as TransportError', async () => {
    const channel = new InMemoryRpcChannel().failMethod(
      'state_getStorage',
      'socket gone',
    )
    const [error] = await new StateReader(channel).readItem('System', 'Account', [
      ALICE,
    ])
    expect(error).toBeInstanceOf(TransportError)
    expect(error?.message).toBe('Reading System.Account: socket gone')
    expect(error instanceof TransportError && error.method).toBe(
      'state_getStorage',
    )
  })

  it('rejects unknown storage items before any round trip', async () => {
    const channel = new InMemoryRpcChannel()
    const [error] = await new StateReader(channel).readItem('System', 'Events', [])
    expect(error).toBeInstanceOf(StorageKeyError)
    expect(channel.calls).toHaveLength(0)
  })
})
