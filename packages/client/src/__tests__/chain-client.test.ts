import { Keyring } from '@polkadot/keyring'
import { cryptoWaitReady } from '@polkadot/util-crypto'
import {
  decodeSignedExtrinsic,
  encodeBurnedRegisterCall,
  encodeFixedLength,
  storageKeyHex,
} from '@subreg/codec'
import { blake2_256, logger } from '@subreg/core'
import {
  NeuronDataMissingError,
  SubnetNotFoundError,
  TransportError,
} from '@subreg/types'
import { bytesToHex, concat, hexToBytes } from 'viem'
import { beforeAll, describe, expect, it } from 'vitest'
import { ChainClient } from '../chain-client'
import { InMemoryRpcChannel } from '../rpc/in-memory-channel'

const ALICE = hexToBytes(
  '0xd43593c715fdd31c61141abd04a99fd6822c8558854ccde39a5684e7a56da27d',
)
const BOB = hexToBytes(
  '0x8eaf04151687736326c9fea17e25fc5287613693c912909cb226aa4794f26a48',
)
const ALICE_SS58 = '5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY'
const NETUID = new Uint8Array([1, 0])

function le(value: bigint, length: 2 | 4 | 8 | 16 | 32): Uint8Array {
  const [error, encoded] = encodeFixedLength(value, length)
  if (error) throw error
  return encoded
}

function accountInfo(nonce: number, free: bigint): Uint8Array {
  return concat([
    le(BigInt(nonce), 4),
    le(0n, 4),
    le(1n, 4),
    le(0n, 4),
    le(free, 16),
    le(0n, 16),
    le(0n, 16),
    le(0n, 16),
  ])
}

function subnetChannel(): InMemoryRpcChannel {
  return new InMemoryRpcChannel(100n)
    .setStorageItem('SubtensorModule', 'SubnetworkN', [NETUID], le(10n, 2))
    .setStorageItem('SubtensorModule', 'MaxAllowedUids', [NETUID], le(256n, 2))
    .setStorageItem('SubtensorModule', 'Tempo', [NETUID], le(99n, 2))
    .setStorageItem('SubtensorModule', 'Burn', [NETUID], le(1_000_000_000n, 8))
    .setStorageItem('SubtensorModule', 'Difficulty', [NETUID], le(1_000_000n, 32))
    .setStorageItem('SubtensorModule', 'SubnetOwner', [NETUID], ALICE)
    .setStorageItem('SubtensorModule', 'Kappa', [NETUID], 'not-hex')
}

beforeAll(async () => {
  logger.init()
  await cryptoWaitReady()
})

describe('ChainClient', () => {
  describe('getSubnetInfo', () => {
    it('assembles a snapshot', async () => {
      const client = new ChainClient(subnetChannel())
      const [error, info] = await client.getSubnetInfo(1)

      expect(error).toBeUndefined()
      expect(info).toMatchObject({
        netuid: 1,
        subnetworkN: 10,
        maxN: 256,
        tempo: 99,
        burn: 1_000_000_000n,
        difficulty: 1_000_000n,
        ownerSs58: ALICE_SS58,
        immunityPeriod: 0,
        kappa: 0,
        blocksSinceEpoch: 0n,
        currentBlock: 100n,
        registrationOpen: true,
      })
      expect(info?.owner).toEqual(ALICE)
    })

    it('reads the current block after every field', async () => {
      const channel = subnetChannel()
      await new ChainClient(channel).getSubnetInfo(1)

      const methods = channel.calls.map((call) => call.method)
      expect(methods.filter((m) => m === 'state_getStorage')).toHaveLength(16)
      expect(methods.slice(-2)).toEqual(['chain_getBlockHash', 'chain_getHeader'])
    })

    it('fails without further reads when the neuron count is absent', async () => {
      const channel = new InMemoryRpcChannel(100n)
      const [error] = await new ChainClient(channel).getSubnetInfo(7)

      expect(error).toBeInstanceOf(SubnetNotFoundError)
      expect(error?.message).toBe('Subnet 7 does not exist')
      expect(channel.calls).toHaveLength(1)
    })

    it('treats a zero neuron count as a missing subnet', async () => {
      const channel = new InMemoryRpcChannel().setStorageItem(
        'SubtensorModule',
        'SubnetworkN',
        [NETUID],
        le(0n, 2),
      )
      const [error] = await new ChainClient(channel).getSubnetInfo(1)
      expect(error).toBeInstanceOf(SubnetNotFoundError)
      expect(channel.calls).toHaveLength(1)
    })

    it('propagates a transport failure on any field', async () => {
      const [, burnKey] = storageKeyHex('SubtensorModule', 'Burn', [NETUID])
      const channel = subnetChannel()
      if (burnKey) channel.failStorageKey(burnKey)

      const [error] = await new ChainClient(channel).getSubnetInfo(1)
      expect(error).toBeInstanceOf(TransportError)
      expect(error?.message).toBe(
        `Reading SubtensorModule.Burn: Storage read failed for ${burnKey}`,
      )
    })

    it('marks a full subnet as closed', async () => {
      const channel = subnetChannel().setStorageItem(
        'SubtensorModule',
        'MaxAllowedUids',
        [NETUID],
        le(10n, 2),
      )
      const [, info] = await new ChainClient(channel).getSubnetInfo(1)
      expect(info?.registrationOpen).toBe(false)
    })
  })

  describe('checkRegistration', () => {
    it('returns undefined for an unknown hotkey', async () => {
      const client = new ChainClient(new InMemoryRpcChannel())
      const [error, neuron] = await client.checkRegistration(1, ALICE)
      expect(error).toBeUndefined()
      expect(neuron).toBeUndefined()
    })

    it('returns undefined when the uid value is shorter than two bytes', async () => {
      const channel = new InMemoryRpcChannel().setStorageItem(
        'SubtensorModule',
        'Uids',
        [NETUID, ALICE],
        new Uint8Array([5]),
      )
      const [, neuron] = await new ChainClient(channel).checkRegistration(1, ALICE)
      expect(neuron).toBeUndefined()
    })

    it('builds the neuron record for a registered hotkey', async () => {
      const channel = new InMemoryRpcChannel()
        .setStorageItem('SubtensorModule', 'Uids', [NETUID, ALICE], le(5n, 2))
        .setStorageItem(
          'SubtensorModule',
          'Neurons',
          [NETUID, le(5n, 2)],
          new Uint8Array(100),
        )
      const [error, neuron] = await new ChainClient(channel).checkRegistration(
        1,
        ALICE,
      )

      expect(error).toBeUndefined()
      expect(neuron).toMatchObject({
        uid: 5,
        netuid: 1,
        active: true,
        rawLength: 100,
        stake: [],
        weights: [],
        bonds: [],
      })
      expect(neuron?.hotkey).toEqual(ALICE)
      expect(neuron?.coldkey).toEqual(new Uint8Array(32))
    })

    it('fails when the neuron value is missing', async () => {
      const channel = new InMemoryRpcChannel().setStorageItem(
        'SubtensorModule',
        'Uids',
        [NETUID, ALICE],
        le(5n, 2),
      )
      const [error] = await new ChainClient(channel).checkRegistration(1, ALICE)
      expect(error).toBeInstanceOf(NeuronDataMissingError)
      expect(error?.message).toBe('Neuron data missing for UID 5 on subnet 1')
    })
  })

  describe('balances', () => {
    it('returns the free balance of a canonical record', async () => {
      const channel = new InMemoryRpcChannel().setStorageItem(
        'System',
        'Account',
        [ALICE],
        accountInfo(3, 5_000_000_000n),
      )
      const client = new ChainClient(channel)

      expect(await client.getAccountBalance(ALICE)).toEqual([
        undefined,
        5_000_000_000n,
      ])
      const [, info] = await client.getAccountInfo(ALICE)
      expect(info?.nonce).toBe(3)
    })

    it('falls back to fixed offsets for a 56-byte record', async () => {
      const raw = new Uint8Array(56)
      raw.set(le(10_000_000_000n, 16), 16)
      const channel = new InMemoryRpcChannel().setStorageItem(
        'System',
        'Account',
        [ALICE],
        raw,
      )
      const [, free] = await new ChainClient(channel).getAccountBalance(ALICE)
      expect(free).toBe(10_000_000_000n)
    })

    it('reads an unknown account as zero', async () => {
      const [, free] = await new ChainClient(
        new InMemoryRpcChannel(),
      ).getAccountBalance(BOB)
      expect(free).toBe(0n)
    })
  })

  describe('blocks', () => {
    it('reads the current block through the head hash', async () => {
      const channel = new InMemoryRpcChannel(1234n)
      const [error, block] = await new ChainClient(channel).getCurrentBlock()

      expect(error).toBeUndefined()
      expect(block).toBe(1234n)
      expect(channel.calls).toEqual([
        { method: 'chain_getBlockHash', params: [] },
        { method: 'chain_getHeader', params: [channel.blockHash(1234n)] },
      ])
    })

    it('reads the genesis hash as block 0', async () => {
      const channel = new InMemoryRpcChannel(5n)
      const [, hash] = await new ChainClient(channel).getGenesisHash()
      expect(hash).toBe(`0x${'00'.repeat(32)}`)
      expect(channel.callsTo('chain_getBlockHash')).toEqual([[0]])
    })

    it('fails for an unknown block', async () => {
      const [error] = await new ChainClient(
        new InMemoryRpcChannel(5n),
      ).getBlockHash(6)
      expect(error?.message).toBe('Block 6 is not known')
    })

    it('reads TotalNetworks', async () => {
      const channel = new InMemoryRpcChannel().setStorageItem(
        'SubtensorModule',
        'TotalNetworks',
        [],
        le(12n, 2),
      )
      expect(await new ChainClient(channel).getTotalNetworks()).toEqual([
        undefined,
        12,
      ])
    })
  })

  describe('submitBurnedRegistration', () => {
    const keyring = new Keyring({ type: 'sr25519', ss58Format: 42 })

    it('signs with the stored nonce and current block, then submits', async () => {
      const alice = keyring.addFromUri('//Alice')
      const channel = new InMemoryRpcChannel(100n).setStorageItem(
        'System',
        'Account',
        [ALICE],
        accountInfo(4, 5_000_000_000n),
      )

      const [error, hash] = await new ChainClient(
        channel,
      ).submitBurnedRegistration(
        {
          netuid: 1,
          hotkey: BOB,
          coldkey: ALICE,
          burnAmount: 1_000_000_000n,
          blockNumber: 100n,
        },
        alice,
      )

      expect(error).toBeUndefined()
      expect(channel.calls.map((call) => call.method)).toEqual([
        'state_getStorage',
        'chain_getBlockHash',
        'chain_getHeader',
        'author_submitExtrinsic',
      ])
      expect(channel.submitted).toHaveLength(1)
      const submitted = hexToBytes(channel.submitted[0])
      expect(hash).toBe(bytesToHex(blake2_256(submitted)))

      const [decodeError, decoded] = decodeSignedExtrinsic(submitted)
      expect(decodeError).toBeUndefined()
      expect(decoded?.signer).toEqual(ALICE)
      expect(decoded?.nonce).toBe(4n)
      expect(decoded?.era).toEqual(new Uint8Array([0x95, 0x00]))
      expect(decoded?.call).toEqual(
        encodeBurnedRegisterCall(1, BOB, 1_000_000_000n)[1],
      )
    })

    it('does not submit when the nonce read fails', async () => {
      const alice = keyring.addFromUri('//Alice')
      const channel = new InMemoryRpcChannel(100n).failMethod('state_getStorage')

      const [error] = await new ChainClient(channel).submitBurnedRegistration(
        {
          netuid: 1,
          hotkey: BOB,
          coldkey: ALICE,
          burnAmount: 1n,
          blockNumber: 100n,
        },
        alice,
      )
      expect(error).toBeInstanceOf(TransportError)
      expect(channel.submitted).toHaveLength(0)
    })
  })

  it('returns a TransportError when the endpoint is malformed', async () => {
    const [error, client] = await ChainClient.connect({ url: 'not a url' })

    expect(client).toBeUndefined()
    expect(error).toBeInstanceOf(TransportError)
    expect(error?.message.startsWith('Invalid RPC endpoint not a url')).toBe(
      true,
    )
  })

  it('closes its channel', async () => {
    const channel = new InMemoryRpcChannel()
    const client = new ChainClient(channel)
    await client.close()

    expect(channel.isClosed).toBe(true)
    const [error] = await client.getCurrentBlock()
    expect(error?.message).toBe('Channel is closed')
  })
})
