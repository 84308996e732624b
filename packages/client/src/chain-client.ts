import { encodeSs58, loadClientEnv, logger } from '@subreg/core'
import {
  type SubtensorItem,
  decodeAccountIdOrZero,
  decodeU16OrZero,
  decodeU64OrZero,
  decodeU256OrZero,
  encodeNetuid,
  encodeRegistrationCall,
  encodeUid,
  uidsKeyParts,
} from '@subreg/codec'
import type {
  AccountId,
  AccountInfo,
  NeuronRecord,
  RegistrationRequest,
  SafePromise,
  Signer,
  SubnetSnapshot,
  SubregError,
} from '@subreg/types'
import {
  ACCOUNT_ID_LENGTH,
  DecodeError,
  NeuronDataMissingError,
  SubnetNotFoundError,
  type TransportError,
  safeError,
  safeResult,
} from '@subreg/types'
import type { Hex } from 'viem'
import { fetchAccountInfo } from './account'
import { ChainRpc } from './chain-rpc'
import { ExtrinsicBuilder } from './extrinsic-builder'
import type { RpcChannel } from './rpc/channel'
import { WsRpcChannel } from './rpc/ws-channel'
import { StateReader } from './state-reader'

const SUBTENSOR = 'SubtensorModule'

export interface ChainClientOptions {
  url?: string
  connectTimeoutMs?: number
  requestTimeoutMs?: number
}

/**
 * Subnet, neuron and balance queries plus burned registration.
 *
 * The client owns its channel: `close()` releases it. One client serves one
 * actor; concurrent registrations for the same signer must be serialized by
 * the caller.
 */
export class ChainClient {
  private readonly reader: StateReader
  private readonly chain: ChainRpc
  private readonly builder: ExtrinsicBuilder

  constructor(private readonly channel: RpcChannel) {
    this.reader = new StateReader(channel)
    this.chain = new ChainRpc(channel)
    this.builder = new ExtrinsicBuilder(this.reader, this.chain)
  }

  /**
   * Open a WebSocket channel. Unset options come from the environment.
   */
  static async connect(
    options: ChainClientOptions = {},
  ): SafePromise<ChainClient, TransportError> {
    const env = loadClientEnv()
    const url = options.url ?? env.SUBREG_RPC_URL
    logger.info(`Connecting to ${url}`)

    const [error, channel] = await WsRpcChannel.connect(url, {
      connectTimeoutMs: options.connectTimeoutMs ?? env.SUBREG_CONNECT_TIMEOUT_MS,
      requestTimeoutMs: options.requestTimeoutMs ?? env.SUBREG_REQUEST_TIMEOUT_MS,
    })
    if (error) return safeError(error)
    return safeResult(new ChainClient(channel))
  }

  async getSubnetInfo(netuid: number): SafePromise<SubnetSnapshot, SubregError> {
    const [netuidError, key] = encodeNetuid(netuid)
    if (netuidError) return safeError(netuidError)

    const [countError, countRaw] = await this.reader.readItem(
      SUBTENSOR,
      'SubnetworkN',
      [key],
    )
    if (countError) return safeError(countError)
    const subnetworkN = countRaw === undefined ? 0 : decodeU16OrZero(countRaw)
    if (subnetworkN === 0) return safeError(new SubnetNotFoundError(netuid))

    // Transport failures abort the snapshot; undecodable values read as zero.
    const failures: SubregError[] = []
    const field = async <T>(
      item: SubtensorItem,
      decode: (raw: Uint8Array) => T,
      fallback: T,
    ): Promise<T> => {
      const [error, raw] = await this.reader.readItem(SUBTENSOR, item, [key])
      if (error instanceof DecodeError) {
        logger.debug(`${item} for subnet ${netuid} undecodable, using default`)
        return fallback
      }
      if (error) {
        failures.push(error)
        return fallback
      }
      return raw === undefined ? fallback : decode(raw)
    }

    const [
      difficulty,
      tempo,
      immunityPeriod,
      minAllowedWeights,
      maxWeightLimit,
      maxAllowedValidators,
      maxN,
      burn,
      owner,
      modality,
      emissionValue,
      rho,
      kappa,
      scalingLawPower,
      blocksSinceEpoch,
    ] = await Promise.all([
      field('Difficulty', decodeU256OrZero, 0n),
      field('Tempo', decodeU16OrZero, 0),
      field('ImmunityPeriod', decodeU16OrZero, 0),
      field('MinAllowedWeights', decodeU16OrZero, 0),
      field('MaxWeightsLimit', decodeU16OrZero, 0),
      field('MaxAllowedValidators', decodeU16OrZero, 0),
      field('MaxAllowedUids', decodeU16OrZero, 0),
      field('Burn', decodeU64OrZero, 0n),
      field('SubnetOwner', decodeAccountIdOrZero, new Uint8Array(ACCOUNT_ID_LENGTH)),
      field('NetworkModality', decodeU16OrZero, 0),
      field('EmissionValues', decodeU64OrZero, 0n),
      field('Rho', decodeU16OrZero, 0),
      field('Kappa', decodeU16OrZero, 0),
      field('ScalingLawPower', decodeU16OrZero, 0),
      field('BlocksSinceLastStep', decodeU64OrZero, 0n),
    ])
    if (failures.length > 0) return safeError(failures[0])

    const [blockError, currentBlock] = await this.chain.getCurrentBlock()
    if (blockError) return safeError(blockError)

    return safeResult({
      netuid,
      difficulty,
      tempo,
      immunityPeriod,
      minAllowedWeights,
      maxWeightLimit,
      maxAllowedValidators,
      maxN,
      subnetworkN,
      burn,
      owner,
      ownerSs58: encodeSs58(owner),
      modality,
      emissionValue,
      rho,
      kappa,
      scalingLawPower,
      blocksSinceEpoch,
      currentBlock,
      registrationOpen: subnetworkN < maxN,
    })
  }

  /**
   * The neuron registered under `hotkey`, or `undefined` when there is none.
   *
   * The returned record only carries identity fields; stake, weights, bonds
   * and scores are not decoded from the neuron value yet.
   */
  async checkRegistration(
    netuid: number,
    hotkey: AccountId,
  ): SafePromise<NeuronRecord | undefined, SubregError> {
    const [partsError, parts] = uidsKeyParts(netuid, hotkey)
    if (partsError) return safeError(partsError)

    const [uidError, uidRaw] = await this.reader.readItem(SUBTENSOR, 'Uids', parts)
    if (uidError) return safeError(uidError)
    if (uidRaw === undefined || uidRaw.length < 2) return safeResult(undefined)
    const uid = decodeU16OrZero(uidRaw)

    const [uidKeyError, uidKey] = encodeUid(uid)
    if (uidKeyError) return safeError(uidKeyError)
    const [neuronError, neuronRaw] = await this.reader.readItem(
      SUBTENSOR,
      'Neurons',
      [parts[0], uidKey],
    )
    if (neuronError) return safeError(neuronError)
    if (neuronRaw === undefined) {
      return safeError(new NeuronDataMissingError(netuid, uid))
    }

    return safeResult(placeholderNeuron(netuid, uid, hotkey, neuronRaw.length))
  }

  async getAccountInfo(account: AccountId): SafePromise<AccountInfo, SubregError> {
    return fetchAccountInfo(this.reader, account)
  }

  async getAccountBalance(account: AccountId): SafePromise<bigint, SubregError> {
    const [error, info] = await this.getAccountInfo(account)
    if (error) return safeError(error)
    return safeResult(info.data.free)
  }

  /**
   * Sign and submit burned_register for `request`; resolves with the
   * transaction hash the node accepted.
   */
  async submitBurnedRegistration(
    request: RegistrationRequest,
    signer: Signer,
  ): SafePromise<Hex, SubregError> {
    const [callError, call] = encodeRegistrationCall(request)
    if (callError) return safeError(callError)

    const [buildError, extrinsic] = await this.builder.buildSigned(call, signer)
    if (buildError) return safeError(buildError)

    logger.info(
      `Submitting burned registration on subnet ${request.netuid} (burn ${request.burnAmount} RAO)`,
    )
    return this.chain.submitExtrinsic(extrinsic)
  }

  async getCurrentBlock(): SafePromise<bigint, TransportError> {
    return this.chain.getCurrentBlock()
  }

  async getBlockHash(blockNumber?: number): SafePromise<Hex, TransportError> {
    return this.chain.getBlockHash(blockNumber)
  }

  async getGenesisHash(): SafePromise<Hex, TransportError> {
    return this.chain.getGenesisHash()
  }

  async getTotalNetworks(): SafePromise<number, SubregError> {
    const [error, raw] = await this.reader.readItem(SUBTENSOR, 'TotalNetworks', [])
    if (error) return safeError(error)
    return safeResult(raw === undefined ? 0 : decodeU16OrZero(raw))
  }

  async close(): Promise<void> {
    await this.channel.close()
  }
}

function placeholderNeuron(
  netuid: number,
  uid: number,
  hotkey: AccountId,
  rawLength: number,
): NeuronRecord {
  return {
    hotkey,
    coldkey: new Uint8Array(ACCOUNT_ID_LENGTH),
    uid,
    netuid,
    active: true,
    axonInfo: { block: 0n, version: 0, ip: 0n, port: 0, ipType: 0, protocol: 0 },
    prometheusInfo: { block: 0n, version: 0, ip: 0n, port: 0, ipType: 0 },
    stake: [],
    rank: 0,
    emission: 0n,
    incentive: 0,
    consensus: 0,
    trust: 0,
    validatorTrust: 0,
    dividends: 0,
    lastUpdate: 0n,
    validatorPermit: false,
    weights: [],
    bonds: [],
    pruningScore: 0,
    rawLength,
  }
}
