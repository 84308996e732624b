import { encodeSs58 } from '@subreg/core'
import type { NeuronRecord, SubnetSnapshot } from '@subreg/types'
import { NETWORK_NAME, RAO_PER_TAO } from '@subreg/types'
import type { NetworkStats } from '../workflow/network-stats'
import type { RegistrationStatus } from '../workflow/status'
import {
  ESTIMATE_USD_PER_TAO,
  estimateUsd,
  formatDifficulty,
  formatSs58Short,
  formatTao,
} from './format'

// Line builders for command output; commands hand each line to the logger.

function totalStake(neuron: NeuronRecord): bigint {
  return neuron.stake.reduce((sum, [, amount]) => sum + amount, 0n)
}

export function statusLines(status: RegistrationStatus): string[] {
  const { netuid, neuron, subnet } = status

  if (!neuron) {
    return [
      `Hotkey ${encodeSs58(status.hotkey)} is NOT registered in subnet ${netuid}`,
      'Registration options:',
      `  Burn cost: ${formatTao(subnet.burn)}`,
    ]
  }

  return [
    `Neuron is registered in subnet ${netuid}!`,
    'Neuron details:',
    `  UID: ${neuron.uid}`,
    `  Hotkey: ${encodeSs58(neuron.hotkey)}`,
    `  Coldkey: ${encodeSs58(neuron.coldkey)}`,
    `  Active: ${neuron.active ? 'Yes' : 'No'}`,
    `  Stake: ${formatTao(totalStake(neuron))}`,
    `  Emission: ${neuron.emission}`,
    `  Last update: block ${neuron.lastUpdate}`,
    `  Validator permit: ${neuron.validatorPermit}`,
    'Subnet statistics:',
    `  Total neurons: ${subnet.subnetworkN}/${subnet.maxN}`,
    `  Registration difficulty: ${subnet.difficulty}`,
    `  Burn cost: ${formatTao(subnet.burn)}`,
  ]
}

export function subnetInfoLines(subnet: SubnetSnapshot): string[] {
  return [
    `Subnet ${subnet.netuid} details:`,
    `  Registered neurons: ${subnet.subnetworkN}/${subnet.maxN}`,
    `  Registration open: ${subnet.registrationOpen ? 'Yes' : 'No'}`,
    `  Registration difficulty: ${subnet.difficulty}`,
    `  Burn cost: ${formatTao(subnet.burn)}`,
    `  Tempo: ${subnet.tempo} blocks`,
    `  Immunity period: ${subnet.immunityPeriod} blocks`,
    `  Min allowed weights: ${subnet.minAllowedWeights}`,
    `  Max weight limit: ${subnet.maxWeightLimit}`,
    `  Max allowed validators: ${subnet.maxAllowedValidators}`,
    `  Owner: ${formatSs58Short(subnet.ownerSs58)}`,
    `  Network modality: ${subnet.modality}`,
    `  Emission value: ${subnet.emissionValue}`,
    `  Rho: ${subnet.rho}`,
    `  Kappa: ${subnet.kappa}`,
    `  Scaling law power: ${subnet.scalingLawPower}`,
    `  Blocks since epoch: ${subnet.blocksSinceEpoch}`,
    'Registration estimates:',
    `  Current block: ${subnet.currentBlock}`,
    `  Burn cost in USD: ${estimateUsd(subnet.burn)}`,
  ]
}

export function estimateLines(subnet: SubnetSnapshot): string[] {
  return [
    `Estimated registration cost for subnet ${subnet.netuid}:`,
    `  Cost: ${formatTao(subnet.burn)}`,
    `  USD equivalent: ${estimateUsd(subnet.burn)} (assuming $${ESTIMATE_USD_PER_TAO}/TAO)`,
    '  Processing time: 1-2 blocks (~12-24s)',
  ]
}

export function balanceLines(address: string, free: bigint): string[] {
  const lines = [
    `Account: ${address}`,
    `  Free balance: ${free} RAO`,
    `  Free balance: ${formatTao(free)}`,
  ]
  if (free === 0n) {
    lines.push('  Account has no free balance; fund it before registering')
  }
  return lines
}

const REGISTRATION_TIPS = [
  'Check difficulty before registering',
  'Consider burn registration for high-difficulty subnets',
  'Subnets with open slots register immediately once the burn is paid',
]

export function networkStatsLines(stats: NetworkStats): string[] {
  const rows = stats.subnets.map(
    (subnet) =>
      `${String(subnet.netuid).padStart(4)} | ${`${subnet.subnetworkN}/${subnet.maxN}`.padEnd(11)} | ${(subnet.registrationOpen ? 'open' : 'full').padEnd(6)} | ${formatTao(subnet.burn).padEnd(12)} | ${formatDifficulty(subnet.difficulty)}`,
  )

  return [
    'UID  | Neurons     | Slots  | Burn         | Difficulty',
    ...rows,
    'Network overview:',
    `  Active subnets: ${stats.subnets.length}`,
    `  Total neurons: ${stats.totalNeurons}`,
    `  Current block: ${stats.currentBlock}`,
    `  Network: ${NETWORK_NAME}`,
    'Registration tips:',
    ...REGISTRATION_TIPS.map((tip) => `  - ${tip}`),
  ]
}

export interface ExportedSubnetConfig {
  subnet_id: number
  registration_info: {
    difficulty: string
    burn_cost_rao: string
    burn_cost_tao: number
    max_neurons: number
    current_neurons: number
    registration_open: boolean
  }
  export_time: string
  network: string
}

export function buildExportConfig(
  subnet: SubnetSnapshot,
  exportedAt: Date,
): ExportedSubnetConfig {
  return {
    subnet_id: subnet.netuid,
    registration_info: {
      difficulty: subnet.difficulty.toString(),
      burn_cost_rao: subnet.burn.toString(),
      burn_cost_tao: Number(subnet.burn) / Number(RAO_PER_TAO),
      max_neurons: subnet.maxN,
      current_neurons: subnet.subnetworkN,
      registration_open: subnet.registrationOpen,
    },
    export_time: exportedAt.toISOString(),
    network: NETWORK_NAME,
  }
}
