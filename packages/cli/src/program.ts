import { DEFAULT_RPC_URL } from '@subreg/types'
import { Command } from 'commander'
import { createAutoRegisterCommand } from './commands/auto-register'
import { createBalanceCommand } from './commands/balance'
import { createBatchCommand } from './commands/batch'
import { createEstimateCommand } from './commands/estimate'
import { createExportConfigCommand } from './commands/export-config'
import { createInfoCommand } from './commands/info'
import { createMonitorCommand } from './commands/monitor'
import { createNetworkStatsCommand } from './commands/network-stats'
import { createRegisterCommand } from './commands/register'
import { createStatusCommand } from './commands/status'
import { parseRpcUrl } from './utils/validation'

export function createProgram(): Command {
  return new Command('subreg')
    .description('Subnet registration toolkit for subtensor chains')
    .version('0.1.0')
    .option(
      '-r, --rpc-url <url>',
      `WebSocket endpoint of the chain node (default: $SUBREG_RPC_URL or ${DEFAULT_RPC_URL})`,
      parseRpcUrl,
    )
    .addCommand(createRegisterCommand())
    .addCommand(createStatusCommand())
    .addCommand(createInfoCommand())
    .addCommand(createEstimateCommand())
    .addCommand(createBalanceCommand())
    .addCommand(createMonitorCommand())
    .addCommand(createAutoRegisterCommand())
    .addCommand(createNetworkStatsCommand())
    .addCommand(createExportConfigCommand())
    .addCommand(createBatchCommand())
}
