import { writeFile } from 'node:fs/promises'
import { logger } from '@subreg/core'
import { safeError, safeResult, safeTry } from '@subreg/types'
import { Command } from 'commander'
import { buildExportConfig } from '../utils/report'
import { runWithClient } from '../utils/run'
import { parseNetuid } from '../utils/validation'

interface ExportConfigOptions {
  subnet: number
  output: string
}

export function createExportConfigCommand(): Command {
  return new Command('export-config')
    .description('Write subnet registration info to a JSON file')
    .requiredOption('-s, --subnet <netuid>', 'Subnet to export', parseNetuid)
    .option('-o, --output <file>', 'Output file', 'subnet_config.json')
    .action(async (options: ExportConfigOptions, command: Command) => {
      await runWithClient(command, async (client) => {
        logger.info(`Exporting configuration for subnet ${options.subnet}...`)
        const [error, subnet] = await client.getSubnetInfo(options.subnet)
        if (error) return safeError(error)

        const config = buildExportConfig(subnet, new Date())
        const [writeError] = await safeTry(
          writeFile(options.output, `${JSON.stringify(config, null, 2)}\n`),
        )
        if (writeError) return safeError(writeError)

        logger.info(`Configuration exported to: ${options.output}`)
        return safeResult(undefined)
      })
    })
}
