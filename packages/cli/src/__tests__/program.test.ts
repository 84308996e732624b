import { describe, expect, it } from 'vitest'
import { createAutoRegisterCommand } from '../commands/auto-register'
import { createExportConfigCommand } from '../commands/export-config'
import { createMonitorCommand } from '../commands/monitor'
import { createRegisterCommand } from '../commands/register'
import { createProgram } from '../program'

describe('subreg program', () => {
  it('registers every command', () => {
    const names = createProgram().commands.map((command) => command.name())
    expect(names).toEqual([
      'register',
      'status',
      'info',
      'estimate',
      'balance',
      'monitor',
      'auto-register',
      'network-stats',
      'export-config',
      'batch',
    ])
  })

  it('takes the RPC endpoint as a global option', () => {
    const program = createProgram()
    const rpcUrl = program.options.find((option) => option.long === '--rpc-url')
    expect(rpcUrl?.short).toBe('-r')
  })

  describe('register options', () => {
    it('requires subnet, wallet and hotkey', () => {
      const command = createRegisterCommand()
      const required = command.options
        .filter((option) => option.mandatory)
        .map((option) => option.long)
      expect(required).toEqual(['--subnet', '--wallet', '--hotkey'])
    })

    it('uses -H for the hotkey and leaves --burn-amount optional', () => {
      const command = createRegisterCommand()
      const hotkey = command.options.find((option) => option.long === '--hotkey')
      const burn = command.options.find((option) => option.long === '--burn-amount')
      expect(hotkey?.short).toBe('-H')
      expect(burn?.mandatory).toBe(false)
    })
  })

  it('defaults auto-register to three attempts', () => {
    const option = createAutoRegisterCommand().options.find(
      (candidate) => candidate.long === '--max-retries',
    )
    expect(option?.defaultValue).toBe(3)
  })

  it('defaults the monitor interval to a minute', () => {
    const command = createMonitorCommand()
    const interval = command.options.find((option) => option.long === '--interval')
    const neurons = command.options.find((option) => option.long === '--neurons')
    expect(interval?.defaultValue).toBe(60)
    expect(neurons?.variadic).toBe(true)
  })

  it('writes subnet_config.json unless told otherwise', () => {
    const output = createExportConfigCommand().options.find(
      (option) => option.long === '--output',
    )
    expect(output?.defaultValue).toBe('subnet_config.json')
  })
})
