import { afterEach, describe, expect, it, vi } from 'vitest'
import { LoggerProvider } from '../logger'

describe('LoggerProvider', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('falls back to the console before init', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const provider = new LoggerProvider()

    provider.info('hello', 1)

    expect(provider.hasBeenInitializedValue).toBe(false)
    expect(log).toHaveBeenCalledTimes(1)
    expect(log.mock.calls[0][0]).toMatch(/\[INFO\] hello$/)
    expect(log.mock.calls[0][1]).toBe(1)
  })

  it('routes errors to console.error before init', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const provider = new LoggerProvider()
    const cause = new Error('boom')

    provider.error('failed', cause)

    expect(error.mock.calls[0][0]).toMatch(/\[ERROR\] failed$/)
    expect(error.mock.calls[0][1]).toBe(cause)
  })

  it('stops using the console after init', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const provider = new LoggerProvider()
    provider.init()

    provider.debug('quiet')

    expect(provider.hasBeenInitializedValue).toBe(true)
    expect(log).not.toHaveBeenCalled()
  })
})
