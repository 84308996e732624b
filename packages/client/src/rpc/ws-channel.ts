import { WsProvider } from '@polkadot/rpc-provider'
import { logger } from '@subreg/core'
import type { Safe, SafePromise } from '@subreg/types'
import { TransportError, safeError, safeResult, safeTry } from '@subreg/types'
import type { RpcChannel } from './channel'

export interface WsRpcChannelOptions {
  connectTimeoutMs: number
  /** passed to the provider, which checks for overdue requests periodically */
  requestTimeoutMs: number
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * JSON-RPC over one WebSocket, backed by `WsProvider`. The provider never
 * reconnects on its own; a dropped connection fails the remaining requests.
 */
export class WsRpcChannel implements RpcChannel {
  private closed = false

  private constructor(
    private readonly provider: WsProvider,
    private readonly url: string,
  ) {
    provider.on('disconnected', () => {
      if (!this.closed) logger.warn(`Connection to ${url} dropped`)
    })
  }

  static async connect(
    url: string,
    options: WsRpcChannelOptions,
  ): SafePromise<WsRpcChannel, TransportError> {
    let provider: WsProvider
    try {
      provider = new WsProvider(url, false, {}, options.requestTimeoutMs)
    } catch (error) {
      return safeError(
        new TransportError(`Invalid RPC endpoint ${url}: ${errorMessage(error)}`, {
          cause: error,
        }),
      )
    }

    const opened = new Promise<Safe<true, TransportError>>((resolve) => {
      const timer = setTimeout(() => {
        resolve(
          safeError(
            new TransportError(
              `Connection to ${url} timed out after ${options.connectTimeoutMs}ms`,
            ),
          ),
        )
      }, options.connectTimeoutMs)
      const settle = (result: Safe<true, TransportError>) => {
        clearTimeout(timer)
        unsubscribe.forEach((off) => off())
        resolve(result)
      }
      const refused = (error?: unknown) =>
        settle(
          safeError(
            new TransportError(
              error === undefined
                ? `Failed to connect to ${url}`
                : `Failed to connect to ${url}: ${errorMessage(error)}`,
              { cause: error },
            ),
          ),
        )
      const unsubscribe = [
        provider.on('connected', () => settle(safeResult(true))),
        provider.on('error', refused),
        provider.on('disconnected', () => refused()),
      ]
    })

    // connect() reports its own failures through the 'error' event
    const [connectError] = await safeTry(provider.connect())
    if (connectError) logger.debug(`Connecting to ${url} threw`, connectError)

    const [openError] = await opened
    if (openError) {
      const [disconnectError] = await safeTry(provider.disconnect())
      if (disconnectError) {
        logger.debug(`Discarding ${url} after a failed connect`, disconnectError)
      }
      return safeError(openError)
    }

    logger.debug(`Connected to ${url}`)
    return safeResult(new WsRpcChannel(provider, url))
  }

  async request(
    method: string,
    params: unknown[],
  ): SafePromise<unknown, TransportError> {
    if (this.closed) {
      return safeError(
        new TransportError(`Connection to ${this.url} is closed`, { method }),
      )
    }

    const [error, result] = await safeTry(
      this.provider.send<unknown>(method, params),
    )
    if (error) {
      return safeError(
        new TransportError(`${method} failed: ${error.message}`, {
          method,
          cause: error,
        }),
      )
    }
    return safeResult(result ?? null)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    const [error] = await safeTry(this.provider.disconnect())
    if (error) logger.warn(`Closing ${this.url} failed: ${error.message}`)
    logger.debug(`Disconnected from ${this.url}`)
  }
}
