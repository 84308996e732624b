import type { SafePromise, TransportError } from '@subreg/types'

/**
 * Duplex JSON-RPC 2.0 channel to a chain node.
 *
 * `request` resolves with the raw `result` member, or a TransportError for
 * channel failures, timeouts and error responses.
 */
export interface RpcChannel {
  request(method: string, params: unknown[]): SafePromise<unknown, TransportError>
  close(): Promise<void>
}
