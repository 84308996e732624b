// Re-export viem hex functions for convenience
export { bytesToHex, type Hex, hexToBytes } from 'viem'
// Safe types for error handling
export {
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
} from '@subreg/types'
export * from './src/env'
export * from './src/logger'
export * from './src/utils/crypto'
