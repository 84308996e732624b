/**
 * Binary codec for subtensor storage and extrinsics
 */

export * from './src/core/bytes'
export * from './src/core/fixed-length'
export * from './src/extrinsic/call'
export * from './src/extrinsic/envelope'
export * from './src/extrinsic/era'
export * from './src/extrinsic/payload'
export * from './src/extrinsic/signed-extra'
export * from './src/state/account-info'
export * from './src/state/scalars'
export * from './src/storage/hashers'
export * from './src/storage/storage-key'
