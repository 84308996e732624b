export * from './src/account'
export * from './src/chain-client'
export * from './src/chain-rpc'
export * from './src/extrinsic-builder'
export * from './src/rpc/channel'
export * from './src/rpc/in-memory-channel'
export * from './src/rpc/schemas'
export * from './src/rpc/ws-channel'
export * from './src/state-reader'
