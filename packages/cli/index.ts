export * from './src/program'
export * from './src/utils/batch-config'
export * from './src/utils/format'
export * from './src/utils/key-loading'
export * from './src/utils/report'
export * from './src/workflow/batch-runner'
export * from './src/workflow/network-stats'
export * from './src/workflow/registration-workflow'
export * from './src/workflow/status'
