/**
 * Shared types, errors and chain constants
 */

export * from './constants'
export * from './domain'
export * from './errors'
export * from './safe'
