/**
 * Domain Layer - Pure Business Logic
 *
 * This layer contains the fee model and selection logic with no side
 * effects. Functions here are pure and have no dependencies on logging,
 * configuration sources or the network.
 */

export * from './types'
export * from './result'
export * from './metadata'
export * from './transaction'
export * from './wallet'
