/**
 * vote-tx-fees
 *
 * Linear fee model estimation and fee-covering input selection for vote
 * registration transactions.
 */

export * from './domain'
export { PROTOCOL, TRANSACTION, METADATA } from './config'
export {
  AppError,
  ErrorCodes,
  OracleFailureError,
  NegativeMarginalFeeError,
  NoSourcesError,
  InsufficientFundsError,
  InvalidMetadataError,
  ConfigError,
  isAppError,
  getUserMessage
} from './services/errors'
export type { ErrorCode } from './services/errors'
export { loadConfig, configureFromEnv } from './services/config'
export type { FeeConfig, NetworkType } from './services/config'
export { planVoteTransactionFees } from './services/feePlanning'
export type { FeePlan, FeePlanRequest } from './services/feePlanning'
export { logger, feeLogger, Logger } from './services/logger'
export type { LogLevel, LogEntry, LoggerConfig } from './services/logger'
