/**
 * Structured Error Handling
 *
 * Provides consistent error types, codes, and handling across fee
 * estimation, input selection and configuration.
 */

import { AppError, ErrorCodes } from '../domain/errors'

export {
  AppError,
  ErrorCodes,
  OracleFailureError,
  NegativeMarginalFeeError,
  InvalidMetadataError
} from '../domain/errors'
export type { ErrorCode } from '../domain/errors'

// Input selection

export class NoSourcesError extends AppError {
  constructor(available: number) {
    super('No unspent sources available to pay the fee', ErrorCodes.NO_SOURCES, { available })
    this.name = 'NoSourcesError'
  }
}

export class InsufficientFundsError extends AppError {
  constructor(required: bigint, available: bigint, inputs: number) {
    super(
      `Insufficient funds: need ${required} lovelace for ${inputs} input${inputs === 1 ? '' : 's'}, have ${available} lovelace`,
      ErrorCodes.INSUFFICIENT_FUNDS,
      { required: required.toString(), available: available.toString(), inputs }
    )
    this.name = 'InsufficientFundsError'
  }
}

// Configuration

export class ConfigError extends AppError {
  constructor(variable: string, value: string, expected: string) {
    super(`Invalid ${variable}: "${value}" (expected ${expected})`, ErrorCodes.CONFIG_ERROR, { variable, value })
    this.name = 'ConfigError'
  }
}

/**
 * Type guard to check if a value is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Get user-friendly error message
 */
export function getUserMessage(error: unknown): string {
  if (error instanceof AppError) {
    switch (error.code) {
      case ErrorCodes.NO_SOURCES:
        return 'No funds found at the payment address. Send some funds there and try again.'
      case ErrorCodes.INSUFFICIENT_FUNDS:
        return 'The payment address does not hold enough funds to pay the transaction fee.'
      default:
        return error.message
    }
  }

  if (error instanceof Error) {
    return error.message
  }

  return 'An unexpected error occurred'
}
