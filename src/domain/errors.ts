/**
 * Domain Errors
 *
 * Error codes and the failures raised by pure fee estimation and metadata
 * construction. Outer layers add their own subclasses in services/errors.
 */

export const ErrorCodes = {
  // General errors
  GENERIC_ERROR: -32000,

  // Fee planning errors (-32100 to -32199)
  ORACLE_FAILURE: -32101,
  NEGATIVE_MARGINAL_FEE: -32102,
  NO_SOURCES: -32103,
  INSUFFICIENT_FUNDS: -32104,
  INVALID_METADATA: -32105,
  CONFIG_ERROR: -32106
} as const

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes]

/**
 * Application error with structured code and context
 */
export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly context?: Record<string, unknown>
  public readonly timestamp: number

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.GENERIC_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'AppError'
    this.code = code
    this.context = context
    this.timestamp = Date.now()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError)
    }
  }

  toJSON(): { code: number; message: string; data?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.context && { data: this.context })
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCode: ErrorCode = ErrorCodes.GENERIC_ERROR): AppError {
    if (error instanceof AppError) {
      return error
    }

    if (error instanceof Error) {
      return new AppError(error.message, defaultCode, { originalError: error.name }, { cause: error })
    }

    if (typeof error === 'string') {
      return new AppError(error, defaultCode)
    }

    return new AppError('An unknown error occurred', defaultCode)
  }
}

// Fee estimation

export class OracleFailureError extends AppError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown,
    code: ErrorCode = ErrorCodes.ORACLE_FAILURE
  ) {
    super(message, code, context, { cause })
    this.name = 'OracleFailureError'
  }

  /**
   * Wrap whatever the oracle or builder threw. AppErrors pass through.
   */
  static wrap(error: unknown, stage: string): AppError {
    if (error instanceof AppError) {
      return error
    }
    const reason = error instanceof Error ? error.message : String(error)
    return new OracleFailureError(`Fee oracle failed during ${stage}: ${reason}`, { stage }, error)
  }
}

export class NegativeMarginalFeeError extends OracleFailureError {
  constructor(feeBase: bigint, feeWithOneInput: bigint) {
    super(
      `Fee oracle reported a lower fee with one input (${feeWithOneInput}) than with none (${feeBase})`,
      { feeBase: feeBase.toString(), feeWithOneInput: feeWithOneInput.toString() },
      undefined,
      ErrorCodes.NEGATIVE_MARGINAL_FEE
    )
    this.name = 'NegativeMarginalFeeError'
  }
}

// Metadata

export class InvalidMetadataError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_METADATA, context)
    this.name = 'InvalidMetadataError'
  }
}
