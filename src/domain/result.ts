/**
 * Result Type for Functional Error Handling
 *
 * Provides a standardized Result type for handling success/failure cases
 * without throwing exceptions. Expected outcomes (no funds, bad config)
 * travel as Err values; contract violations are still thrown.
 *
 * @module domain/result
 *
 * @example
 * ```typescript
 * const result = loadConfig()
 * if (isOk(result)) {
 *   console.log(result.value.network)
 * } else {
 *   console.error(result.error.message)
 * }
 * ```
 */

// ============================================
// Result Type Definition
// ============================================

/**
 * Success result containing a value
 */
export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

/**
 * Failure result containing an error
 */
export interface Err<E> {
  readonly ok: false
  readonly error: E
}

export type Result<T, E = Error> = Ok<T> | Err<E>

// ============================================
// Constructors
// ============================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

// ============================================
// Type Guards
// ============================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false
}

// ============================================
// Unwrap Functions
// ============================================

/**
 * Extract value from Ok result, throw if Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value
  }
  throw result.error instanceof Error ? result.error : new Error(String(result.error))
}

/**
 * Wrap a sync function that might throw in a Result
 */
export function fromTry<T, E>(fn: () => T, errorMapper: (error: unknown) => E): Result<T, E> {
  try {
    return ok(fn())
  } catch (e) {
    return err(errorMapper(e))
  }
}
