/**
 * Custom Error Classes
 */

import type { ZodIssue } from 'zod'

/**
 * Base error for all quadpath errors.
 */
export class GraphQueryError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'GraphQueryError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Invalid quad error.
 * Thrown when a quad cannot be built from a record or from JSON text.
 */
export class InvalidQuadError extends GraphQueryError {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = [],
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'InvalidQuadError'
  }
}

/**
 * Invalid parameter error.
 * Thrown when a chain operation receives the wrong kind of query argument.
 */
export class InvalidParameterError extends GraphQueryError {
  constructor(
    public readonly operation: string,
    public readonly expected: string,
    public readonly received: unknown,
  ) {
    super(`Invalid parameter in ${operation}: expected ${expected}, got ${describeValue(received)}`)
    this.name = 'InvalidParameterError'
  }
}

/**
 * Query format error.
 * Thrown when a step token and its parameters do not line up.
 */
export class QueryFormatError extends GraphQueryError {
  constructor(
    message: string,
    public readonly token: string,
  ) {
    super(message)
    this.name = 'QueryFormatError'
  }
}

/**
 * Configuration error.
 * Thrown when client options fail validation.
 */
export class ConfigurationError extends GraphQueryError {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Connection error.
 * Thrown when the HTTP request could not be completed.
 */
export class ConnectionError extends GraphQueryError {
  constructor(
    message: string,
    public readonly uri?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'ConnectionError'
  }
}

/**
 * Execution error.
 * Thrown when the query endpoint answers with a body that is not JSON.
 */
export class ExecutionError extends GraphQueryError {
  constructor(
    message: string,
    public readonly query?: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'ExecutionError'
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object') return value.constructor?.name ?? 'object'
  return typeof value
}
