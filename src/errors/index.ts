/**
 * WORKBank Analysis Error Handling Module
 *
 * Provides a standardized error hierarchy for the codebase.
 * All errors extend from WorkbankError which provides:
 * - Error codes for programmatic handling
 * - Serialization support
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - WorkbankError (base class)
 *   - ValidationError (input/schema validation failures)
 *     - SchemaMismatchError (raw table does not match its column contract)
 *   - SourceError (remote dataset failures)
 *     - NetworkError (transport or HTTP failures)
 *   - TimeoutError (operation timeout)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for WORKBank operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',
  TIMEOUT = 'TIMEOUT',

  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_TYPE = 'INVALID_TYPE',
  REQUIRED_FIELD = 'REQUIRED_FIELD',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',

  // Source errors
  SOURCE_ERROR = 'SOURCE_ERROR',
  SOURCE_NOT_FOUND = 'SOURCE_NOT_FOUND',
  NETWORK_ERROR = 'NETWORK_ERROR',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all WORKBank errors.
 *
 * @example
 * ```typescript
 * throw new WorkbankError('Join failed', ErrorCode.INTERNAL, {
 *   table: 'expert',
 * })
 * ```
 */
export class WorkbankError extends Error {
  override readonly name: string = 'WorkbankError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof WorkbankError ? this.cause.toJSON() : undefined,
    }
  }

  static fromJSON(data: SerializedError): WorkbankError {
    const cause = data.cause ? WorkbankError.fromJSON(data.cause) : undefined
    const error = new WorkbankError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input validation fails.
 */
export class ValidationError extends WorkbankError {
  override readonly name: string = 'ValidationError'

  constructor(
    message: string,
    context?: {
      field?: string
      expectedType?: string
      actualValue?: unknown
      operation?: string
    },
    cause?: Error,
    code?: ErrorCode
  ) {
    const resolved = code ?? (context?.field
      ? context.expectedType
        ? ErrorCode.INVALID_TYPE
        : ErrorCode.REQUIRED_FIELD
      : ErrorCode.VALIDATION_FAILED)

    super(message, resolved, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /** Field that failed validation */
  get field(): string | undefined {
    const field = this.context.field
    return typeof field === 'string' ? field : undefined
  }
}

/**
 * Error thrown when a raw table does not satisfy its column contract:
 * a missing column, a non-numeric or out-of-range rating, an empty key.
 */
export class SchemaMismatchError extends ValidationError {
  override readonly name: string = 'SchemaMismatchError'

  constructor(
    table: string,
    detail: string,
    context?: { column?: string; row?: number; value?: unknown },
    cause?: Error
  ) {
    const rowPart = context?.row !== undefined ? ` (row ${context.row})` : ''
    super(
      `Schema mismatch in ${table} table${rowPart}: ${detail}`,
      { field: context?.column ?? table, actualValue: context?.value, operation: 'load' },
      cause,
      ErrorCode.SCHEMA_MISMATCH
    )
    this.context.table = table
    if (context?.row !== undefined) this.context.row = context.row
  }

  get table(): string {
    return String(this.context.table)
  }
}

// =============================================================================
// Source Errors
// =============================================================================

/**
 * Error thrown when the remote dataset cannot provide a resource.
 */
export class SourceError extends WorkbankError {
  override readonly name: string = 'SourceError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SOURCE_ERROR,
    context?: {
      resource?: string
      url?: string
      status?: number
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }

  get resource(): string | undefined {
    const resource = this.context.resource
    return typeof resource === 'string' ? resource : undefined
  }
}

/**
 * Error thrown for network-related failures, including non-2xx responses.
 */
export class NetworkError extends SourceError {
  override readonly name: string = 'NetworkError'

  constructor(message: string, resource?: string, status?: number, cause?: Error) {
    const context: { resource?: string; status?: number } = {}
    if (resource !== undefined) context.resource = resource
    if (status !== undefined) context.status = status
    super(message, ErrorCode.NETWORK_ERROR, context, cause)
  }

  get status(): number | undefined {
    const status = this.context.status
    return typeof status === 'number' ? status : undefined
  }
}

// =============================================================================
// Timeout Error
// =============================================================================

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends WorkbankError {
  override readonly name: string = 'TimeoutError'

  constructor(
    operation: string,
    timeoutMs: number,
    cause?: Error
  ) {
    super(
      `Operation "${operation}" timed out after ${timeoutMs}ms`,
      ErrorCode.TIMEOUT,
      { operation, timeoutMs },
      cause
    )
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends WorkbankError {
  override readonly name: string = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      expectedValue?: unknown
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isWorkbankError(error: unknown): error is WorkbankError {
  return error instanceof WorkbankError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isSchemaMismatchError(error: unknown): error is SchemaMismatchError {
  return error instanceof SchemaMismatchError
}

/**
 * Check if an error is a SourceError (or any subclass)
 */
export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError ||
    (isWorkbankError(error) && (
      error.code === ErrorCode.SOURCE_ERROR ||
      error.code === ErrorCode.SOURCE_NOT_FOUND ||
      error.code === ErrorCode.NETWORK_ERROR
    ))
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a WorkbankError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): WorkbankError {
  if (error instanceof WorkbankError) {
    return error
  }

  if (error instanceof Error) {
    return new WorkbankError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new WorkbankError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * Create a source error from an HTTP status code
 */
export function errorFromStatus(status: number, resource: string): SourceError {
  if (status === 404) {
    return new SourceError(`Resource not found: ${resource}`, ErrorCode.SOURCE_NOT_FOUND, {
      resource,
      status,
    })
  }
  return new NetworkError(`HTTP ${status} while fetching ${resource}`, resource, status)
}

/**
 * Assert a condition, throwing a ValidationError if false
 */
export function assertValid(
  condition: boolean,
  message: string,
  context?: { field?: string; actualValue?: unknown; operation?: string }
): asserts condition {
  if (!condition) {
    throw new ValidationError(message, context, undefined, ErrorCode.INVALID_INPUT)
  }
}
