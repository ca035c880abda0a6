/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the whole run.
 *
 * USAGE:
 * ```typescript
 * // Fatal setup problem
 * throw new ConfigurationError('GOOGLE_MAPS_API_KEY is not set', ErrorCode.CONFIG_MISSING_CREDENTIAL);
 *
 * // Remote failure, classified later by the retry policy
 * throw new MapsApiError('Distance Matrix returned OVER_QUERY_LIMIT', 'OVER_QUERY_LIMIT');
 * ```
 *
 * Operational errors are expected failures (bad input, missing key, API
 * refusing a route). Anything else is a bug and is logged with its stack.
 *
 * =============================================================================
 */

import { ErrorCode } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// SETUP ERRORS (fatal, raised before any row is processed)
// =============================================================================

export class ConfigurationError extends AppError {
  constructor(
    message: string = 'Invalid configuration',
    code: ErrorCode | string = ErrorCode.CONFIG_INVALID,
    details?: Record<string, unknown>
  ) {
    super(message, code, true, details);
  }
}

export class InputFileNotFoundError extends AppError {
  constructor(filePath: string) {
    super(`Input file not found: ${filePath}`, ErrorCode.INPUT_FILE_NOT_FOUND, true, { filePath });
  }
}

/**
 * Header is missing a required column, or the file cannot be parsed
 */
export class MalformedInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INPUT_SCHEMA_INVALID, true, details);
  }
}

// =============================================================================
// ROW ERRORS (reported per row, never abort the run)
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

export class RowValidationError extends AppError {
  public readonly rowNumber: number;
  public readonly errors: ValidationErrorDetail[];

  constructor(rowNumber: number, errors: ValidationErrorDetail[]) {
    const summary = errors.map(e => `${e.field}: ${e.message}`).join('; ');
    super(`Row ${rowNumber} is invalid (${summary})`, ErrorCode.ROW_INVALID, true, { rowNumber, errors });
    this.rowNumber = rowNumber;
    this.errors = errors;
  }

  static fromZodError(
    rowNumber: number,
    zodError: { errors: Array<{ path: (string | number)[]; message: string }> }
  ): RowValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new RowValidationError(rowNumber, errors);
  }
}

// =============================================================================
// EXTERNAL API ERRORS
// =============================================================================

/**
 * A Google Maps call failed. `signal` names why (an API status such as
 * OVER_QUERY_LIMIT, or an HTTP-layer signal such as HTTP_5XX / TIMEOUT);
 * the retry policy decides whether it is transient.
 */
export class MapsApiError extends AppError {
  public readonly signal: string;

  constructor(message: string, signal: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.MAPS_API_ERROR, true, { signal, ...details });
    this.signal = signal;
  }
}

export class RetryExhaustedError extends AppError {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(operation: string, attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(
      `${operation} failed after ${attempts} attempt(s): ${reason}`,
      ErrorCode.RETRY_EXHAUSTED,
      true,
      { operation, attempts }
    );
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

export function isMapsApiError(error: unknown): error is MapsApiError {
  return error instanceof MapsApiError;
}

export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return error instanceof RetryExhaustedError;
}

/**
 * Best-effort message for logs and fallback reasons
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
