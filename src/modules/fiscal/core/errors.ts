/**
 * Domain errors for Fiscal module.
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Backend failure: connection, driver or query execution.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  /** Logical operation that failed, e.g. 'getEntity' */
  readonly operation: string;
  /** Rendered query text, for diagnostics */
  readonly query: string;
  readonly cause?: unknown;
}

/**
 * Query timeout error.
 */
export interface TimeoutError {
  readonly type: 'TimeoutError';
  readonly message: string;
  readonly retryable: boolean;
  readonly operation: string;
  readonly query: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Malformed input; never reaches the backend.
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field: string;
}

/**
 * Entity not found error.
 */
export interface EntityNotFoundError {
  readonly type: 'EntityNotFoundError';
  readonly message: string;
  readonly code: string;
}

/**
 * County with no entities.
 */
export interface CountyNotFoundError {
  readonly type: 'CountyNotFoundError';
  readonly message: string;
  readonly county: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type BackendError = DatabaseError | TimeoutError;

/**
 * All possible fiscal module errors.
 */
export type FiscalError = BackendError | ValidationError | EntityNotFoundError | CountyNotFoundError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a DatabaseError.
 */
export const createDatabaseError = (
  operation: string,
  query: string,
  cause?: unknown
): DatabaseError => ({
  type: 'DatabaseError',
  message: `Fiscal ${operation} failed`,
  retryable: true,
  operation,
  query,
  cause,
});

/**
 * Creates a TimeoutError.
 */
export const createTimeoutError = (
  operation: string,
  query: string,
  cause?: unknown
): TimeoutError => ({
  type: 'TimeoutError',
  message: `Fiscal ${operation} query timed out`,
  retryable: true,
  operation,
  query,
  cause,
});

/**
 * Creates a ValidationError.
 */
export const createValidationError = (field: string, message: string): ValidationError => ({
  type: 'ValidationError',
  message,
  field,
});

/**
 * Creates an EntityNotFoundError.
 */
export const createEntityNotFoundError = (code: string): EntityNotFoundError => ({
  type: 'EntityNotFoundError',
  message: `Entity with code '${code}' not found`,
  code,
});

/**
 * Creates a CountyNotFoundError.
 */
export const createCountyNotFoundError = (county: string): CountyNotFoundError => ({
  type: 'CountyNotFoundError',
  message: `County '${county}' not found`,
  county,
});

// ─────────────────────────────────────────────────────────────────────────────
// Error Classification
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Checks if error is a timeout (for special handling).
 */
export const isTimeoutError = (cause: unknown): boolean => {
  if (cause instanceof Error) {
    const msg = cause.message.toLowerCase();
    return msg.includes('timeout') || msg.includes('canceling statement due to statement timeout');
  }
  return false;
};

export const isBackendError = (error: FiscalError): error is BackendError =>
  error.type === 'DatabaseError' || error.type === 'TimeoutError';

/**
 * Mapping of error types to HTTP status codes.
 */
export const FISCAL_ERROR_HTTP_STATUS: Record<FiscalError['type'], number> = {
  ValidationError: 400,
  EntityNotFoundError: 404,
  CountyNotFoundError: 404,
  DatabaseError: 500,
  TimeoutError: 500,
};

/**
 * Gets HTTP status code for a fiscal error.
 */
export const getHttpStatusForError = (error: FiscalError): number => {
  return FISCAL_ERROR_HTTP_STATUS[error.type];
};
