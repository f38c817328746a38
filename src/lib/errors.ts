import { ErrorCode, type BookingResult, type ErrorBody } from '../types/index.js';

/**
 * Raised inside a unit of work to abort it with a structured reason.
 * The transaction wrapper rolls back and the engine boundary turns it
 * into a failed BookingResult.
 */
export class BookingError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BookingError';
    this.code = code;
    this.details = details;
  }

  toBody(): ErrorBody {
    return this.details
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}

/**
 * Driver error code (SQLITE_BUSY, SQLITE_CONSTRAINT_UNIQUE, ...) or undefined
 * when the value did not come from SQLite.
 */
export function sqliteErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code.startsWith('SQLITE_') ? error.code : undefined;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  const code = sqliteErrorCode(error);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/** Map anything thrown at the storage boundary to an error body. */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof BookingError) {
    return error.toBody();
  }

  const code = sqliteErrorCode(error);
  if (code) {
    return {
      code: ErrorCode.STORAGE_ERROR,
      message: code === 'SQLITE_BUSY'
        ? 'The database is busy, nothing was changed. Retry the request'
        : 'Storage operation failed, nothing was changed',
      details: {
        cause: code,
        reason: error instanceof Error ? error.message : String(error),
      },
    };
  }

  return {
    code: ErrorCode.STORAGE_ERROR,
    message: 'Storage operation failed, nothing was changed',
    details: { reason: error instanceof Error ? error.message : String(error) },
  };
}

export function failure<T>(error: ErrorBody): BookingResult<T> {
  return { success: false, error };
}

export function validationFailure<T>(
  message: string,
  details?: Record<string, unknown>
): BookingResult<T> {
  return failure(new BookingError(ErrorCode.VALIDATION_ERROR, message, details).toBody());
}
