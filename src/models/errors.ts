/**
 * Application Error Models
 *
 * Common error types used across the application.
 * These errors are mapped to appropriate HTTP status codes
 * by the error handling middleware.
 */

/**
 * Resource not found error (404)
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Bad request error (400)
 */
export class BadRequestError extends Error {
  constructor(message: string, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Conflict error (400, code CONFLICT), e.g. a username that is already registered
 */
export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/**
 * CSV import aborted on a row (400)
 *
 * Rows inserted before the failing one stay committed; `imported` says
 * how many.
 */
export class CsvImportError extends BadRequestError {
  constructor(message: string, public row: number, public imported: number) {
    super(message, { row, imported });
    this.name = 'CsvImportError';
  }
}

/**
 * Service unavailable error (503)
 */
export class ServiceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceUnavailableError';
  }
}
