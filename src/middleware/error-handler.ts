/**
 * Error Handling Middleware
 *
 * Centralized error handling that catches and formats different types of errors
 * into standardized API responses with appropriate HTTP status codes.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { AuthError } from '../models/auth';
import {
  NotFoundError,
  BadRequestError,
  ConflictError,
  ServiceUnavailableError,
} from '../models/errors';
import {
  authenticationErrorResponse,
  notFoundErrorResponse,
  validationErrorResponse,
  conflictErrorResponse,
  internalErrorResponse,
  serviceUnavailableErrorResponse,
} from '../utils/response-formatter';
import { log, LogLevel } from '../utils/logger';

/**
 * Field-level validation problem
 */
export interface FieldError {
  field: string;
  message: string;
}

/**
 * Validation error class with optional field-level details
 */
export class ValidationError extends Error {
  constructor(message: string, public details?: FieldError[]) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Check if error is a database connection error
 *
 * Detects common database connection error patterns:
 * - ECONNREFUSED: Connection refused
 * - ETIMEDOUT: Connection timeout
 * - ENOTFOUND: Host not found
 * - Connection terminated unexpectedly
 */
export function isDatabaseConnectionError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('connection terminated') ||
    message.includes('connection refused') ||
    message.includes('connect timeout')
  );
}

/**
 * Handle error and format appropriate response
 *
 * Maps application errors to standardized API responses:
 * - Authentication errors (401)
 * - Not found errors (404)
 * - Conflict errors (400, code CONFLICT)
 * - Validation and bad request errors (400)
 * - Database connection errors (503)
 * - Generic errors (500)
 *
 * @example
 * ```typescript
 * try {
 *   // ... operation
 * } catch (error) {
 *   return handleError(error, requestId);
 * }
 * ```
 */
export function handleError(
  error: unknown,
  requestId: string
): APIGatewayProxyResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AuthError) {
    return authenticationErrorResponse(err.message, requestId);
  }

  if (err instanceof NotFoundError) {
    return notFoundErrorResponse(err.message, requestId);
  }

  if (err instanceof ConflictError) {
    return conflictErrorResponse(err.message, requestId);
  }

  if (err instanceof BadRequestError || err instanceof ValidationError) {
    return validationErrorResponse(err.message, err.details, requestId);
  }

  if (err instanceof ServiceUnavailableError || isDatabaseConnectionError(err)) {
    const message = err instanceof ServiceUnavailableError
      ? err.message
      : 'Database connection failed';
    return serviceUnavailableErrorResponse(message, requestId);
  }

  log(LogLevel.ERROR, 'Unhandled error', {
    request_id: requestId,
    error_name: err.name,
    error_message: err.message,
    stack: err.stack,
  });

  return internalErrorResponse(
    'Internal server error',
    process.env.NODE_ENV === 'development' ? { error: err.message } : undefined,
    requestId
  );
}
