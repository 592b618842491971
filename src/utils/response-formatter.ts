/**
 * Response Formatting Utilities
 *
 * Provides helper functions for creating standardized API responses.
 * All responses include request_id and CORS headers; the allowed origin is
 * applied per request by `applyCorsHeaders`.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import {
  SuccessResponse,
  ErrorResponse,
  ErrorDetails,
  ResponseMeta,
  HttpStatus,
  ErrorCode,
} from '../models/response';

/**
 * CORS headers shared by all responses
 * The origin itself is only echoed back for allowed origins
 */
const CORS_HEADERS = {
  'Access-Control-Allow-Credentials': 'true',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization,X-Amz-Date,X-Api-Key,X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET,POST,PUT,DELETE,OPTIONS',
};

/**
 * Generate a unique request ID
 * Uses UUID v4 for globally unique identifiers
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Generate ISO-8601 timestamp
 */
export function generateTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Create a success response
 *
 * Wraps response data in standard envelope with request_id and timestamp.
 *
 * @param data - Response payload
 * @param statusCode - HTTP status code (default: 200)
 * @param meta - Optional metadata (e.g., pagination)
 * @param requestId - Optional request ID (generated if not provided)
 *
 * @example
 * ```typescript
 * return successResponse({ players }, HttpStatus.OK, undefined, requestId);
 * ```
 */
export function successResponse<T>(
  data: T,
  statusCode: HttpStatus = HttpStatus.OK,
  meta?: ResponseMeta,
  requestId?: string
): APIGatewayProxyResult {
  const response: SuccessResponse<T> = {
    request_id: requestId || generateRequestId(),
    timestamp: generateTimestamp(),
    data,
  };

  if (meta) {
    response.meta = meta;
  }

  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
    },
    body: JSON.stringify(response),
  };
}

/**
 * Create an error response
 *
 * @param code - Machine-readable error code
 * @param message - Human-readable error message
 * @param statusCode - HTTP status code
 * @param details - Optional additional error context
 * @param requestId - Optional request ID (generated if not provided)
 * @param extraHeaders - Headers added to the defaults
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  statusCode: HttpStatus,
  details?: unknown,
  requestId?: string,
  extraHeaders: Record<string, string> = {}
): APIGatewayProxyResult {
  const errorDetails: ErrorDetails = {
    code,
    message,
    request_id: requestId || generateRequestId(),
  };

  if (details !== undefined) {
    errorDetails.details = details;
  }

  const response: ErrorResponse = {
    error: errorDetails,
  };

  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
      ...extraHeaders,
    },
    body: JSON.stringify(response),
  };
}

/**
 * Create a validation error response (400)
 */
export function validationErrorResponse(
  message: string,
  details?: unknown,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.VALIDATION_ERROR,
    message,
    HttpStatus.BAD_REQUEST,
    details,
    requestId
  );
}

/**
 * Create an authentication error response (401)
 * Carries the bearer challenge header
 */
export function authenticationErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.AUTHENTICATION_ERROR,
    message,
    HttpStatus.UNAUTHORIZED,
    undefined,
    requestId,
    { 'WWW-Authenticate': 'Bearer' }
  );
}

/**
 * Create a not found error response (404)
 */
export function notFoundErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.NOT_FOUND,
    message,
    HttpStatus.NOT_FOUND,
    undefined,
    requestId
  );
}

/**
 * Create a conflict error response (400)
 * Duplicate registrations are a client error, tagged CONFLICT
 */
export function conflictErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.CONFLICT,
    message,
    HttpStatus.BAD_REQUEST,
    undefined,
    requestId
  );
}

/**
 * Create an internal server error response (500)
 *
 * @param details - Optional error details (only outside production)
 */
export function internalErrorResponse(
  message: string = 'Internal server error',
  details?: unknown,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.INTERNAL_ERROR,
    message,
    HttpStatus.INTERNAL_SERVER_ERROR,
    details,
    requestId
  );
}

/**
 * Create a service unavailable error response (503)
 */
export function serviceUnavailableErrorResponse(
  message: string = 'Service temporarily unavailable',
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.SERVICE_UNAVAILABLE,
    message,
    HttpStatus.SERVICE_UNAVAILABLE,
    undefined,
    requestId
  );
}

/**
 * Echo the request origin when it is allowed
 *
 * Credentials are allowed, so a wildcard origin is never sent.
 */
export function applyCorsHeaders(
  result: APIGatewayProxyResult,
  origin: string | undefined,
  allowedOrigins: string[]
): APIGatewayProxyResult {
  if (!origin || !allowedOrigins.includes(origin)) {
    return result;
  }

  return {
    ...result,
    headers: {
      ...result.headers,
      'Access-Control-Allow-Origin': origin,
      Vary: 'Origin',
    },
  };
}
