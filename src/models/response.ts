/**
 * API Response Models
 *
 * Type definitions for standardized API responses.
 * All responses include request_id for traceability.
 */

/**
 * Pagination metadata for list responses
 */
export interface PaginationMeta {
  skip: number;
  limit: number;
  count: number;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  pagination?: PaginationMeta;
}

/**
 * Standard success response envelope
 */
export interface SuccessResponse<T> {
  request_id: string;
  timestamp: string;
  data: T;
  meta?: ResponseMeta;
}

/**
 * Error details object
 */
export interface ErrorDetails {
  code: string;
  message: string;
  request_id: string;
  details?: unknown;
}

/**
 * Standard error response envelope
 */
export interface ErrorResponse {
  error: ErrorDetails;
}

/**
 * HTTP status codes
 */
export enum HttpStatus {
  OK = 200,
  CREATED = 201,
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  NOT_FOUND = 404,
  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Standard error codes
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}
