/**
 * Authentication Models
 *
 * Type definitions for token responses and authentication errors.
 */

/**
 * Token endpoint response
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

/**
 * Authentication error types
 */
export enum AuthErrorCode {
  MISSING_TOKEN = 'MISSING_TOKEN',
  INVALID_TOKEN = 'INVALID_TOKEN',
  EXPIRED_TOKEN = 'EXPIRED_TOKEN',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  UNKNOWN_USER = 'UNKNOWN_USER',
  INACTIVE_USER = 'INACTIVE_USER',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
}

/**
 * Authentication error
 */
export class AuthError extends Error {
  constructor(
    public code: AuthErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
