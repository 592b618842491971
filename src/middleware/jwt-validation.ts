/**
 * JWT Validation Middleware
 *
 * Resolves the bearer token on a request to an active user. Every failure
 * reaches the caller as the same AuthError; the specific reason is only
 * written to the AUTHENTICATION log.
 */

import { AuthError, AuthErrorCode } from '../models/auth';
import { User } from '../models/user';
import { UserStore } from '../repositories/user-repository';
import { TokenService } from '../services/token-service';
import { logAuthentication } from '../utils/logger';

export const CREDENTIALS_ERROR_MESSAGE = 'Could not validate credentials';

/**
 * Extract token from Authorization header
 */
export function extractToken(authHeader: string | undefined): string {
  if (!authHeader) {
    throw new AuthError(
      AuthErrorCode.MISSING_TOKEN,
      'Authorization header is missing'
    );
  }

  const parts = authHeader.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    throw new AuthError(
      AuthErrorCode.INVALID_TOKEN,
      'Authorization header must be in format: Bearer <token>'
    );
  }

  return parts[1];
}

/**
 * Authenticate a request
 *
 * 1. Extracts the token from the Authorization header
 * 2. Verifies signature and expiry
 * 3. Resolves the subject to a stored user
 * 4. Rejects inactive users
 *
 * @param authHeader - Authorization header value (Bearer <token>)
 * @returns The authenticated user
 * @throws AuthError with a generic message for every failure
 */
export async function authenticate(
  authHeader: string | undefined,
  tokenService: TokenService,
  userStore: UserStore,
  requestId?: string
): Promise<User> {
  try {
    const username = tokenService.verify(extractToken(authHeader));

    const user = await userStore.findByUsername(username);
    if (!user) {
      throw new AuthError(AuthErrorCode.UNKNOWN_USER, 'Token subject does not match a user');
    }
    if (!user.is_active) {
      throw new AuthError(AuthErrorCode.INACTIVE_USER, 'User is inactive');
    }

    logAuthentication({
      requestId,
      action: 'TOKEN',
      success: true,
      userId: user.id,
      username: user.username,
    });

    const { hashed_password: _hash, ...publicUser } = user;
    return publicUser;
  } catch (error) {
    if (!(error instanceof AuthError)) {
      throw error;
    }

    logAuthentication({
      requestId,
      action: 'TOKEN',
      success: false,
      reason: `${error.code}: ${error.message}`,
    });

    throw new AuthError(error.code, CREDENTIALS_ERROR_MESSAGE);
  }
}
