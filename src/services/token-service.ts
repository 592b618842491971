/**
 * Token Service
 *
 * Issues and verifies signed, time-limited bearer tokens. A token is valid
 * when its signature verifies and the current time is before its expiry;
 * nothing is stored server-side.
 */

import * as jwt from 'jsonwebtoken';
import { TokenAlgorithm } from '../config/environment';
import { AuthError, AuthErrorCode } from '../models/auth';

export interface TokenServiceOptions {
  secret: string;
  algorithm?: TokenAlgorithm;
  expiresInMinutes?: number;
  /** Current time in milliseconds */
  clock?: () => number;
}

export class TokenService {
  private readonly secret: string;
  private readonly algorithm: TokenAlgorithm;
  private readonly expiresInMinutes: number;
  private readonly clock: () => number;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('Token signing key must not be empty');
    }
    this.secret = options.secret;
    this.algorithm = options.algorithm ?? 'HS256';
    this.expiresInMinutes = options.expiresInMinutes ?? 30;
    this.clock = options.clock ?? Date.now;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }

  /**
   * Issue a token for a subject
   *
   * @param subject - Username the token speaks for
   * @param ttlMinutes - Lifetime; defaults to the configured expiry
   */
  issue(subject: string, ttlMinutes: number = this.expiresInMinutes): string {
    return jwt.sign({ sub: subject, iat: this.nowSeconds() }, this.secret, {
      algorithm: this.algorithm,
      expiresIn: Math.round(ttlMinutes * 60),
    });
  }

  /**
   * Verify a token and return its subject
   *
   * @throws AuthError EXPIRED_TOKEN once the expiry has passed
   * @throws AuthError INVALID_SIGNATURE when the signature does not match
   * @throws AuthError INVALID_TOKEN for anything else that does not decode
   */
  verify(token: string): string {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthError(AuthErrorCode.EXPIRED_TOKEN, 'Token has expired');
      }
      if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
        throw new AuthError(AuthErrorCode.INVALID_SIGNATURE, 'Invalid token signature');
      }
      throw new AuthError(
        AuthErrorCode.INVALID_TOKEN,
        `Invalid token: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
      throw new AuthError(AuthErrorCode.INVALID_TOKEN, 'Token missing subject claim');
    }
    if (typeof payload.exp !== 'number') {
      throw new AuthError(AuthErrorCode.INVALID_TOKEN, 'Token missing expiry claim');
    }

    return payload.sub;
  }
}
