/**
 * Auth Service
 *
 * Signup, login and logout. Tokens are stateless, so logout has nothing to
 * invalidate; a token stays usable until it expires.
 */

import { UserStore } from '../repositories/user-repository';
import { PasswordHasher } from './password-hasher';
import { TokenService } from './token-service';
import { AuthError, AuthErrorCode, TokenResponse } from '../models/auth';
import { ConflictError } from '../models/errors';
import { LoginInput, SignupInput, User } from '../models/user';
import { logAuthentication } from '../utils/logger';
import { emitLoginFailure } from '../utils/metrics';

export class AuthService {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher,
    private tokenService: TokenService
  ) {}

  /**
   * Register a new active user
   *
   * @throws ConflictError if the username (or email) is already registered
   */
  async signup(input: SignupInput, requestId?: string): Promise<User> {
    const existing = await this.userStore.findByUsername(input.username);
    if (existing) {
      logAuthentication({
        requestId,
        action: 'SIGNUP',
        success: false,
        username: input.username,
        reason: 'Username already registered',
      });
      throw new ConflictError('Username already registered');
    }

    const hashedPassword = await this.passwordHasher.hash(input.password);
    const user = await this.userStore.create({
      email: input.email,
      username: input.username,
      hashed_password: hashedPassword,
    });

    logAuthentication({
      requestId,
      action: 'SIGNUP',
      success: true,
      userId: user.id,
      username: user.username,
    });

    return user;
  }

  /**
   * Exchange username and password for a bearer token
   *
   * Unknown usernames and wrong passwords fail identically.
   *
   * @throws AuthError INVALID_CREDENTIALS
   */
  async login(input: LoginInput, requestId?: string): Promise<TokenResponse> {
    const user = await this.userStore.findByUsername(input.username);
    const valid = user !== null && await this.passwordHasher.verify(input.password, user.hashed_password);

    if (!user || !valid) {
      logAuthentication({
        requestId,
        action: 'LOGIN',
        success: false,
        username: input.username,
        reason: user ? 'Password mismatch' : 'Unknown username',
      });
      await emitLoginFailure(user ? 'password_mismatch' : 'unknown_username');
      throw new AuthError(AuthErrorCode.INVALID_CREDENTIALS, 'Incorrect username or password');
    }

    logAuthentication({
      requestId,
      action: 'LOGIN',
      success: true,
      userId: user.id,
      username: user.username,
    });

    return {
      access_token: this.tokenService.issue(user.username),
      token_type: 'bearer',
    };
  }

  /**
   * Acknowledge a logout
   */
  async logout(user: User, requestId?: string): Promise<{ message: string }> {
    logAuthentication({
      requestId,
      action: 'LOGOUT',
      success: true,
      userId: user.id,
      username: user.username,
    });

    return { message: 'Successfully logged out' };
  }
}
