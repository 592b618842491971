/**
 * Password Hasher
 *
 * One-way salted hashing of user passwords with bcrypt.
 */

import * as bcrypt from 'bcryptjs';
import { log, LogLevel } from '../utils/logger';

export class PasswordHasher {
  constructor(private readonly rounds: number = 12) {}

  /**
   * Hash a plaintext password; every call uses a fresh salt
   */
  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.rounds);
  }

  /**
   * Check a plaintext password against a stored digest
   *
   * A digest that is not a bcrypt hash never matches.
   */
  async verify(plaintext: string, digest: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plaintext, digest);
    } catch (error) {
      log(LogLevel.WARN, 'Stored password digest could not be compared', {
        error_message: error instanceof Error ? error.message : 'Unknown error',
      });
      return false;
    }
  }
}
