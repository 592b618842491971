/**
 * User Repository
 *
 * Credential store backed by the `users` table. Every query is
 * parameterized and runs on the store handle given to the constructor.
 */

import { Queryable } from '../config/database';
import { ConflictError } from '../models/errors';
import {
  NewUser,
  User,
  UserRow,
  UserWithCredentials,
  mapUserRow,
  mapUserRowWithCredentials,
} from '../models/user';

/**
 * Credential store capability
 */
export interface UserStore {
  findByUsername(username: string): Promise<UserWithCredentials | null>;
  create(user: NewUser): Promise<User>;
}

const USER_COLUMNS = 'id, email, username, hashed_password, is_active, created_at';

/**
 * PostgreSQL unique_violation
 */
const UNIQUE_VIOLATION = '23505';

function uniqueViolationConstraint(error: unknown): string | null {
  if (!(error instanceof Error) || !('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }
  return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : '';
}

/**
 * User Repository
 */
export class UserRepository implements UserStore {
  constructor(private readonly db: Queryable) {}

  /**
   * Find a user by username, including the password hash
   *
   * @returns User if found, null otherwise
   */
  async findByUsername(username: string): Promise<UserWithCredentials | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );

    return result.rows.length > 0 ? mapUserRowWithCredentials(result.rows[0]) : null;
  }

  /**
   * Insert a new active user
   *
   * @throws ConflictError when the username or email is already taken
   */
  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (email, username, hashed_password, is_active)
         VALUES ($1, $2, $3, TRUE)
         RETURNING ${USER_COLUMNS}`,
        [user.email, user.username, user.hashed_password]
      );

      return mapUserRow(result.rows[0]);
    } catch (error) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint === null) {
        throw error;
      }
      throw new ConflictError(
        constraint.includes('email') ? 'Email already registered' : 'Username already registered'
      );
    }
  }
}
