/**
 * User Models
 *
 * Users are created at signup and never modified afterwards.
 */

/**
 * User as returned by the API (never carries the password hash)
 */
export interface User {
  id: number;
  email: string;
  username: string;
  is_active: boolean;
  created_at: Date;
}

/**
 * User together with the stored credential, for login checks only
 */
export interface UserWithCredentials extends User {
  hashed_password: string;
}

/**
 * User database row (matches PostgreSQL schema)
 */
export interface UserRow {
  id: number;
  email: string;
  username: string;
  hashed_password: string;
  is_active: boolean;
  created_at: Date;
}

/**
 * Fields accepted by POST /signup
 */
export interface SignupInput {
  email: string;
  username: string;
  password: string;
}

/**
 * Fields accepted by POST /token
 */
export interface LoginInput {
  username: string;
  password: string;
}

/**
 * New user record handed to the credential store
 */
export interface NewUser {
  email: string;
  username: string;
  hashed_password: string;
}

/**
 * Convert database row to the public User model
 */
export function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    is_active: row.is_active,
    created_at: row.created_at,
  };
}

/**
 * Convert database row to a User with its password hash
 */
export function mapUserRowWithCredentials(row: UserRow): UserWithCredentials {
  return {
    ...mapUserRow(row),
    hashed_password: row.hashed_password,
  };
}
