/**
 * Database Migration Runner
 *
 * Applies the roster schema with idempotent DDL so it can run from a
 * Lambda function, where the node-pg-migrate CLI is not available.
 * Mirrors migrations/1735000000000_create-roster-schema.ts.
 */

import { Queryable, query } from '../config/database';
import { log, LogLevel } from '../utils/logger';

export interface MigrationResult {
  success: boolean;
  message: string;
  tables?: string[];
  error?: string;
}

const SCHEMA_STATEMENTS: { table: string; sql: string }[] = [
  {
    table: 'users',
    sql: `
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        email VARCHAR(255) NOT NULL UNIQUE,
        username VARCHAR(100) NOT NULL UNIQUE,
        hashed_password VARCHAR(255) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `,
  },
  {
    table: 'players',
    sql: `
      CREATE TABLE IF NOT EXISTS players (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL CHECK (btrim(name) <> ''),
        position VARCHAR(100),
        team VARCHAR(100),
        age INTEGER,
        jersey_number INTEGER,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ
      )
    `,
  },
];

const INDEX_STATEMENTS = [
  'CREATE INDEX IF NOT EXISTS players_name_lower_idx ON players (lower(name))',
];

const poolQueryable: Queryable = { query };

/**
 * Run database migrations
 *
 * @param db - Store handle; defaults to the shared pool
 */
export async function runMigrations(db: Queryable = poolQueryable): Promise<MigrationResult> {
  try {
    log(LogLevel.INFO, 'Starting database migrations');

    await db.query('SELECT NOW()');

    for (const statement of SCHEMA_STATEMENTS) {
      await db.query(statement.sql);
      log(LogLevel.INFO, 'Created table', { table: statement.table });
    }

    for (const statement of INDEX_STATEMENTS) {
      await db.query(statement);
    }

    return {
      success: true,
      message: 'Database migrations completed successfully',
      tables: SCHEMA_STATEMENTS.map((statement) => statement.table),
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log(LogLevel.ERROR, 'Migration failed', { error_message: errorMessage });
    return {
      success: false,
      message: 'Migration failed',
      error: errorMessage,
    };
  }
}

// Allow running directly after a build: node dist/src/scripts/run-migrations.js
if (require.main === module) {
  runMigrations()
    .then((result) => {
      process.exitCode = result.success ? 0 : 1;
    })
    .catch((error: unknown) => {
      log(LogLevel.ERROR, 'Fatal migration error', {
        error_message: error instanceof Error ? error.message : 'Unknown error',
      });
      process.exitCode = 1;
    });
}
