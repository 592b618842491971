/**
 * Roster Schema Migration (V001)
 *
 * Tables created:
 * - users: Accounts that can sign in and manage the roster
 * - players: Roster entries, searchable by name
 */

import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('users', {
    id: 'id',
    email: {
      type: 'varchar(255)',
      notNull: true,
      unique: true,
    },
    username: {
      type: 'varchar(100)',
      notNull: true,
      unique: true,
    },
    hashed_password: {
      type: 'varchar(255)',
      notNull: true,
    },
    is_active: {
      type: 'boolean',
      notNull: true,
      default: true,
    },
    created_at: {
      type: 'timestamptz',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createTable('players', {
    id: 'id',
    name: {
      type: 'varchar(255)',
      notNull: true,
      check: "btrim(name) <> ''",
    },
    position: {
      type: 'varchar(100)',
    },
    team: {
      type: 'varchar(100)',
    },
    age: {
      type: 'integer',
    },
    jersey_number: {
      type: 'integer',
    },
    created_at: {
      type: 'timestamptz',
      notNull: true,
      default: pgm.func('NOW()'),
    },
    updated_at: {
      type: 'timestamptz',
    },
  });

  // Backs case-insensitive name search
  pgm.sql('CREATE INDEX players_name_lower_idx ON players (lower(name))');
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('players', { cascade: true });
  pgm.dropTable('users', { cascade: true });
}
