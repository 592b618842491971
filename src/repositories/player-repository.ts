/**
 * Player Repository
 *
 * Data access layer for players. All queries are parameterized and run on
 * the request-scoped store handle passed to the constructor.
 */

import { Queryable } from '../config/database';
import { BadRequestError } from '../models/errors';
import {
  Player,
  PlayerCreateInput,
  PlayerRow,
  PlayerUpdateInput,
  UPDATABLE_PLAYER_FIELDS,
  mapPlayerRow,
} from '../models/player';

/**
 * Player store capability
 */
export interface PlayerStore {
  create(input: PlayerCreateInput): Promise<Player>;
  findById(id: number): Promise<Player | null>;
  findAll(skip: number, limit: number): Promise<Player[]>;
  searchByName(fragment: string, skip: number, limit: number): Promise<Player[]>;
  update(id: number, changes: PlayerUpdateInput): Promise<Player | null>;
  delete(id: number): Promise<boolean>;
}

const PLAYER_COLUMNS = 'id, name, position, team, age, jersey_number, created_at, updated_at';

/**
 * PostgreSQL class 22 (data exception), e.g. 22003 numeric_value_out_of_range
 */
const DATA_EXCEPTION_CLASS = '22';

function dataExceptionMessage(error: unknown): string | null {
  if (
    !(error instanceof Error) ||
    !('code' in error) ||
    typeof error.code !== 'string' ||
    !error.code.startsWith(DATA_EXCEPTION_CLASS)
  ) {
    return null;
  }
  return error.message;
}

async function rejectingBadData<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    const message = dataExceptionMessage(error);
    if (message === null) {
      throw error;
    }
    throw new BadRequestError(`Invalid player data: ${message}`);
  }
}

/**
 * Escape LIKE wildcards so the fragment matches literally
 */
export function escapeLikePattern(fragment: string): string {
  return fragment.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Player Repository
 */
export class PlayerRepository implements PlayerStore {
  constructor(private readonly db: Queryable) {}

  /**
   * Insert a player; id and created_at come from the database
   *
   * @throws BadRequestError when the database rejects a value
   */
  async create(input: PlayerCreateInput): Promise<Player> {
    const result = await rejectingBadData(() =>
      this.db.query<PlayerRow>(
        `INSERT INTO players (name, position, team, age, jersey_number)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${PLAYER_COLUMNS}`,
        [
          input.name,
          input.position ?? null,
          input.team ?? null,
          input.age ?? null,
          input.jersey_number ?? null,
        ]
      )
    );

    return mapPlayerRow(result.rows[0]);
  }

  /**
   * Find a player by ID
   *
   * @returns Player if found, null otherwise
   */
  async findById(id: number): Promise<Player | null> {
    const result = await this.db.query<PlayerRow>(
      `SELECT ${PLAYER_COLUMNS} FROM players WHERE id = $1`,
      [id]
    );

    return result.rows.length > 0 ? mapPlayerRow(result.rows[0]) : null;
  }

  /**
   * List players in id order with offset pagination
   */
  async findAll(skip: number, limit: number): Promise<Player[]> {
    const result = await this.db.query<PlayerRow>(
      `SELECT ${PLAYER_COLUMNS} FROM players ORDER BY id ASC OFFSET $1 LIMIT $2`,
      [skip, limit]
    );

    return result.rows.map(mapPlayerRow);
  }

  /**
   * Case-insensitive substring search on name
   */
  async searchByName(fragment: string, skip: number, limit: number): Promise<Player[]> {
    const result = await this.db.query<PlayerRow>(
      `SELECT ${PLAYER_COLUMNS}
       FROM players
       WHERE name ILIKE $1
       ORDER BY id ASC
       OFFSET $2 LIMIT $3`,
      [`%${escapeLikePattern(fragment)}%`, skip, limit]
    );

    return result.rows.map(mapPlayerRow);
  }

  /**
   * Overwrite only the supplied fields and refresh updated_at
   *
   * @returns Updated player, or null when no player has this id
   * @throws BadRequestError when the database rejects a value
   */
  async update(id: number, changes: PlayerUpdateInput): Promise<Player | null> {
    const assignments: string[] = [];
    const params: unknown[] = [id];

    for (const field of UPDATABLE_PLAYER_FIELDS) {
      if (changes[field] !== undefined) {
        params.push(changes[field]);
        assignments.push(`${field} = $${params.length}`);
      }
    }
    assignments.push('updated_at = NOW()');

    const result = await rejectingBadData(() =>
      this.db.query<PlayerRow>(
        `UPDATE players SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${PLAYER_COLUMNS}`,
        params
      )
    );

    return result.rows.length > 0 ? mapPlayerRow(result.rows[0]) : null;
  }

  /**
   * Delete a player
   *
   * @returns true when a row was removed
   */
  async delete(id: number): Promise<boolean> {
    const result = await this.db.query<{ id: number }>(
      'DELETE FROM players WHERE id = $1 RETURNING id',
      [id]
    );

    return result.rows.length > 0;
  }
}
