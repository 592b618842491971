/**
 * Player Models
 *
 * Type definitions for players and the payloads that create or change them.
 */

/**
 * Player entity
 */
export interface Player {
  id: number;                    // Serial id assigned by the store
  name: string;                  // Never empty or whitespace-only
  position?: string;             // Optional position (e.g., "Forward")
  team?: string;                 // Optional team name
  age?: number;                  // Optional age in years
  jersey_number?: number;        // Optional jersey number (e.g., 23)
  created_at: Date;              // Creation timestamp
  updated_at?: Date;             // Set on every update
}

/**
 * Player database row (matches PostgreSQL schema)
 */
export interface PlayerRow {
  id: number;
  name: string;
  position: string | null;
  team: string | null;
  age: number | null;
  jersey_number: number | null;
  created_at: Date;
  updated_at: Date | null;
}

/**
 * Fields accepted when creating a player
 */
export interface PlayerCreateInput {
  name: string;
  position?: string | null;
  team?: string | null;
  age?: number | null;
  jersey_number?: number | null;
}

/**
 * Fields accepted when updating a player
 *
 * Only keys present in the object are written. `null` clears an optional
 * field; `name` can be changed but never cleared.
 */
export interface PlayerUpdateInput {
  name?: string;
  position?: string | null;
  team?: string | null;
  age?: number | null;
  jersey_number?: number | null;
}

/**
 * Columns a partial update may touch, in statement order
 */
export const UPDATABLE_PLAYER_FIELDS = [
  'name',
  'position',
  'team',
  'age',
  'jersey_number',
] as const;

/**
 * Convert database row to Player model
 */
export function mapPlayerRow(row: PlayerRow): Player {
  return {
    id: row.id,
    name: row.name,
    position: row.position ?? undefined,
    team: row.team ?? undefined,
    age: row.age ?? undefined,
    jersey_number: row.jersey_number ?? undefined,
    created_at: row.created_at,
    updated_at: row.updated_at ?? undefined,
  };
}
