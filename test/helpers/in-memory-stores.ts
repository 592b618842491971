/**
 * In-memory stand-ins for the repositories, used by service and handler tests.
 */

import { PlayerStore } from '../../src/repositories/player-repository';
import { UserStore } from '../../src/repositories/user-repository';
import { ConflictError } from '../../src/models/errors';
import { Player, PlayerCreateInput, PlayerUpdateInput } from '../../src/models/player';
import { NewUser, User, UserWithCredentials } from '../../src/models/user';

export const FIXED_CREATED_AT = new Date('2024-01-01T00:00:00.000Z');
export const FIXED_UPDATED_AT = new Date('2024-02-01T00:00:00.000Z');

export class InMemoryUserStore implements UserStore {
  users: UserWithCredentials[] = [];
  private nextId = 1;

  async findByUsername(username: string): Promise<UserWithCredentials | null> {
    const user = this.users.find((candidate) => candidate.username === username);
    return user ? { ...user } : null;
  }

  async create(user: NewUser): Promise<User> {
    if (this.users.some((candidate) => candidate.username === user.username)) {
      throw new ConflictError('Username already registered');
    }
    if (this.users.some((candidate) => candidate.email === user.email)) {
      throw new ConflictError('Email already registered');
    }

    const stored: UserWithCredentials = {
      id: this.nextId++,
      email: user.email,
      username: user.username,
      hashed_password: user.hashed_password,
      is_active: true,
      created_at: FIXED_CREATED_AT,
    };
    this.users.push(stored);

    return {
      id: stored.id,
      email: stored.email,
      username: stored.username,
      is_active: stored.is_active,
      created_at: stored.created_at,
    };
  }
}

export class InMemoryPlayerStore implements PlayerStore {
  players: Player[] = [];
  private nextId = 1;

  async create(input: PlayerCreateInput): Promise<Player> {
    const player: Player = {
      id: this.nextId++,
      name: input.name,
      created_at: FIXED_CREATED_AT,
    };
    if (input.position != null) player.position = input.position;
    if (input.team != null) player.team = input.team;
    if (input.age != null) player.age = input.age;
    if (input.jersey_number != null) player.jersey_number = input.jersey_number;

    this.players.push(player);
    return { ...player };
  }

  async findById(id: number): Promise<Player | null> {
    const player = this.players.find((candidate) => candidate.id === id);
    return player ? { ...player } : null;
  }

  async findAll(skip: number, limit: number): Promise<Player[]> {
    return this.players.slice(skip, skip + limit).map((player) => ({ ...player }));
  }

  async searchByName(fragment: string, skip: number, limit: number): Promise<Player[]> {
    const needle = fragment.toLowerCase();
    return this.players
      .filter((player) => player.name.toLowerCase().includes(needle))
      .slice(skip, skip + limit)
      .map((player) => ({ ...player }));
  }

  async update(id: number, changes: PlayerUpdateInput): Promise<Player | null> {
    const player = this.players.find((candidate) => candidate.id === id);
    if (!player) {
      return null;
    }

    if (changes.name !== undefined) player.name = changes.name;
    if (changes.position !== undefined) player.position = changes.position ?? undefined;
    if (changes.team !== undefined) player.team = changes.team ?? undefined;
    if (changes.age !== undefined) player.age = changes.age ?? undefined;
    if (changes.jersey_number !== undefined) player.jersey_number = changes.jersey_number ?? undefined;
    player.updated_at = FIXED_UPDATED_AT;

    return { ...player };
  }

  async delete(id: number): Promise<boolean> {
    const index = this.players.findIndex((candidate) => candidate.id === id);
    if (index === -1) {
      return false;
    }
    this.players.splice(index, 1);
    return true;
  }
}
