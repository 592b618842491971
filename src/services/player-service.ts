/**
 * Player Service
 *
 * Business logic layer for player operations. Missing players surface as
 * NotFoundError so the handler can answer 404.
 */

import { PlayerStore } from '../repositories/player-repository';
import { Player, PlayerCreateInput, PlayerUpdateInput } from '../models/player';
import { NotFoundError } from '../models/errors';

/**
 * Player Service
 * Provides business logic for player operations
 */
export class PlayerService {
  constructor(private playerStore: PlayerStore) {}

  async createPlayer(input: PlayerCreateInput): Promise<Player> {
    return this.playerStore.create(input);
  }

  /**
   * Get a player by ID with 404 handling
   *
   * @throws NotFoundError if no player has this id
   */
  async getPlayerById(playerId: number): Promise<Player> {
    const player = await this.playerStore.findById(playerId);

    if (!player) {
      throw new NotFoundError('Player not found');
    }

    return player;
  }

  /**
   * List players in id order
   */
  async listPlayers(skip: number, limit: number): Promise<Player[]> {
    return this.playerStore.findAll(skip, limit);
  }

  /**
   * Case-insensitive name search
   *
   * @throws NotFoundError when nothing matches
   */
  async searchPlayers(name: string, skip: number, limit: number): Promise<Player[]> {
    const players = await this.playerStore.searchByName(name, skip, limit);

    if (players.length === 0) {
      throw new NotFoundError('No players found with the given name');
    }

    return players;
  }

  /**
   * Apply a partial update
   *
   * @throws NotFoundError if no player has this id
   */
  async updatePlayer(playerId: number, changes: PlayerUpdateInput): Promise<Player> {
    const player = await this.playerStore.update(playerId, changes);

    if (!player) {
      throw new NotFoundError('Player not found');
    }

    return player;
  }

  async deletePlayer(playerId: number): Promise<{ message: string }> {
    const deleted = await this.playerStore.delete(playerId);

    if (!deleted) {
      throw new NotFoundError('Player not found');
    }

    return { message: 'Player deleted successfully' };
  }
}
