/**
 * Player Repository Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { PlayerRepository, escapeLikePattern } from '../../src/repositories/player-repository';
import { Queryable } from '../../src/config/database';
import { PlayerRow } from '../../src/models/player';
import { BadRequestError } from '../../src/models/errors';

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('PlayerRepository', () => {
  let query: jest.Mock;
  let repository: PlayerRepository;

  const row: PlayerRow = {
    id: 7,
    name: 'Alice Moreau',
    position: 'Forward',
    team: null,
    age: 24,
    jersey_number: null,
    created_at: new Date('2024-01-01T00:00:00.000Z'),
    updated_at: null,
  };

  beforeEach(() => {
    query = jest.fn();
    const db: Queryable = { query };
    repository = new PlayerRepository(db);
  });

  describe('create', () => {
    it('should insert with nulls for absent fields and map the row', async () => {
      query.mockResolvedValueOnce({ rows: [row] });

      const player = await repository.create({ name: 'Alice Moreau', position: 'Forward', age: 24 });

      expect(query.mock.calls[0][0]).toContain('INSERT INTO players (name, position, team, age, jersey_number)');
      expect(query.mock.calls[0][1]).toEqual(['Alice Moreau', 'Forward', null, 24, null]);
      expect(player).toEqual({
        id: 7,
        name: 'Alice Moreau',
        position: 'Forward',
        team: undefined,
        age: 24,
        jersey_number: undefined,
        created_at: new Date('2024-01-01T00:00:00.000Z'),
        updated_at: undefined,
      });
    });

    it('should turn a rejected value into a BadRequestError', async () => {
      query.mockRejectedValueOnce(pgError('22003', 'integer out of range'));

      const attempt = repository.create({ name: 'Alice Moreau', age: 24 });

      await expect(attempt).rejects.toBeInstanceOf(BadRequestError);
      await expect(attempt).rejects.toThrow('Invalid player data: integer out of range');
    });

    it('should rethrow other database errors unchanged', async () => {
      const failure = pgError('57P01', 'terminating connection due to administrator command');
      query.mockRejectedValueOnce(failure);

      await expect(repository.create({ name: 'Alice Moreau' })).rejects.toBe(failure);
    });
  });

  describe('findById', () => {
    it('should return the mapped player', async () => {
      query.mockResolvedValueOnce({ rows: [row] });

      const player = await repository.findById(7);

      expect(query.mock.calls[0][1]).toEqual([7]);
      expect(player?.name).toBe('Alice Moreau');
    });

    it('should return null when no row matches', async () => {
      query.mockResolvedValueOnce({ rows: [] });

      await expect(repository.findById(99)).resolves.toBeNull();
    });
  });

  describe('findAll', () => {
    it('should page in id order', async () => {
      query.mockResolvedValueOnce({ rows: [row] });

      const players = await repository.findAll(10, 5);

      expect(query.mock.calls[0][0]).toContain('ORDER BY id ASC OFFSET $1 LIMIT $2');
      expect(query.mock.calls[0][1]).toEqual([10, 5]);
      expect(players).toHaveLength(1);
    });
  });

  describe('searchByName', () => {
    it('should match case-insensitively on a wrapped fragment', async () => {
      query.mockResolvedValueOnce({ rows: [] });

      await repository.searchByName('ali', 0, 100);

      expect(query.mock.calls[0][0]).toContain('WHERE name ILIKE $1');
      expect(query.mock.calls[0][1]).toEqual(['%ali%', 0, 100]);
    });

    it('should escape wildcards in the fragment', async () => {
      query.mockResolvedValueOnce({ rows: [] });

      await repository.searchByName('50%_off', 0, 10);

      expect(query.mock.calls[0][1]).toEqual(['%50\\%\\_off%', 0, 10]);
    });
  });

  describe('escapeLikePattern', () => {
    it('should escape backslashes too', () => {
      expect(escapeLikePattern('a\\b')).toBe('a\\\\b');
    });
  });

  describe('update', () => {
    it('should set only the supplied fields and refresh updated_at', async () => {
      query.mockResolvedValueOnce({ rows: [{ ...row, team: 'Lions', updated_at: new Date('2024-02-01T00:00:00.000Z') }] });

      const player = await repository.update(7, { team: 'Lions', jersey_number: null });

      expect(query.mock.calls[0][0]).toBe(
        'UPDATE players SET team = $2, jersey_number = $3, updated_at = NOW() WHERE id = $1 ' +
          'RETURNING id, name, position, team, age, jersey_number, created_at, updated_at'
      );
      expect(query.mock.calls[0][1]).toEqual([7, 'Lions', null]);
      expect(player?.team).toBe('Lions');
      expect(player?.updated_at).toEqual(new Date('2024-02-01T00:00:00.000Z'));
    });

    it('should still refresh updated_at for an empty change set', async () => {
      query.mockResolvedValueOnce({ rows: [row] });

      await repository.update(7, {});

      expect(query.mock.calls[0][0]).toContain('SET updated_at = NOW() WHERE id = $1');
      expect(query.mock.calls[0][1]).toEqual([7]);
    });

    it('should return null when no player has the id', async () => {
      query.mockResolvedValueOnce({ rows: [] });

      await expect(repository.update(99, { name: 'Nobody' })).resolves.toBeNull();
    });

    it('should turn a rejected value into a BadRequestError', async () => {
      query.mockRejectedValueOnce(pgError('22003', 'integer out of range'));

      await expect(repository.update(7, { age: 24 })).rejects.toThrow('Invalid player data: integer out of range');
    });
  });

  describe('delete', () => {
    it('should report whether a row was removed', async () => {
      query.mockResolvedValueOnce({ rows: [{ id: 7 }] }).mockResolvedValueOnce({ rows: [] });

      await expect(repository.delete(7)).resolves.toBe(true);
      await expect(repository.delete(7)).resolves.toBe(false);
    });
  });

  it('should propagate query failures', async () => {
    query.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    await expect(repository.findAll(0, 100)).rejects.toThrow('connect ECONNREFUSED');
  });
});
