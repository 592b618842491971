/**
 * CSV Import Service Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  CsvImportService,
  parseOptionalInteger,
  rowToPlayerInput,
} from '../../src/services/csv-import-service';
import { BadRequestError, CsvImportError } from '../../src/models/errors';
import { PlayerRepository } from '../../src/repositories/player-repository';
import { InMemoryPlayerStore } from '../helpers/in-memory-stores';

const CREATED_AT = new Date('2024-01-01T00:00:00.000Z');

function csv(filename: string, text: string): { filename: string; content: Buffer } {
  return { filename, content: Buffer.from(text, 'utf8') };
}

async function importError(service: CsvImportService, upload: { filename: string; content: Buffer }): Promise<CsvImportError> {
  try {
    await service.importPlayers(upload);
  } catch (error) {
    if (error instanceof CsvImportError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the import to fail');
}

describe('CsvImportService', () => {
  let store: InMemoryPlayerStore;
  let service: CsvImportService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    store = new InMemoryPlayerStore();
    service = new CsvImportService(store);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should import every row in order', async () => {
    const players = await service.importPlayers(
      csv('roster.csv', 'name,position,team,age,jersey_number\nAlice,Forward,Lions,24,7\nBob,Guard,Tigers,31,12\n')
    );

    expect(players).toEqual([
      { id: 1, name: 'Alice', position: 'Forward', team: 'Lions', age: 24, jersey_number: 7, created_at: CREATED_AT },
      { id: 2, name: 'Bob', position: 'Guard', team: 'Tigers', age: 31, jersey_number: 12, created_at: CREATED_AT },
    ]);
  });

  it('should keep rows before a nameless row and report where it stopped', async () => {
    const error = await importError(service, csv('roster.csv', 'name,position\nAlice,Forward\n,Guard'));

    expect(error.message).toBe('Error processing row 2: Name field is required');
    expect(error.row).toBe(2);
    expect(error.imported).toBe(1);
    expect(error.details).toEqual({ row: 2, imported: 1 });
    expect(store.players).toEqual([
      { id: 1, name: 'Alice', position: 'Forward', created_at: CREATED_AT },
    ]);
  });

  it('should drop an unparsable age and still import the row', async () => {
    const players = await service.importPlayers(csv('roster.csv', 'name,age\nBob,notanumber'));

    expect(players).toEqual([{ id: 1, name: 'Bob', created_at: CREATED_AT }]);
    expect(players[0]).not.toHaveProperty('age');
  });

  it('should treat a whitespace-only name as missing', async () => {
    const error = await importError(service, csv('roster.csv', 'name\n   '));

    expect(error.message).toBe('Error processing row 1: Name field is required');
    expect(store.players).toHaveLength(0);
  });

  it('should fail on the first row when the name column is absent', async () => {
    const error = await importError(service, csv('roster.csv', 'position\nGuard'));

    expect(error.row).toBe(1);
    expect(error.imported).toBe(0);
  });

  it('should reject a file without a .csv extension before reading it', async () => {
    const attempt = service.importPlayers(csv('roster.txt', 'name\nAlice'));

    await expect(attempt).rejects.toBeInstanceOf(BadRequestError);
    await expect(attempt).rejects.toThrow('Only CSV files are allowed');
    expect(store.players).toHaveLength(0);
  });

  it('should accept an upper-case extension', async () => {
    const players = await service.importPlayers(csv('ROSTER.CSV', 'name\nAlice'));

    expect(players.map((player) => player.name)).toEqual(['Alice']);
  });

  it('should strip a byte order mark and trim headers and values', async () => {
    const players = await service.importPlayers(
      csv('roster.csv', '\uFEFF name , jersey_number ,team\n Carol , +23 ,  \n')
    );

    expect(players).toEqual([{ id: 1, name: 'Carol', jersey_number: 23, created_at: CREATED_AT }]);
  });

  it('should skip blank lines', async () => {
    const players = await service.importPlayers(csv('roster.csv', 'name\nAlice\n\nBob\n'));

    expect(players.map((player) => player.name)).toEqual(['Alice', 'Bob']);
  });

  it('should return an empty list for a header-only file', async () => {
    await expect(service.importPlayers(csv('roster.csv', 'name,position\n'))).resolves.toEqual([]);
  });

  it('should import negative integers as given', async () => {
    const players = await service.importPlayers(csv('roster.csv', 'name,age,jersey_number\nBob,-3,7\nCarl,20,8'));

    expect(players.map((player) => [player.name, player.age, player.jersey_number])).toEqual([
      ['Bob', -3, 7],
      ['Carl', 20, 8],
    ]);
  });

  it('should fail the row when a value is outside the integer column range', async () => {
    const error = await importError(service, csv('roster.csv', 'name,age\nAlice,20\nBob,3000000000'));

    expect(error.message).toBe('Error processing row 2: Invalid request body');
    expect(error.row).toBe(2);
    expect(error.imported).toBe(1);
    expect(store.players.map((player) => player.name)).toEqual(['Alice']);
  });

  it('should fail the row when the database rejects a value', async () => {
    const rejection = Object.assign(new Error('invalid byte sequence for encoding "UTF8": 0x00'), { code: '22021' });
    const repositoryService = new CsvImportService(
      new PlayerRepository({ query: jest.fn().mockRejectedValue(rejection) })
    );

    const error = await importError(repositoryService, csv('roster.csv', 'name\nAlice'));

    expect(error.message).toBe(
      'Error processing row 1: Invalid player data: invalid byte sequence for encoding "UTF8": 0x00'
    );
    expect(error.row).toBe(1);
    expect(error.imported).toBe(0);
  });

  it('should let store failures other than rejected values propagate', async () => {
    const repositoryService = new CsvImportService(
      new PlayerRepository({ query: jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED 10.0.0.5:5432')) })
    );

    await expect(repositoryService.importPlayers(csv('roster.csv', 'name\nAlice'))).rejects.toThrow(
      'connect ECONNREFUSED 10.0.0.5:5432'
    );
  });

  it('should reject content that is not UTF-8', async () => {
    const upload = { filename: 'roster.csv', content: Buffer.from([0x6e, 0x61, 0x6d, 0x65, 0x0a, 0xff, 0xfe]) };

    await expect(service.importPlayers(upload)).rejects.toThrow(/^Error processing CSV file: /);
    expect(store.players).toHaveLength(0);
  });

  it('should reject an unterminated quoted field', async () => {
    await expect(
      service.importPlayers(csv('roster.csv', 'name,team\n"Alice,Lions\n'))
    ).rejects.toThrow(/^Error processing CSV file: /);
  });

  it('should log the import outcome', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation();

    await service.importPlayers(csv('roster.csv', 'name\nAlice'), 'req-1');

    const entry = JSON.parse(String(logSpy.mock.calls[logSpy.mock.calls.length - 1][0]));
    expect(entry).toMatchObject({
      log_type: 'CSV_IMPORT',
      request_id: 'req-1',
      filename: 'roster.csv',
      success: true,
      imported: 1,
    });
  });
});

describe('rowToPlayerInput', () => {
  it('should return null without a name', () => {
    expect(rowToPlayerInput({ position: 'Guard' })).toBeNull();
  });

  it('should keep only non-empty fields', () => {
    expect(rowToPlayerInput({ name: ' Dana ', position: '', team: 'Owls', age: 'x', jersey_number: ' 9 ' })).toEqual({
      name: 'Dana',
      team: 'Owls',
      jersey_number: 9,
    });
  });
});

describe('parseOptionalInteger', () => {
  it.each<[string, number]>([
    ['42', 42],
    [' 42 ', 42],
    ['+7', 7],
    ['-3', -3],
  ])('should parse %p as %p', (input, expected) => {
    expect(parseOptionalInteger(input)).toBe(expected);
  });

  it.each(['4.5', 'abc', '', '1e3', '12abc'])('should reject %p', (input) => {
    expect(parseOptionalInteger(input)).toBeUndefined();
  });
});
