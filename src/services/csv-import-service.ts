/**
 * CSV Import Service
 *
 * Bulk-creates players from an uploaded CSV document. Rows are inserted one
 * at a time as they are read; the first row without a name aborts the
 * import, and rows inserted before it stay committed.
 */

import Papa from 'papaparse';
import { PlayerStore } from '../repositories/player-repository';
import { Player, PlayerCreateInput } from '../models/player';
import { BadRequestError, CsvImportError } from '../models/errors';
import { validatePlayerCreate } from '../utils/request-validation';
import { ValidationError } from '../middleware/error-handler';
import { logCsvImport } from '../utils/logger';
import { emitCsvImport } from '../utils/metrics';

export interface CsvUpload {
  filename: string;
  content: Buffer;
}

type CsvRecord = Record<string, string | undefined>;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Check the filename carries a .csv extension (any case)
 */
export function isCsvFilename(filename: string): boolean {
  return filename.toLowerCase().endsWith('.csv');
}

/**
 * Parse a base-10 integer, allowing surrounding whitespace and a sign
 *
 * @returns the integer, or undefined when the text is not one
 */
export function parseOptionalInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Turn one CSV record into player fields
 *
 * @returns null when the name is missing or blank
 */
export function rowToPlayerInput(record: CsvRecord): PlayerCreateInput | null {
  const name = nonEmpty(record.name);
  if (name === undefined) {
    return null;
  }

  const input: PlayerCreateInput = { name };

  const position = nonEmpty(record.position);
  if (position !== undefined) input.position = position;

  const team = nonEmpty(record.team);
  if (team !== undefined) input.team = team;

  const age = parseOptionalInteger(nonEmpty(record.age));
  if (age !== undefined) input.age = age;

  const jerseyNumber = parseOptionalInteger(nonEmpty(record.jersey_number));
  if (jerseyNumber !== undefined) input.jersey_number = jerseyNumber;

  return input;
}

/**
 * Decode and parse the document into header-keyed records
 */
export function parseCsvDocument(content: Buffer): CsvRecord[] {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(content);
  } catch (error) {
    throw new BadRequestError(
      `Error processing CSV file: ${error instanceof Error ? error.message : 'invalid encoding'}`
    );
  }

  const result = Papa.parse<CsvRecord>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
  });

  const quoteError = result.errors.find((error) => error.type === 'Quotes');
  if (quoteError) {
    throw new BadRequestError(
      `Error processing CSV file: ${quoteError.message} (row ${(quoteError.row ?? 0) + 1})`
    );
  }

  return result.data;
}

export class CsvImportService {
  constructor(private playerStore: PlayerStore) {}

  /**
   * Import players from an uploaded CSV file
   *
   * @returns Created players, in row order
   * @throws BadRequestError when the file is not a CSV or cannot be decoded
   * @throws CsvImportError on the first row that cannot be imported
   */
  async importPlayers(upload: CsvUpload, requestId?: string): Promise<Player[]> {
    if (!isCsvFilename(upload.filename)) {
      throw new BadRequestError('Only CSV files are allowed');
    }

    const startTime = Date.now();
    const created: Player[] = [];
    let rowNumber = 0;

    try {
      const records = parseCsvDocument(upload.content);

      for (const record of records) {
        rowNumber += 1;

        const input = rowToPlayerInput(record);
        if (input === null) {
          throw new CsvImportError(
            `Error processing row ${rowNumber}: Name field is required`,
            rowNumber,
            created.length
          );
        }

        let validated: PlayerCreateInput;
        try {
          validated = validatePlayerCreate(input);
        } catch (error) {
          if (!(error instanceof ValidationError)) {
            throw error;
          }
          throw new CsvImportError(
            `Error processing row ${rowNumber}: ${error.message}`,
            rowNumber,
            created.length
          );
        }
        try {
          created.push(await this.playerStore.create(validated));
        } catch (error) {
          if (!(error instanceof BadRequestError)) {
            throw error;
          }
          throw new CsvImportError(
            `Error processing row ${rowNumber}: ${error.message}`,
            rowNumber,
            created.length
          );
        }
      }
    } catch (error) {
      const durationMs = Date.now() - startTime;
      logCsvImport({
        requestId,
        filename: upload.filename,
        success: false,
        imported: created.length,
        failedRow: error instanceof CsvImportError ? error.row : undefined,
        reason: error instanceof Error ? error.message : 'Unknown error',
        durationMs,
      });
      await emitCsvImport(created.length, false, durationMs);
      throw error;
    }

    const durationMs = Date.now() - startTime;
    logCsvImport({
      requestId,
      filename: upload.filename,
      success: true,
      imported: created.length,
      durationMs,
    });
    await emitCsvImport(created.length, true, durationMs);

    return created;
  }
}
