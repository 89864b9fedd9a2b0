import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DocumentOpenError, isHeaderLikeRow, type RawRow, type StagedTable } from '@ledgerline/types';
import { stageRawTable } from '../extractors/table-extractor.js';

export const CSV_DELIMITERS = [',', ';', '\t', '|'] as const;
export type CsvDelimiter = (typeof CSV_DELIMITERS)[number];

/** Preamble lines (account name, period, ...) tolerated above the header. */
const HEADER_SEARCH_ROWS = 20;

const CsvRecordsSchema = z.array(z.array(z.string()));

export interface CsvDocument {
  delimiter: CsvDelimiter;
  rows: RawRow[];
}

/** Pick the delimiter that occurs most often, outside quotes, on the first non-empty line. */
export function sniffDelimiter(text: string): CsvDelimiter {
  const firstLine = text.split(/\r?\n/).find((line) => line.trim() !== '') ?? '';
  const unquoted = firstLine.replace(/"[^"]*"/g, '');

  let best: CsvDelimiter = ',';
  let bestCount = 0;
  for (const delimiter of CSV_DELIMITERS) {
    const count = unquoted.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

/**
 * @throws DocumentOpenError when the content is not well-formed CSV
 */
export function parseCsvContent(content: string | Uint8Array): CsvDocument {
  const text = (typeof content === 'string' ? content : Buffer.from(content).toString('utf-8')).replace(/^\uFEFF/, '');
  const delimiter = sniffDelimiter(text);

  let records: unknown;
  try {
    records = parse(text, {
      delimiter,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new DocumentOpenError(`Could not parse CSV: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  const rows = CsvRecordsSchema.safeParse(records);
  if (!rows.success) {
    throw new DocumentOpenError('Could not parse CSV: unexpected record shape');
  }
  return { delimiter, rows: rows.data };
}

/**
 * @throws DocumentOpenError when the file cannot be read or parsed
 */
export async function loadCsvDocument(filePath: string): Promise<CsvDocument> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    throw new DocumentOpenError(`Could not open CSV: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  return parseCsvContent(data);
}

/**
 * Label the CSV rows. The header is the first header-like row near the top,
 * or the first row when none looks like one; rows above it are dropped.
 */
export function csvRowsToTable(rows: readonly RawRow[]): StagedTable {
  const searched = rows.slice(0, HEADER_SEARCH_ROWS);
  const found = searched.findIndex((row) => isHeaderLikeRow(row));
  const headerIndex = found === -1 ? 0 : found;

  const header = rows[headerIndex];
  if (header === undefined) return { columns: [], rows: [] };

  const body = rows.slice(headerIndex + 1).filter((row) => row.some((cell) => cell !== ''));
  return stageRawTable({ header, rows: body }, { keepEmptyColumns: true });
}
