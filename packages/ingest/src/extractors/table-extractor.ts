import { isHeaderLikeRow, type ExtractionResult, type RawRow, type RawTable, type StagedTable } from '@ledgerline/types';
import { toExtractionResult } from '../selector.js';

/** Rows of cells as a loader hands them over; cells may be missing. */
export type LoadedTable = readonly (readonly (string | null | undefined)[])[];

/** The part of a loaded page the table strategy reads. */
export interface TablePage {
  tables: readonly LoadedTable[];
}

export function cleanCell(cell: string | null | undefined): string {
  if (cell === null || cell === undefined) return '';
  return cell.trim().replace(/\r?\n/g, ' ');
}

/**
 * Concatenate every table row in the document. The first header-like row
 * becomes the header and is not kept as data; empty rows are skipped.
 */
export function collectTableRows(pages: readonly TablePage[]): RawTable | null {
  let header: RawRow | null = null;
  const rows: RawRow[] = [];

  for (const page of pages) {
    for (const table of page.tables) {
      for (const rawRow of table) {
        const row = rawRow.map(cleanCell);
        if (header === null && isHeaderLikeRow(row)) {
          header = row;
          continue;
        }
        if (row.some((cell) => cell !== '')) rows.push(row);
      }
    }
  }

  return rows.length === 0 ? null : { header, rows };
}

/** Most frequent row width; ties go to the width seen first. */
export function dominantWidth(rows: readonly RawRow[]): number {
  const counts = new Map<number, number>();
  for (const row of rows) counts.set(row.length, (counts.get(row.length) ?? 0) + 1);

  let width = 0;
  let best = 0;
  for (const [candidate, count] of counts) {
    if (count > best) {
      width = candidate;
      best = count;
    }
  }
  return width;
}

export function fitRow(row: readonly string[], width: number): RawRow {
  if (row.length >= width) return row.slice(0, width);
  return [...row, ...Array<string>(width - row.length).fill('')];
}

/** Lower-cased labels with blanks named by position and repeats suffixed `_2`, `_3`. */
export function uniqueLabels(labels: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return labels.map((label, index) => {
    const base = label.trim().toLowerCase().replace(/\s+/g, ' ') || `col${index}`;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

export interface StageOptions {
  /** Keep columns that are empty in every row. CSV exports name every column on purpose. */
  keepEmptyColumns?: boolean;
}

/**
 * Width-normalize a raw table against its header (or its most common row
 * width), drop columns that are empty in every row unless asked to keep
 * them, and label the rest.
 */
export function stageRawTable(raw: RawTable, options: StageOptions = {}): StagedTable {
  const width = raw.header !== null ? raw.header.length : dominantWidth(raw.rows);
  const rows = raw.rows.map((row) => fitRow(row, width));
  const labels = uniqueLabels(
    raw.header !== null ? raw.header : Array.from({ length: width }, (_, index) => `col${index}`)
  );

  const kept: number[] = [];
  for (let index = 0; index < width; index++) {
    if (options.keepEmptyColumns === true || rows.some((row) => (row[index] ?? '') !== '')) kept.push(index);
  }

  const columns = kept.map((index) => labels[index] ?? `col${index}`);
  return {
    columns,
    rows: rows.map((row) => {
      const staged: Record<string, string> = {};
      kept.forEach((index, position) => {
        const column = columns[position];
        if (column !== undefined) staged[column] = row[index] ?? '';
      });
      return staged;
    }),
  };
}

export function extractTableStrategy(pages: readonly TablePage[]): ExtractionResult {
  const raw = collectTableRows(pages);
  return toExtractionResult('table', raw === null ? null : stageRawTable(raw), []);
}
