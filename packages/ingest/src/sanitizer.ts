import type { StagedRow, StagedTable } from '@ledgerline/types';
import { locateColumn } from './normalizer/column-normalizer.js';
import { isBlankDate } from './parsers/date-parser.js';

/** Header or footer labels that show up as data when a header repeats on every page. */
const JUNK_LABEL = /^(?:date|description|narration|trans\.?\s*time|channel|balance|s\/n|no\.)$/i;

export interface SanitizedTable {
  table: StagedTable;
  dropped: number;
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function isJunkLabel(value: string): boolean {
  return JUNK_LABEL.test(value.trim());
}

/**
 * Clean a staged table: whitespace is collapsed in every cell, then rows
 * with no usable date, rows that repeat a header or footer label, and rows
 * left entirely empty are removed.
 */
export function sanitizeTable(table: StagedTable): SanitizedTable {
  const dateColumn = locateColumn(table, 'date');
  const descriptionColumn = locateColumn(table, 'description');

  const rows: StagedRow[] = [];
  for (const row of table.rows) {
    const cleaned: Record<string, string> = {};
    for (const column of table.columns) {
      const value = row[column];
      if (value !== undefined) cleaned[column] = collapseWhitespace(value);
    }

    if (dateColumn !== undefined) {
      const date = cleaned[dateColumn] ?? '';
      if (isBlankDate(date) || isJunkLabel(date)) continue;
    }
    if (descriptionColumn !== undefined && isJunkLabel(cleaned[descriptionColumn] ?? '')) continue;
    if (Object.values(cleaned).every((value) => value === '')) continue;

    rows.push(cleaned);
  }

  return {
    table: { columns: [...table.columns], rows },
    dropped: table.rows.length - rows.length,
  };
}
