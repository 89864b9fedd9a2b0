/**
 * CSV Exporter Module
 *
 * Converts ledgers to CSV for spreadsheet import.
 */

import { formatAmount, type CanonicalTransaction, type LedgerOutput } from '@ledgerline/types';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Date format: 'iso' (YYYY-MM-DD) or 'dmy' (DD/MM/YYYY) (default: 'iso') */
  dateFormat?: 'iso' | 'dmy';
}

const LEDGER_COLUMNS = ['date', 'description', 'amount', 'type'] as const;

const SOURCE_COLUMN = 'source';

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
export function escapeCsvValue(value: string | number | null | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);

  const needsQuoting = str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r');

  if (needsQuoting) {
    // Escape quotes by doubling them and wrap in quotes
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function formatDate(isoDate: string, format: 'iso' | 'dmy'): string {
  if (format === 'dmy') {
    const parts = isoDate.split('-');
    if (parts.length === 3) {
      return `${parts[2]}/${parts[1]}/${parts[0]}`;
    }
  }
  return isoDate;
}

function resolveOptions(options: CsvExportOptions): Required<CsvExportOptions> {
  return {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    dateFormat: options.dateFormat ?? 'iso',
  };
}

function buildDataRow(txn: CanonicalTransaction, options: Required<CsvExportOptions>): string[] {
  return [formatDate(txn.date, options.dateFormat), txn.description, formatAmount(txn.amount), txn.type];
}

function rowToCsvLine(row: readonly string[], delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Export a ledger as `date,description,amount,type` rows, amounts with two decimals.
 */
export function exportLedgerCsv(ledger: readonly CanonicalTransaction[], options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine(LEDGER_COLUMNS, opts.delimiter));
  }

  for (const txn of ledger) {
    lines.push(rowToCsvLine(buildDataRow(txn, opts), opts.delimiter));
  }

  return lines.join('\n');
}

/**
 * Export several ledger documents into one CSV with a leading `source` column.
 * Documents keep their order; each ledger is already date-ordered.
 */
export function exportDocumentsCsv(documents: readonly LedgerOutput[], options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine([SOURCE_COLUMN, ...LEDGER_COLUMNS], opts.delimiter));
  }

  for (const doc of documents) {
    for (const txn of doc.ledger) {
      lines.push(rowToCsvLine([doc.source.fileName, ...buildDataRow(txn, opts)], opts.delimiter));
    }
  }

  return lines.join('\n');
}
