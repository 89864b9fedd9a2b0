import { readFile } from 'fs/promises';
import { basename } from 'path';
import { extractPDFFromBuffer } from '@ledgerline/pdf-extract';
import {
  DocumentOpenError,
  NoValidRowsError,
  PipelineOptionsSchema,
  isStatementError,
  roundToTwoDecimals,
  type CanonicalTransaction,
  type DocumentKind,
  type DocumentSource,
  type DropCounts,
  type PipelineOptions,
  type ResolvedPipelineOptions,
  type StagedTable,
  type StatementError,
  type StatementSummary,
} from '@ledgerline/types';
import { typeForAmount } from './amount-resolver.js';
import { extractTableStrategy, type TablePage } from './extractors/table-extractor.js';
import { extractTextStrategy, type TextPage } from './extractors/text-extractor.js';
import { csvRowsToTable, parseCsvContent, type CsvDocument } from './loaders/csv-loader.js';
import { detectDocumentKind } from './loaders/document-kind.js';
import { normalizeColumns, validateColumns } from './normalizer/column-normalizer.js';
import { parseDateColumn } from './parsers/date-parser.js';
import { formatStagedAmount, parseNumeric } from './parsers/numeric-parser.js';
import { sanitizeTable } from './sanitizer.js';
import { selectStrategy } from './selector.js';
import { summarizeLedger } from './summarizer.js';

export interface LedgerBuild {
  ledger: CanonicalTransaction[];
  /** Explicit date format adopted, `inferred`, or `unknown`. */
  dateFormat: string;
  dropped: DropCounts;
  warnings: string[];
}

export interface LedgerRun {
  method: string;
  ledger: readonly CanonicalTransaction[];
  summary: StatementSummary;
  warnings: string[];
  dropped: DropCounts;
}

export interface PipelineSuccess extends LedgerRun {
  ok: true;
  source: DocumentSource;
}

export interface PipelineFailure {
  ok: false;
  fileName: string;
  ledger: null;
  message: string;
  error: StatementError;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

/** A path on disk, or bytes already in memory with the name they came under. */
export type StatementInput = string | { fileName: string; data: Uint8Array };

/** A loaded PDF page as both strategies read it. */
export type StatementPage = TablePage & TextPage;

export function resolveOptions(options: PipelineOptions = {}): ResolvedPipelineOptions {
  return PipelineOptionsSchema.parse(options);
}

export function dropWarnings(dropped: DropCounts): string[] {
  const warnings: string[] = [];
  if (dropped.date > 0) warnings.push(`Dropped ${dropped.date} row(s) with unparseable dates.`);
  if (dropped.amount > 0) warnings.push(`Dropped ${dropped.amount} row(s) with unparseable amounts.`);
  return warnings;
}

/**
 * Sanitize, normalize and type a staged table into a date-ordered ledger.
 * Running it on a ledger rendered with `ledgerToTable` returns the same ledger.
 *
 * @throws MissingColumnError when date, description or amount cannot be located
 */
export function normalizeLedgerTable(table: StagedTable, options: PipelineOptions = {}): LedgerBuild {
  const { dateThreshold } = resolveOptions(options);
  const sanitized = sanitizeTable(table);
  const normalized = normalizeColumns(sanitized.table);
  validateColumns(normalized.table, normalized.sourceColumns);

  const rows = normalized.table.rows;
  const dates = parseDateColumn(
    rows.map((row) => row['date'] ?? ''),
    dateThreshold
  );

  const ledger: CanonicalTransaction[] = [];
  const dropped: DropCounts = { sanitized: sanitized.dropped, date: 0, amount: 0 };

  rows.forEach((row, index) => {
    const date = dates.dates[index] ?? null;
    if (date === null) {
      dropped.date++;
      return;
    }
    const parsed = parseNumeric(row['amount']);
    if (parsed.kind === 'missing') {
      dropped.amount++;
      return;
    }
    const amount = roundToTwoDecimals(parsed.value) || 0;
    ledger.push(
      Object.freeze({
        date,
        description: row['description'] ?? '',
        amount,
        type: typeForAmount(amount),
      })
    );
  });

  ledger.sort((a, b) => a.date.localeCompare(b.date));

  return {
    ledger,
    dateFormat: dates.format,
    dropped,
    warnings: [...normalized.warnings, ...dropWarnings(dropped)],
  };
}

/** Render a ledger back into a staged table with the canonical columns. */
export function ledgerToTable(ledger: readonly CanonicalTransaction[]): StagedTable {
  return {
    columns: ['date', 'description', 'amount', 'type'],
    rows: ledger.map((txn) => ({
      date: txn.date,
      description: txn.description,
      amount: formatStagedAmount(txn.amount),
      type: txn.type,
    })),
  };
}

function finishRun(
  table: StagedTable,
  method: string,
  upstream: readonly string[],
  options: ResolvedPipelineOptions,
  sanitizedUpstream = 0
): LedgerRun {
  const build = normalizeLedgerTable(table, options);
  if (build.ledger.length === 0) {
    throw new NoValidRowsError('No transactions remained after parsing dates and amounts.');
  }

  const { summary, warnings: summaryWarnings } = summarizeLedger(build.ledger, {
    dateFormat: build.dateFormat,
    minMonths: options.minMonths,
    daysPerMonth: options.daysPerMonth,
  });

  return {
    method,
    ledger: build.ledger,
    summary,
    warnings: [...upstream, ...build.warnings, ...summaryWarnings],
    dropped: { ...build.dropped, sanitized: build.dropped.sanitized + sanitizedUpstream },
  };
}

/**
 * Run both extraction strategies over a loaded PDF and continue with the
 * one that found more dated rows.
 *
 * @throws NoValidRowsError, MissingColumnError
 */
export function runPdfPages(pages: readonly StatementPage[], options: PipelineOptions = {}): LedgerRun {
  const resolved = resolveOptions(options);
  const selection = selectStrategy([extractTableStrategy(pages), extractTextStrategy(pages)]);
  return finishRun(selection.table, selection.method, selection.warnings, resolved, selection.sanitized);
}

/**
 * @throws NoValidRowsError, MissingColumnError
 */
export function runCsvDocument(document: CsvDocument, options: PipelineOptions = {}): LedgerRun {
  const resolved = resolveOptions(options);
  const table = csvRowsToTable(document.rows);
  return finishRun(table, `csv_import (${table.rows.length} rows)`, [], resolved);
}

async function readDocument(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(filePath));
  } catch (error) {
    throw new DocumentOpenError(`Could not open ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

async function runDocument(kind: DocumentKind, data: Uint8Array, options: ResolvedPipelineOptions): Promise<LedgerRun> {
  if (kind === 'pdf') {
    const pdf = await extractPDFFromBuffer(data);
    return runPdfPages(pdf.pages, options);
  }
  return runCsvDocument(parseCsvContent(data), options);
}

/**
 * Turn one statement document into a ledger and its summary. Failures that
 * belong to the document (unreadable, unrecognised columns, no transactions)
 * come back as `{ ok: false }`; anything else propagates.
 */
export async function processStatement(input: StatementInput, options: PipelineOptions = {}): Promise<PipelineResult> {
  const resolved = resolveOptions(options);
  const fileName = typeof input === 'string' ? basename(input) : input.fileName;

  try {
    const data = typeof input === 'string' ? await readDocument(input) : input.data;
    const kind = detectDocumentKind(fileName, data);
    const run = await runDocument(kind, data, resolved);
    return { ok: true, source: { fileName, kind }, ...run };
  } catch (error) {
    if (isStatementError(error)) {
      return { ok: false, fileName, ledger: null, message: error.message, error };
    }
    throw error;
  }
}
