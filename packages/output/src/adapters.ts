/**
 * Output adapters: wrap a pipeline run in the versioned ledger document.
 */

import {
  OUTPUT_SCHEMA_VERSION,
  PARSER_NAME,
  PARSER_VERSION,
  type CanonicalTransaction,
  type DocumentSource,
  type LedgerOutput,
  type StatementSummary,
} from '@ledgerline/types';

/**
 * What the adapters need from a successful run; a `PipelineSuccess` from
 * the ingest package satisfies it.
 */
export interface LedgerRunLike {
  source: DocumentSource;
  method: string;
  ledger: readonly CanonicalTransaction[];
  summary: StatementSummary;
  warnings: readonly string[];
}

/**
 * Several documents processed together, with the files that failed.
 */
export interface BatchLedgerOutput {
  schemaVersion: typeof OUTPUT_SCHEMA_VERSION;
  documents: LedgerOutput[];
  totalDocuments: number;
  totalTransactions: number;
  parseErrors: Array<{ filename: string; error: string }>;
}

export function toLedgerOutput(run: LedgerRunLike, parsedAt: Date = new Date()): LedgerOutput {
  return {
    schemaVersion: OUTPUT_SCHEMA_VERSION,
    source: {
      fileName: run.source.fileName,
      fileType: run.source.kind,
    },
    method: run.method,
    ledger: run.ledger.map((txn) => ({ ...txn })),
    summary: {
      ...run.summary,
      monthlyBreakdown: run.summary.monthlyBreakdown.map((month) => ({ ...month })),
    },
    metadata: {
      parser: {
        name: PARSER_NAME,
        version: PARSER_VERSION,
      },
      parsedAt: parsedAt.toISOString(),
      warnings: [...run.warnings],
    },
  };
}

export function toBatchLedgerOutput(
  runs: readonly LedgerRunLike[],
  parseErrors: ReadonlyArray<{ filename: string; error: string }> = [],
  parsedAt: Date = new Date()
): BatchLedgerOutput {
  const documents = runs.map((run) => toLedgerOutput(run, parsedAt));
  return {
    schemaVersion: OUTPUT_SCHEMA_VERSION,
    documents,
    totalDocuments: documents.length,
    totalTransactions: documents.reduce((sum, doc) => sum + doc.ledger.length, 0),
    parseErrors: parseErrors.map(({ filename, error }) => ({ filename, error })),
  };
}
