import type { DocumentKind, ExtractionStrategy } from '../schemas/ledger.js';

/** A single cell: trimmed text, never null, no embedded line breaks. */
export type RawCell = string;

/** One row of cells; width may differ from its neighbours until normalized. */
export type RawRow = RawCell[];

export interface RawTable {
  header: RawRow | null;
  rows: RawRow[];
}

export type StagedRow = Readonly<Record<string, string>>;

/**
 * A labelled but still textual table, passed between extraction,
 * sanitization and normalization.
 */
export interface StagedTable {
  columns: string[];
  rows: StagedRow[];
}

export interface ExtractionResult {
  strategy: ExtractionStrategy;
  table: StagedTable | null;
  /** Rows whose date cell matches the structural date pattern. */
  validRowCount: number;
  warnings: string[];
}

/** Rows removed per reason during one document run. */
export interface DropCounts {
  sanitized: number;
  date: number;
  amount: number;
}

export interface DocumentSource {
  fileName: string;
  kind: DocumentKind;
}
