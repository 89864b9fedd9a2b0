import {
  NoValidRowsError,
  type ExtractionResult,
  type ExtractionStrategy,
  type StagedTable,
} from '@ledgerline/types';
import { locateColumn } from './normalizer/column-normalizer.js';
import { sanitizeTable } from './sanitizer.js';

/**
 * Date shapes that mark a row as a probable transaction when scoring a
 * candidate: day-first numeric, named month, or year-first.
 */
export const STRUCTURAL_DATE_PATTERN =
  /\d{2}[-/]\d{2}[-/]\d{4}|\d{1,2}[\s-](?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*[\s-]\d{4}|\d{4}[-/]\d{2}[-/]\d{2}/i;

/** Tie-break order when two candidates score the same; higher wins. */
export const STRATEGY_PRIORITY: Readonly<Record<ExtractionStrategy, number>> = Object.freeze({
  text: 1,
  table: 0,
});

export interface StrategySelection {
  strategy: ExtractionStrategy;
  table: StagedTable;
  /** Human-readable account of the choice, e.g. `text_extraction (6 valid rows)`. */
  method: string;
  warnings: string[];
  /** Rows the sanitizer removed from the chosen table. */
  sanitized: number;
}

export interface SanitizedCandidate {
  result: ExtractionResult;
  dropped: number;
}

export function countValidDateRows(table: StagedTable | null): number {
  if (table === null) return 0;
  const dateColumn = locateColumn(table, 'date');
  if (dateColumn === undefined) return 0;
  return table.rows.filter((row) => STRUCTURAL_DATE_PATTERN.test(row[dateColumn] ?? '')).length;
}

export function toExtractionResult(
  strategy: ExtractionStrategy,
  table: StagedTable | null,
  warnings: string[]
): ExtractionResult {
  return { strategy, table, validRowCount: countValidDateRows(table), warnings };
}

export function scoreCandidate(candidate: ExtractionResult): number {
  return candidate.validRowCount;
}

/** Run the sanitizer over a candidate's table and rescore what is left. */
export function sanitizeCandidate(candidate: ExtractionResult): SanitizedCandidate {
  if (candidate.table === null) return { result: candidate, dropped: 0 };
  const { table, dropped } = sanitizeTable(candidate.table);
  return { result: toExtractionResult(candidate.strategy, table, candidate.warnings), dropped };
}

/**
 * Sanitize every candidate, then pick the one with the most rows carrying a
 * recognisable date, text before table on a tie. When nothing scores, a
 * table with any rows left is used as a fallback.
 *
 * @throws NoValidRowsError when there is neither a scoring candidate nor a fallback table
 */
export function selectStrategy(candidates: readonly ExtractionResult[]): StrategySelection {
  const sanitized = candidates.map(sanitizeCandidate);
  const ranked = [...sanitized].sort(
    (a, b) =>
      scoreCandidate(b.result) - scoreCandidate(a.result) ||
      STRATEGY_PRIORITY[b.result.strategy] - STRATEGY_PRIORITY[a.result.strategy]
  );

  const best = ranked[0];
  if (best !== undefined && best.result.table !== null && scoreCandidate(best.result) > 0) {
    return {
      strategy: best.result.strategy,
      table: best.result.table,
      method: `${best.result.strategy}_extraction (${scoreCandidate(best.result)} valid rows)`,
      warnings: [...best.result.warnings],
      sanitized: best.dropped,
    };
  }

  const fallback = sanitized.find((candidate) => candidate.result.strategy === 'table');
  const fallbackTable = fallback?.result.table;
  if (fallback !== undefined && fallbackTable !== null && fallbackTable !== undefined && fallbackTable.rows.length > 0) {
    return {
      strategy: 'table',
      table: fallbackTable,
      method: `table_extraction (fallback, ${fallbackTable.rows.length} rows)`,
      warnings: [...fallback.result.warnings],
      sanitized: fallback.dropped,
    };
  }

  throw new NoValidRowsError();
}
