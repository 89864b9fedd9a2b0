/**
 * Page table reconstruction from positioned text.
 *
 * A table starts at a header-like row; its column boundaries come from the
 * header cells and every following row on the page is cut along them. A page
 * without a header continues the previous page's table when there is one,
 * otherwise its columns are inferred from the X positions of multi-cell rows.
 */
import { isHeaderLikeRow, type RawRow } from '@ledgerline/types';
import {
  detectColumnsFromHeader,
  inferColumnsByXClusters,
  mapRowToColumns,
  mergeItemsIntoCells,
  type ColumnMapping,
} from './columns.js';
import type { Row } from './rows.js';

export interface PageTables {
  /** Each table is a list of rows; a table opened on this page starts with its header row. */
  tables: RawRow[][];
  /** Header-derived columns still open at the end of the page, for the next page to continue. */
  carry: ColumnMapping | null;
}

const MIN_TABLE_COLUMNS = 2;

export function detectPageTables(pageRows: readonly Row[], carried: ColumnMapping | null = null): PageTables {
  const tables: RawRow[][] = [];
  let mapping: ColumnMapping | null = carried;
  let current: RawRow[] = [];

  for (const row of pageRows) {
    const cells = mergeItemsIntoCells(row.items).map((cell) => cell.text);

    if (cells.length >= MIN_TABLE_COLUMNS && isHeaderLikeRow(cells)) {
      if (current.length > 0) tables.push(current);
      mapping = detectColumnsFromHeader(row);
      current = [mapping.columns.map((column) => column.name)];
      continue;
    }

    if (mapping !== null) {
      current.push(mapRowToColumns(row, mapping.columns));
    }
  }

  if (current.length > 0) tables.push(current);

  if (mapping === null) {
    const inferred = inferTable(pageRows);
    if (inferred !== null) tables.push(inferred);
  }

  return { tables, carry: mapping };
}

function inferTable(pageRows: readonly Row[]): RawRow[] | null {
  const multiCellRows = pageRows.filter((row) => mergeItemsIntoCells(row.items).length >= MIN_TABLE_COLUMNS);
  if (multiCellRows.length === 0) return null;

  const mapping = inferColumnsByXClusters(multiCellRows);
  if (mapping.columns.length < MIN_TABLE_COLUMNS) return null;

  return multiCellRows.map((row) => mapRowToColumns(row, mapping.columns));
}
