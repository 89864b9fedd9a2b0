/**
 * Column detection utilities for layout-aware PDF parsing.
 * Detects and maps columns in tabular data based on X positions.
 */
import type { TextItem } from '../layout-pdfjs.js';
import { COLUMN_GAP } from './rows.js';
import type { Row } from './rows.js';

export interface Column {
  /** Column name/header (generic `colN` when inferred) */
  name: string;
  /** Left X boundary (inclusive) */
  left: number;
  /** Right X boundary (exclusive) */
  right: number;
  /** 0-based */
  index: number;
}

export interface ColumnMapping {
  columns: Column[];
  /** Lower-cased column name to index */
  byName: Map<string, number>;
}

/** A run of neighbouring items that reads as one cell. */
export interface CellSpan {
  text: string;
  left: number;
  right: number;
}

/**
 * Merge a row's items into cells: items closer than the column gap belong
 * to the same cell ("Value" + "Date" → "Value Date").
 */
export function mergeItemsIntoCells(items: readonly TextItem[], columnGap: number = COLUMN_GAP): CellSpan[] {
  const sorted = [...items].sort((a, b) => a.x - b.x);
  const cells: CellSpan[] = [];

  for (const item of sorted) {
    const last = cells[cells.length - 1];
    if (last !== undefined && item.x - last.right <= columnGap) {
      last.text = `${last.text} ${item.str}`;
      last.right = Math.max(last.right, item.x + item.width);
    } else {
      cells.push({ text: item.str, left: item.x, right: item.x + item.width });
    }
  }

  return cells;
}

/**
 * Detect columns from a header row.
 *
 * Boundaries sit halfway between neighbouring header cells, so that
 * right-aligned figures starting left of their header still land in it.
 * The outer columns are open-ended.
 */
export function detectColumnsFromHeader(headerRow: Row): ColumnMapping {
  const cells = mergeItemsIntoCells(headerRow.items);
  const columns: Column[] = [];
  const byName = new Map<string, number>();

  for (let i = 0; i < cells.length; i++) {
    const cell = cells[i];
    if (!cell) continue;

    const prev = cells[i - 1];
    const next = cells[i + 1];
    const column: Column = {
      name: cell.text.trim(),
      left: prev ? (prev.right + cell.left) / 2 : Number.NEGATIVE_INFINITY,
      right: next ? (cell.right + next.left) / 2 : Number.POSITIVE_INFINITY,
      index: i,
    };

    columns.push(column);
    if (!byName.has(column.name.toLowerCase())) {
      byName.set(column.name.toLowerCase(), i);
    }
  }

  return { columns, byName };
}

/**
 * Infer columns by clustering the left edges of cells across rows.
 * Used when a page carries no recognizable header row.
 *
 * @param xTolerance - Maximum X difference to consider the same column
 */
export function inferColumnsByXClusters(rows: readonly Row[], xTolerance: number = 10): ColumnMapping {
  const xPositions: number[] = [];
  for (const row of rows) {
    for (const cell of mergeItemsIntoCells(row.items)) {
      xPositions.push(cell.left);
    }
  }

  if (xPositions.length === 0) {
    return { columns: [], byName: new Map() };
  }

  xPositions.sort((a, b) => a - b);

  const clusters: number[][] = [];
  let currentCluster: number[] = [];

  for (const x of xPositions) {
    const prevX = currentCluster[currentCluster.length - 1];
    if (prevX === undefined || x - prevX <= xTolerance) {
      currentCluster.push(x);
    } else {
      clusters.push(currentCluster);
      currentCluster = [x];
    }
  }
  clusters.push(currentCluster);

  const columns: Column[] = [];
  const byName = new Map<string, number>();

  for (let i = 0; i < clusters.length; i++) {
    const cluster = clusters[i];
    if (!cluster || cluster.length === 0) continue;

    const nextCluster = clusters[i + 1];
    const column: Column = {
      name: `col${i}`,
      left: i === 0 ? Number.NEGATIVE_INFINITY : Math.min(...cluster),
      right: nextCluster ? Math.min(...nextCluster) : Number.POSITIVE_INFINITY,
      index: i,
    };

    columns.push(column);
    byName.set(column.name, i);
  }

  return { columns, byName };
}

/**
 * Map a text item to its column by the item's horizontal centre.
 *
 * @returns Column index, or -1 if not in any column
 */
export function getColumnForItem(item: TextItem, columns: readonly Column[]): number {
  const center = item.x + item.width / 2;
  for (const col of columns) {
    if (center >= col.left && center < col.right) {
      return col.index;
    }
  }
  return -1;
}

/**
 * Map a row's items to columns.
 *
 * @returns One string per column (empty string if no item in column)
 */
export function mapRowToColumns(row: Row, columns: readonly Column[]): string[] {
  const result: string[] = columns.map(() => '');

  for (const item of row.items) {
    const colIndex = getColumnForItem(item, columns);
    const current = result[colIndex];
    if (current === undefined) continue;
    result[colIndex] = current === '' ? item.str : `${current} ${item.str}`;
  }

  return result;
}
