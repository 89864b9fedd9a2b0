/**
 * Row reconstruction shared by both readings of a page: table detection
 * works on `Row`s, the text strategy on the tab-separated lines built from
 * the same clusters.
 */
import type { TextItem } from '../layout-pdfjs.js';

/** Items within this Y distance share a text line. */
export const LINE_Y_TOLERANCE = 2.0;
/** Gap, in points, above which two items are separate words. */
export const SPACE_GAP = 2.5;
/** Gap, in points, above which two items sit in separate columns. */
export const COLUMN_GAP = 18;

export interface Row {
  /** Mean Y of the row's items. */
  y: number;
  page: number;
  /** Left to right. */
  items: TextItem[];
  /** Items joined with single spaces between words. */
  text: string;
}

export type ColumnSeparator = ' ' | '\t';

/**
 * Cluster one page's items into rows, top to bottom. An item joins the open
 * row while it lies within `yTolerance` of the row's first item.
 */
export function clusterRows(items: readonly TextItem[], yTolerance: number): TextItem[][] {
  // PDF coordinates: higher Y = higher on page
  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);

  const clusters: TextItem[][] = [];
  for (const item of sorted) {
    const open = clusters[clusters.length - 1];
    const anchor = open?.[0];
    if (open !== undefined && anchor !== undefined && Math.abs(item.y - anchor.y) <= yTolerance) {
      open.push(item);
    } else {
      clusters.push([item]);
    }
  }

  for (const cluster of clusters) cluster.sort((a, b) => a.x - b.x);
  return clusters;
}

/**
 * Join a left-to-right row into text. Touching items are glued, word gaps
 * get a space and column gaps get `columnSeparator`.
 */
export function joinRowItems(items: readonly TextItem[], columnSeparator: ColumnSeparator): string {
  let out = '';
  let prevEndX: number | null = null;

  for (const item of items) {
    if (item.str === '') continue;
    if (prevEndX !== null) {
      const gap = item.x - prevEndX;
      if (gap > COLUMN_GAP) out += columnSeparator;
      else if (gap > SPACE_GAP) out += ' ';
    }
    out += item.str;
    prevEndX = item.x + item.width;
  }

  return out.replace(/[ \t]+$/, '');
}

function pagesOf(items: readonly TextItem[]): Map<number, TextItem[]> {
  const byPage = new Map<number, TextItem[]>();
  for (const item of items) {
    const pageItems = byPage.get(item.page);
    if (pageItems === undefined) byPage.set(item.page, [item]);
    else pageItems.push(item);
  }
  return new Map([...byPage].sort(([a], [b]) => a - b));
}

/**
 * Group positioned items into rows, page by page.
 *
 * @returns Rows in page order, each page top to bottom
 */
export function groupByRows(items: readonly TextItem[], yTolerance: number = 3.0): Row[] {
  const rows: Row[] = [];
  for (const [page, pageItems] of pagesOf(items)) {
    for (const cluster of clusterRows(pageItems, yTolerance)) {
      rows.push({
        y: cluster.reduce((sum, item) => sum + item.y, 0) / cluster.length,
        page,
        items: cluster,
        text: joinRowItems(cluster, ' '),
      });
    }
  }
  return rows;
}

/**
 * Flowed text lines for the text strategy, with a tab wherever a column gap
 * separates two items so neighbouring cells are never glued together.
 */
export function buildLinesFromItems(items: readonly TextItem[]): string[] {
  return clusterRows(items, LINE_Y_TOLERANCE)
    .map((cluster) => joinRowItems(cluster, '\t'))
    .filter((line) => line !== '');
}

export function buildLinesForPage(items: readonly TextItem[], pageNumber: number): string[] {
  return buildLinesFromItems(items.filter((item) => item.page === pageNumber));
}

export function getRowsForPage(rows: readonly Row[], page: number): Row[] {
  return rows.filter((row) => row.page === page);
}
