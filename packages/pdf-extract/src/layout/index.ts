export {
  groupByRows,
  getRowsForPage,
  clusterRows,
  joinRowItems,
  buildLinesFromItems,
  buildLinesForPage,
  LINE_Y_TOLERANCE,
  SPACE_GAP,
  COLUMN_GAP,
} from './rows.js';
export type { Row, ColumnSeparator } from './rows.js';

export {
  mergeItemsIntoCells,
  detectColumnsFromHeader,
  inferColumnsByXClusters,
  getColumnForItem,
  mapRowToColumns,
} from './columns.js';
export type { Column, ColumnMapping, CellSpan } from './columns.js';

export { detectPageTables } from './tables.js';
export type { PageTables } from './tables.js';
