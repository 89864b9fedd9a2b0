export type {
  RawCell,
  RawRow,
  RawTable,
  StagedRow,
  StagedTable,
  ExtractionResult,
  DropCounts,
  DocumentSource,
} from './tables.js';

export type { LedgerOutput } from './output.js';
