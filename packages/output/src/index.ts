/**
 * Output module - turns pipeline runs into ledger documents and CSV.
 */

export {
  toLedgerOutput,
  toBatchLedgerOutput,
  type LedgerRunLike,
  type BatchLedgerOutput,
} from './adapters.js';

export {
  exportLedgerCsv,
  exportDocumentsCsv,
  escapeCsvValue,
  type CsvExportOptions,
} from './csv-exporter.js';
