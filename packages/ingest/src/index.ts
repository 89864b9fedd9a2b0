// Pipeline
export {
  processStatement,
  runPdfPages,
  runCsvDocument,
  normalizeLedgerTable,
  ledgerToTable,
  resolveOptions,
  dropWarnings,
} from './pipeline.js';
export type {
  LedgerBuild,
  LedgerRun,
  PipelineSuccess,
  PipelineFailure,
  PipelineResult,
  StatementInput,
  StatementPage,
} from './pipeline.js';

// Loaders
export { parseCsvContent, loadCsvDocument, sniffDelimiter, csvRowsToTable, CSV_DELIMITERS } from './loaders/csv-loader.js';
export type { CsvDocument, CsvDelimiter } from './loaders/csv-loader.js';
export { detectDocumentKind, hasPdfMagic } from './loaders/document-kind.js';

// Extraction strategies
export {
  extractTableStrategy,
  collectTableRows,
  stageRawTable,
  cleanCell,
  dominantWidth,
  fitRow,
  uniqueLabels,
} from './extractors/table-extractor.js';
export type { TablePage, LoadedTable, StageOptions } from './extractors/table-extractor.js';
export {
  extractTextStrategy,
  parseTextLine,
  cleanDescription,
  LINE_DATE_PATTERN,
  LINE_AMOUNT_PATTERN,
} from './extractors/text-extractor.js';
export type { TextPage, TextCandidate } from './extractors/text-extractor.js';
export {
  selectStrategy,
  sanitizeCandidate,
  scoreCandidate,
  countValidDateRows,
  toExtractionResult,
  STRUCTURAL_DATE_PATTERN,
  STRATEGY_PRIORITY,
} from './selector.js';
export type { StrategySelection, SanitizedCandidate } from './selector.js';

// Normalization and parsing
export {
  normalizeColumns,
  validateColumns,
  assignRoles,
  locateColumn,
  lookupRole,
  stripCurrencyAnnotation,
} from './normalizer/column-normalizer.js';
export type { RoleAssignment, ColumnNormalization } from './normalizer/column-normalizer.js';
export { COLUMN_SYNONYMS, CREDIT_KEYWORDS, ColumnRoleSchema, normalizeLabel } from './rules.js';
export type { ColumnRole, SynonymRule, KeywordRule } from './rules.js';
export { resolvePositionalAmount, hasCreditKeyword, typeForAmount, formatConflictWarning } from './amount-resolver.js';
export type { ResolvedAmount, DirectionSource } from './amount-resolver.js';
export { parseNumeric, isPlaceholder, numericValue, formatStagedAmount } from './parsers/numeric-parser.js';
export type { ParsedNumber } from './parsers/numeric-parser.js';
export {
  parseDateColumn,
  parseWithFormat,
  inferDate,
  isBlankDate,
  EXPLICIT_DATE_FORMATS,
  INFERRED_FORMAT,
  UNKNOWN_FORMAT,
} from './parsers/date-parser.js';
export type { DateColumnResult } from './parsers/date-parser.js';

// Cleaning and summary
export { sanitizeTable, collapseWhitespace, isJunkLabel } from './sanitizer.js';
export type { SanitizedTable } from './sanitizer.js';
export { summarizeLedger, getMonthlyTrends, computeMonthsCovered, shortHistoryWarning } from './summarizer.js';
export type { SummaryOptions, SummaryResult } from './summarizer.js';

// Batch
export { processBatch } from './batch-processor.js';
export type { BatchProcessResult, BatchProcessOptions, ParseError } from './batch-processor.js';
export { scanDirectoryForStatements, validateDirectory, STATEMENT_EXTENSIONS } from './directory-scanner.js';
export type { StatementFileInfo, ScanResult, SkippedFile, DirectoryCheck } from './directory-scanner.js';
