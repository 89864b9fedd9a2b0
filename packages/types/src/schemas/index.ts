export {
  ISO_DATE_PATTERN,
  IsoDateSchema,
  TransactionTypeSchema,
  ExtractionStrategySchema,
  DocumentKindSchema,
  CanonicalTransactionSchema,
  LedgerSchema,
  MonthlyBreakdownSchema,
  MonthlyTrendSchema,
  StatementSummarySchema,
  PipelineOptionsSchema,
} from './ledger.js';

export type {
  TransactionType,
  ExtractionStrategy,
  DocumentKind,
  CanonicalTransaction,
  MonthlyBreakdown,
  MonthlyTrend,
  StatementSummary,
  PipelineOptions,
  ResolvedPipelineOptions,
} from './ledger.js';
