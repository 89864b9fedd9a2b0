import { z } from 'zod';
import { DAYS_PER_MONTH, DEFAULT_DATE_THRESHOLD, MIN_MONTHS } from '../utils/constants.js';

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const IsoDateSchema = z.string().regex(ISO_DATE_PATTERN, 'Date must be in YYYY-MM-DD format');

export const TransactionTypeSchema = z.enum(['Credit', 'Debit']);
export type TransactionType = z.infer<typeof TransactionTypeSchema>;

export const ExtractionStrategySchema = z.enum(['table', 'text']);
export type ExtractionStrategy = z.infer<typeof ExtractionStrategySchema>;

export const DocumentKindSchema = z.enum(['pdf', 'csv']);
export type DocumentKind = z.infer<typeof DocumentKindSchema>;

export const CanonicalTransactionSchema = z
  .object({
    date: IsoDateSchema,
    description: z.string(),
    amount: z.number().finite(),
    type: TransactionTypeSchema,
  })
  .refine((txn) => (txn.type === 'Credit') === txn.amount >= 0, {
    message: 'type must be Credit for non-negative amounts and Debit otherwise',
    path: ['type'],
  });
export type CanonicalTransaction = Readonly<z.infer<typeof CanonicalTransactionSchema>>;

export const LedgerSchema = z.array(CanonicalTransactionSchema);

export const MonthlyBreakdownSchema = z.object({
  month: z.string().regex(/^\d{4}-\d{2}$/, 'Month must be in YYYY-MM format'),
  credits: z.number().min(0),
  debits: z.number().min(0),
  count: z.number().int().min(0),
});
export type MonthlyBreakdown = z.infer<typeof MonthlyBreakdownSchema>;

export const MonthlyTrendSchema = z.object({
  month: z.string().regex(/^\d{4}-\d{2}$/),
  income: z.number().min(0),
  expenses: z.number().min(0),
  net: z.number(),
});
export type MonthlyTrend = z.infer<typeof MonthlyTrendSchema>;

export const StatementSummarySchema = z.object({
  totalTransactions: z.number().int().min(0),
  startDate: IsoDateSchema.nullable(),
  endDate: IsoDateSchema.nullable(),
  daysCovered: z.number().int().min(0),
  monthsCovered: z.number().int().min(1),
  monthlyBreakdown: z.array(MonthlyBreakdownSchema),
  totalCredits: z.number().min(0),
  totalDebits: z.number().min(0),
  dateFormatDetected: z.string(),
});
export type StatementSummary = z.infer<typeof StatementSummarySchema>;

/**
 * Tunables shared by every stage of a single document run.
 * `dateThreshold` is exclusive: a format must parse strictly more than this
 * share of the non-blank date values to be adopted.
 */
export const PipelineOptionsSchema = z.object({
  dateThreshold: z.number().gt(0).lt(1).default(DEFAULT_DATE_THRESHOLD),
  minMonths: z.number().int().min(1).default(MIN_MONTHS),
  daysPerMonth: z.number().int().positive().default(DAYS_PER_MONTH),
});
export type PipelineOptions = z.input<typeof PipelineOptionsSchema>;
export type ResolvedPipelineOptions = z.infer<typeof PipelineOptionsSchema>;
