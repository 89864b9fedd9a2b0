import {
  DAYS_PER_MONTH,
  MIN_MONTHS,
  daysBetween,
  roundHalfEven,
  roundToTwoDecimals,
  toMonthKey,
  type CanonicalTransaction,
  type MonthlyBreakdown,
  type MonthlyTrend,
  type StatementSummary,
} from '@ledgerline/types';
import { UNKNOWN_FORMAT } from './parsers/date-parser.js';

export interface SummaryOptions {
  /** Explicit date format adopted for the document, or `inferred`. */
  dateFormat?: string;
  minMonths?: number;
  daysPerMonth?: number;
}

export interface SummaryResult {
  summary: StatementSummary;
  warnings: string[];
}

/** `max(1, round(days / daysPerMonth))`, halves rounded to even. */
export function computeMonthsCovered(daysCovered: number, daysPerMonth: number = DAYS_PER_MONTH): number {
  return Math.max(1, roundHalfEven(daysCovered / daysPerMonth));
}

export function shortHistoryWarning(monthsCovered: number, minMonths: number = MIN_MONTHS): string {
  return `Statement covers only ${monthsCovered} month(s). A minimum of ${minMonths} months is recommended for reliable scoring.`;
}

function groupByMonth(ledger: readonly CanonicalTransaction[]): Map<string, CanonicalTransaction[]> {
  const groups = new Map<string, CanonicalTransaction[]>();
  for (const txn of ledger) {
    const key = toMonthKey(txn.date);
    const group = groups.get(key);
    if (group === undefined) groups.set(key, [txn]);
    else group.push(txn);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

function totals(transactions: readonly CanonicalTransaction[]): { credits: number; debits: number } {
  let credits = 0;
  let debits = 0;
  for (const txn of transactions) {
    if (txn.amount > 0) credits += txn.amount;
    else if (txn.amount < 0) debits += -txn.amount;
  }
  return { credits: roundToTwoDecimals(credits), debits: roundToTwoDecimals(debits) };
}

/**
 * Derive coverage and monthly activity from a date-ordered ledger.
 * A ledger spanning fewer than `minMonths` months yields a warning.
 */
export function summarizeLedger(ledger: readonly CanonicalTransaction[], options: SummaryOptions = {}): SummaryResult {
  const minMonths = options.minMonths ?? MIN_MONTHS;
  const daysPerMonth = options.daysPerMonth ?? DAYS_PER_MONTH;

  const first = ledger[0];
  const last = ledger[ledger.length - 1];
  const startDate = first?.date ?? null;
  const endDate = last?.date ?? null;
  const daysCovered = startDate !== null && endDate !== null ? daysBetween(startDate, endDate) : 0;
  const monthsCovered = computeMonthsCovered(daysCovered, daysPerMonth);

  const monthlyBreakdown: MonthlyBreakdown[] = [];
  for (const [month, transactions] of groupByMonth(ledger)) {
    monthlyBreakdown.push({ month, ...totals(transactions), count: transactions.length });
  }

  const overall = totals(ledger);
  const summary: StatementSummary = {
    totalTransactions: ledger.length,
    startDate,
    endDate,
    daysCovered,
    monthsCovered,
    monthlyBreakdown,
    totalCredits: overall.credits,
    totalDebits: overall.debits,
    dateFormatDetected: options.dateFormat ?? UNKNOWN_FORMAT,
  };

  const warnings = monthsCovered < minMonths ? [shortHistoryWarning(monthsCovered, minMonths)] : [];
  return { summary, warnings };
}

/** Income, expenses and net per calendar month, oldest first. */
export function getMonthlyTrends(ledger: readonly CanonicalTransaction[]): MonthlyTrend[] {
  const trends: MonthlyTrend[] = [];
  for (const [month, transactions] of groupByMonth(ledger)) {
    const { credits, debits } = totals(transactions);
    trends.push({ month, income: credits, expenses: debits, net: roundToTwoDecimals(credits - debits) });
  }
  return trends;
}
