/**
 * Text strategy: reads flowed statement lines where the table structure was
 * lost. A line is a transaction candidate when it carries a date and at
 * least two amount-like tokens (debit, credit, balance in some order).
 */
import type { ExtractionResult, StagedRow } from '@ledgerline/types';
import { formatConflictWarning, resolvePositionalAmount } from '../amount-resolver.js';
import { formatStagedAmount } from '../parsers/numeric-parser.js';
import { toExtractionResult } from '../selector.js';

const MONTHS = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec';

export const LINE_DATE_PATTERN = new RegExp(`\\d{2}[-/]\\d{2}[-/]\\d{4}|\\d{1,2}\\s(?:${MONTHS})[a-z]*\\s\\d{4}`, 'gi');

/** Money with two decimals and an optional minus, a dash placeholder, or a lone `-` standing between spaces. */
export const LINE_AMOUNT_PATTERN = /(?<![\d.,])-?\d[\d,]*\.\d{2}(?!\d)|(?<!-)-{2,3}(?![-\d])|(?<=\s)-(?=\s|$)/g;

const DASHES = /^-+$/;

const NON_TRANSACTION_LABELS: ReadonlySet<string> = new Set([
  'opening balance',
  'closing balance',
  'balance brought forward',
  'balance carried forward',
]);

const MIN_DESCRIPTION_LENGTH = 3;
const MAX_AMOUNT_TOKENS = 3;

/** The part of a loaded page the text strategy reads. */
export interface TextPage {
  lines: readonly string[];
}

export interface TextCandidate {
  date: string;
  description: string;
  /** Up to three amount tokens, in reading order. */
  amounts: string[];
}

interface TokenSpan {
  start: number;
  end: number;
  text: string;
  kind: 'date' | 'number' | 'placeholder';
}

function findSpans(pattern: RegExp, text: string, kind: (match: string) => TokenSpan['kind']): TokenSpan[] {
  return Array.from(text.matchAll(pattern), (match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
    text: match[0],
    kind: kind(match[0]),
  }));
}

function mask(text: string, spans: readonly TokenSpan[]): string {
  let masked = text;
  for (const span of spans) {
    masked = masked.slice(0, span.start) + ' '.repeat(span.end - span.start) + masked.slice(span.end);
  }
  return masked;
}

/**
 * Amount tokens that belong to a column run. Numbers always count; a dash
 * placeholder counts only when whitespace alone separates it from a number,
 * directly or through other tokens of the same run. Other dashes are
 * narration text.
 */
function columnTokens(line: string, spans: readonly TokenSpan[]): TokenSpan[] {
  const kept: TokenSpan[] = [];
  let run: TokenSpan[] = [];

  const closeRun = (): void => {
    if (run.some((span) => span.kind === 'number')) kept.push(...run);
    run = [];
  };

  for (const span of spans) {
    const previous = run[run.length - 1];
    if (previous !== undefined && line.slice(previous.end, span.start).trim() !== '') closeRun();
    run.push(span);
  }
  closeRun();
  return kept;
}

export function cleanDescription(text: string): string {
  return text
    .replace(/[^a-zA-Z0-9\s.,-]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Split one statement line into date, description and amount tokens, or `null` when it is not a transaction. */
export function parseTextLine(line: string): TextCandidate | null {
  const dates = findSpans(LINE_DATE_PATTERN, line, () => 'date');
  const firstDate = dates[0];
  if (firstDate === undefined) return null;

  const amountSpans = findSpans(LINE_AMOUNT_PATTERN, mask(line, dates), (token) =>
    DASHES.test(token) ? 'placeholder' : 'number'
  );

  const amounts = columnTokens(line, amountSpans);
  if (amounts.length < 2) return null;

  const description = cleanDescription(mask(line, [...dates, ...amounts]));
  if (description.length < MIN_DESCRIPTION_LENGTH) return null;
  if (NON_TRANSACTION_LABELS.has(description.toLowerCase())) return null;

  return {
    date: firstDate.text,
    description,
    amounts: amounts.slice(0, MAX_AMOUNT_TOKENS).map((span) => span.text),
  };
}

export function extractTextStrategy(pages: readonly TextPage[]): ExtractionResult {
  const rows: StagedRow[] = [];
  let conflicts = 0;
  let unresolved = 0;

  for (const page of pages) {
    for (const line of page.lines) {
      const candidate = parseTextLine(line);
      if (candidate === null) continue;

      const resolved = resolvePositionalAmount(candidate.description, candidate.amounts);
      if (resolved === null) {
        unresolved++;
        continue;
      }
      if (resolved.conflict) conflicts++;

      rows.push({
        date: candidate.date,
        description: candidate.description,
        amount: formatStagedAmount(resolved.amount),
        type: resolved.type,
      });
    }
  }

  const warnings: string[] = [];
  if (conflicts > 0) warnings.push(formatConflictWarning(conflicts));
  if (unresolved > 0) warnings.push(`Skipped ${unresolved} text line(s) whose amounts could not be read.`);

  const table = rows.length === 0 ? null : { columns: ['date', 'description', 'amount', 'type'], rows };
  return toExtractionResult('text', table, warnings);
}
