import { roundToTwoDecimals } from '@ledgerline/types';

/**
 * Outcome of reading one amount cell. A placeholder (`-`, `--`, `---` or an
 * empty cell) is an explicit zero and is kept apart from a genuine `0.00`;
 * anything that is not a number at all is `missing` and drops the row.
 */
export type ParsedNumber =
  | { kind: 'value'; value: number }
  | { kind: 'placeholder'; value: 0 }
  | { kind: 'missing' };

const PLACEHOLDERS: ReadonlySet<string> = new Set(['', '-', '--', '---']);

const CURRENCY_CODES = /(?:NGN|USD|EUR|GBP)/gi;
const CURRENCY_SYMBOLS = /[₦$€£¥]/g;
const DEBIT_SUFFIX = /\s*DR\.?$/i;
const CREDIT_SUFFIX = /\s*CR\.?$/i;
const PLAIN_NUMBER = /^(?:\d+(?:\.\d+)?|\.\d+)$/;

export function isPlaceholder(raw: string): boolean {
  return PLACEHOLDERS.has(raw.trim());
}

/**
 * Parse a statement amount: currency symbols and codes, thousands separators
 * and spaces are stripped; parentheses, a leading minus or a trailing `DR`
 * make it negative, a trailing `CR` keeps it positive.
 *
 * `undefined` (no cell at all) is missing, not a placeholder.
 */
export function parseNumeric(raw: string | undefined): ParsedNumber {
  if (raw === undefined) return { kind: 'missing' };

  let text = raw.replace(/\u00a0/g, ' ').trim();
  if (PLACEHOLDERS.has(text)) return { kind: 'placeholder', value: 0 };

  let negative = false;

  text = text.replace(CURRENCY_CODES, '').replace(CURRENCY_SYMBOLS, '').trim();

  if (DEBIT_SUFFIX.test(text)) {
    negative = true;
    text = text.replace(DEBIT_SUFFIX, '');
  } else if (CREDIT_SUFFIX.test(text)) {
    text = text.replace(CREDIT_SUFFIX, '');
  }

  text = text.trim();
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = !negative;
    text = text.slice(1, -1).trim();
  }

  if (text.startsWith('-')) {
    negative = !negative;
    text = text.slice(1);
  } else if (text.startsWith('+')) {
    text = text.slice(1);
  }

  text = text.replace(/[,\s]/g, '');
  if (!PLAIN_NUMBER.test(text)) return { kind: 'missing' };

  const value = Number.parseFloat(text);
  if (!Number.isFinite(value)) return { kind: 'missing' };

  const signed = negative ? -value : value;
  return { kind: 'value', value: signed === 0 ? 0 : signed };
}

/** Numeric value of a parsed cell, or `null` when it is missing. */
export function numericValue(parsed: ParsedNumber): number | null {
  return parsed.kind === 'missing' ? null : parsed.value;
}

/** Render an amount for a staged table cell. */
export function formatStagedAmount(amount: number): string {
  const rounded = roundToTwoDecimals(amount);
  return String(rounded === 0 ? 0 : rounded);
}
