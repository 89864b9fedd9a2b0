import { format as formatDate, isValid, parse } from 'date-fns';
import { DEFAULT_DATE_THRESHOLD } from '@ledgerline/types';

interface DateFormatRule {
  readonly format: string;
  /** Shape the raw value must have before date-fns is asked; its numeric tokens accept fewer digits than written. */
  readonly shape: RegExp;
}

/** Formats tried, in order, against a whole date column. */
export const EXPLICIT_DATE_FORMATS: readonly DateFormatRule[] = Object.freeze([
  { format: 'yyyy-MM-dd', shape: /^\d{4}-\d{1,2}-\d{1,2}$/ },
  { format: 'dd/MM/yyyy', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { format: 'MM/dd/yyyy', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { format: 'dd-MM-yyyy', shape: /^\d{1,2}-\d{1,2}-\d{4}$/ },
  { format: 'dd-MMM-yyyy', shape: /^\d{1,2}-[A-Za-z]{3}-\d{4}$/ },
  { format: 'dd-MMMM-yyyy', shape: /^\d{1,2}-[A-Za-z]{3,9}-\d{4}$/ },
  { format: 'dd MMM yyyy', shape: /^\d{1,2} [A-Za-z]{3} \d{4}$/ },
  { format: 'dd MMMM yyyy', shape: /^\d{1,2} [A-Za-z]{3,9} \d{4}$/ },
  { format: 'yyyy/MM/dd', shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/ },
]);

/** Day-first fallbacks used value by value once no single format dominates. */
const INFERENCE_FORMATS: readonly DateFormatRule[] = Object.freeze([
  ...EXPLICIT_DATE_FORMATS,
  { format: 'dd.MM.yyyy', shape: /^\d{1,2}\.\d{1,2}\.\d{4}$/ },
  { format: 'yyyy.MM.dd', shape: /^\d{4}\.\d{1,2}\.\d{1,2}$/ },
  { format: 'dd/MM/yy', shape: /^\d{1,2}\/\d{1,2}\/\d{2}$/ },
  { format: 'dd-MM-yy', shape: /^\d{1,2}-\d{1,2}-\d{2}$/ },
  { format: 'dd.MM.yy', shape: /^\d{1,2}\.\d{1,2}\.\d{2}$/ },
  { format: 'dd-MMMM-yy', shape: /^\d{1,2}-[A-Za-z]{3,9}-\d{2}$/ },
  { format: 'dd MMMM yy', shape: /^\d{1,2} [A-Za-z]{3,9} \d{2}$/ },
  { format: 'dd/MMMM/yyyy', shape: /^\d{1,2}\/[A-Za-z]{3,9}\/\d{4}$/ },
  { format: 'dd MMMM, yyyy', shape: /^\d{1,2} [A-Za-z]{3,9}, \d{4}$/ },
  { format: 'MMMM dd, yyyy', shape: /^[A-Za-z]{3,9} \d{1,2}, \d{4}$/ },
  { format: 'MMMM dd yyyy', shape: /^[A-Za-z]{3,9} \d{1,2} \d{4}$/ },
  { format: 'yyyyMMdd', shape: /^\d{8}$/ },
]);

export const INFERRED_FORMAT = 'inferred';
export const UNKNOWN_FORMAT = 'unknown';

const BLANK_VALUES: ReadonlySet<string> = new Set(['', 'nan', 'nat', 'none', 'null']);
const TRAILING_TIME = /[T\s]+\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*[AaPp][Mm])?(?:Z|[+-]\d{2}:?\d{2})?$/;
const REFERENCE_DATE = new Date(2000, 0, 1);

export interface DateColumnResult {
  /** ISO dates aligned with the input; `null` where the value did not parse. */
  dates: (string | null)[];
  /** The explicit format adopted, `inferred`, or `unknown` when nothing parsed. */
  format: string;
}

export function isBlankDate(value: string): boolean {
  return BLANK_VALUES.has(value.trim().toLowerCase());
}

function cleanDateText(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

function applyRule(value: string, rule: DateFormatRule): string | null {
  if (!rule.shape.test(value)) return null;
  const parsed = parse(value, rule.format, REFERENCE_DATE);
  return isValid(parsed) ? formatDate(parsed, 'yyyy-MM-dd') : null;
}

/** Parse one value against a single date-fns format; returns `YYYY-MM-DD` or `null`. */
export function parseWithFormat(value: string, format: string): string | null {
  const rule = INFERENCE_FORMATS.find((candidate) => candidate.format === format);
  if (rule === undefined) {
    throw new Error(`Unsupported date format: ${format}`);
  }
  return applyRule(cleanDateText(value), rule);
}

/**
 * Best-effort reading of a single value: a trailing time of day is dropped,
 * then day-first formats are tried in order.
 */
export function inferDate(value: string): string | null {
  const text = cleanDateText(value).replace(TRAILING_TIME, '').replace(/\bsept\b/i, 'Sep');
  if (text.length === 0) return null;

  for (const rule of INFERENCE_FORMATS) {
    const iso = applyRule(text, rule);
    if (iso !== null) return iso;
  }
  return null;
}

/**
 * Parse a whole date column. The first explicit format that reads strictly
 * more than `threshold` of the non-blank values is adopted for every value;
 * otherwise each value is inferred on its own.
 */
export function parseDateColumn(
  values: readonly string[],
  threshold: number = DEFAULT_DATE_THRESHOLD
): DateColumnResult {
  const cleaned = values.map(cleanDateText);
  const nonBlank = cleaned.filter((value) => !isBlankDate(value));

  if (nonBlank.length === 0) {
    return { dates: cleaned.map(() => null), format: UNKNOWN_FORMAT };
  }

  for (const rule of EXPLICIT_DATE_FORMATS) {
    const parsedCount = nonBlank.filter((value) => applyRule(value, rule) !== null).length;
    if (parsedCount > threshold * nonBlank.length) {
      return {
        dates: cleaned.map((value) => applyRule(value, rule)),
        format: rule.format,
      };
    }
  }

  const dates = cleaned.map((value) => (isBlankDate(value) ? null : inferDate(value)));
  return {
    dates,
    format: dates.some((date) => date !== null) ? INFERRED_FORMAT : UNKNOWN_FORMAT,
  };
}
