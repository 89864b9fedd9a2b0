export { isValidISODate, compareDates, daysBetween, toMonthKey } from './date.js';
export { roundToTwoDecimals, sumAmounts, formatAmount, roundHalfEven } from './money.js';
export {
  PARSER_NAME,
  PARSER_VERSION,
  OUTPUT_SCHEMA_VERSION,
  CANONICAL_COLUMNS,
  REQUIRED_COLUMNS,
  DEFAULT_DATE_THRESHOLD,
  MIN_MONTHS,
  DAYS_PER_MONTH,
} from './constants.js';
export type { CanonicalColumn } from './constants.js';
export { HEADER_KEYWORDS, MIN_HEADER_KEYWORD_MATCHES, isHeaderLikeRow } from './header.js';
