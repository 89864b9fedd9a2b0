export const PARSER_NAME = 'ledgerline';

export const PARSER_VERSION = '0.1.0';

export const OUTPUT_SCHEMA_VERSION = '1.0.0' as const;

export const CANONICAL_COLUMNS = ['date', 'description', 'amount', 'type'] as const;
export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

export const REQUIRED_COLUMNS = ['date', 'description', 'amount'] as const;

export const DEFAULT_DATE_THRESHOLD = 0.8;

export const MIN_MONTHS = 3;

export const DAYS_PER_MONTH = 30;
