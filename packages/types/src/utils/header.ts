/**
 * Keywords that mark a statement table's header row. A row is treated as a
 * header when at least two of them occur (case-insensitively) in its joined text.
 */
export const HEADER_KEYWORDS: readonly string[] = Object.freeze([
  'date',
  'narration',
  'description',
  'particulars',
  'details',
  'debit',
  'credit',
  'amount',
  'withdrawal',
  'deposit',
  'balance',
  'value date',
  'trans date',
  'reference',
  'remarks',
  'type',
]);

export const MIN_HEADER_KEYWORD_MATCHES = 2;

export function isHeaderLikeRow(cells: readonly string[]): boolean {
  const rowText = cells.map((cell) => cell.toLowerCase()).join(' ');
  let matches = 0;
  for (const keyword of HEADER_KEYWORDS) {
    if (rowText.includes(keyword)) {
      matches++;
      if (matches >= MIN_HEADER_KEYWORD_MATCHES) return true;
    }
  }
  return false;
}
