import { describe, it, expect } from 'vitest';
import { NoValidRowsError, type StagedTable } from '@ledgerline/types';
import { STRUCTURAL_DATE_PATTERN, countValidDateRows, selectStrategy, toExtractionResult } from '@ledgerline/ingest';

function tableOf(dates: readonly string[]): StagedTable {
  return {
    columns: ['date', 'description', 'amount'],
    rows: dates.map((date) => ({ date, description: 'x', amount: '1' })),
  };
}

const repeat = (value: string, times: number): string[] => Array.from({ length: times }, () => value);

describe('STRUCTURAL_DATE_PATTERN', () => {
  it('should recognise statement date shapes', () => {
    expect(STRUCTURAL_DATE_PATTERN.test('15/01/2026')).toBe(true);
    expect(STRUCTURAL_DATE_PATTERN.test('15-01-2026')).toBe(true);
    expect(STRUCTURAL_DATE_PATTERN.test('5 Jan 2026')).toBe(true);
    expect(STRUCTURAL_DATE_PATTERN.test('05-January-2026')).toBe(true);
    expect(STRUCTURAL_DATE_PATTERN.test('2026-01-15')).toBe(true);
  });

  it('should reject text without a full date', () => {
    expect(STRUCTURAL_DATE_PATTERN.test('Jan 2026')).toBe(false);
    expect(STRUCTURAL_DATE_PATTERN.test('Total')).toBe(false);
  });
});

describe('countValidDateRows', () => {
  it('should count rows whose date cell has a date shape', () => {
    expect(countValidDateRows(tableOf(['15/01/2026', 'Total', '16/01/2026']))).toBe(2);
  });

  it('should be zero without a table or a date column', () => {
    expect(countValidDateRows(null)).toBe(0);
    expect(countValidDateRows({ columns: ['col0'], rows: [{ col0: '15/01/2026' }] })).toBe(0);
  });
});

describe('selectStrategy', () => {
  it('should prefer the candidate with more dated rows over more rows', () => {
    const table = toExtractionResult('table', tableOf([...repeat('15/01/2026', 2), ...repeat('Total', 8)]), []);
    const text = toExtractionResult('text', tableOf(repeat('15/01/2026', 6)), ['text warning']);

    const selection = selectStrategy([table, text]);

    expect(selection.strategy).toBe('text');
    expect(selection.method).toBe('text_extraction (6 valid rows)');
    expect(selection.warnings).toEqual(['text warning']);
  });

  it('should prefer text on a tie', () => {
    const table = toExtractionResult('table', tableOf(['15/01/2026']), []);
    const text = toExtractionResult('text', tableOf(['15/01/2026']), []);

    expect(selectStrategy([table, text]).strategy).toBe('text');
  });

  it('should pick the table when it finds more dated rows', () => {
    const table = toExtractionResult('table', tableOf(repeat('15/01/2026', 4)), []);
    const text = toExtractionResult('text', tableOf(['15/01/2026']), []);

    const selection = selectStrategy([table, text]);

    expect(selection.strategy).toBe('table');
    expect(selection.method).toBe('table_extraction (4 valid rows)');
  });

  it('should fall back to an undated table', () => {
    const table = toExtractionResult('table', tableOf(['a', 'b', 'c']), []);
    const text = toExtractionResult('text', null, []);

    const selection = selectStrategy([table, text]);

    expect(selection.strategy).toBe('table');
    expect(selection.method).toBe('table_extraction (fallback, 3 rows)');
  });

  it('should score candidates after sanitizing them', () => {
    const table = toExtractionResult('table', tableOf(['15  Jan 2026', '16  Jan 2026', 'Date']), []);
    const text = toExtractionResult('text', tableOf(['15/01/2026']), []);

    const selection = selectStrategy([table, text]);

    expect(selection.strategy).toBe('table');
    expect(selection.method).toBe('table_extraction (2 valid rows)');
    expect(selection.table.rows.map((row) => row['date'])).toEqual(['15 Jan 2026', '16 Jan 2026']);
    expect(selection.sanitized).toBe(1);
  });

  it('should not fall back to a table of repeated header labels', () => {
    const table = toExtractionResult('table', tableOf(['Date', 'Balance']), []);
    const text = toExtractionResult('text', null, []);

    expect(() => selectStrategy([table, text])).toThrow(NoValidRowsError);
  });

  it('should throw when nothing was extracted', () => {
    const table = toExtractionResult('table', null, []);
    const text = toExtractionResult('text', null, []);

    expect(() => selectStrategy([table, text])).toThrow(NoValidRowsError);
  });
});
