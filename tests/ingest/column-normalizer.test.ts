import { describe, it, expect } from 'vitest';
import {
  assignRoles,
  locateColumn,
  lookupRole,
  normalizeColumns,
  stripCurrencyAnnotation,
  validateColumns,
} from '@ledgerline/ingest';
import { MissingColumnError } from '@ledgerline/types';

describe('lookupRole', () => {
  it('should match labels case- and whitespace-insensitively', () => {
    expect(lookupRole('  Trans   Date ')).toEqual({ label: 'trans date', role: 'date', rank: 2 });
    expect(lookupRole('NARRATION')?.role).toBe('description');
  });

  it('should look past a currency annotation', () => {
    expect(lookupRole('Debit (₦)')).toEqual({ label: 'debit', role: '_debit', rank: 0 });
    expect(lookupRole('Money In (NGN)')?.role).toBe('_credit');
  });

  it('should return null for unknown labels', () => {
    expect(lookupRole('Balance')).toBeNull();
    expect(lookupRole('(₦)')).toBeNull();
  });
});

describe('stripCurrencyAnnotation', () => {
  it('should drop a trailing parenthesised note', () => {
    expect(stripCurrencyAnnotation('Credit (₦)')).toBe('Credit');
    expect(stripCurrencyAnnotation('Amount')).toBe('Amount');
  });
});

describe('assignRoles', () => {
  it('should prefer the synonym listed first', () => {
    const { winners, contested } = assignRoles(['Value Date', 'Trans Date', 'Narration']);

    expect(winners.get('date')).toBe('Trans Date');
    expect(winners.get('description')).toBe('Narration');
    expect(contested).toEqual([{ column: 'Value Date', role: 'date', winner: 'Trans Date' }]);
  });

  it('should break ties by position', () => {
    const { winners } = assignRoles(['Narration', 'narration (NGN)']);

    expect(winners.get('description')).toBe('Narration');
  });
});

describe('locateColumn', () => {
  it('should return a canonical column as is', () => {
    expect(locateColumn({ columns: ['date', 'txn date'] }, 'date')).toBe('date');
  });

  it('should find the source column of a role', () => {
    expect(locateColumn({ columns: ['txn date', 'details'] }, 'date')).toBe('txn date');
    expect(locateColumn({ columns: ['txn date', 'details'] }, 'amount')).toBeUndefined();
  });
});

describe('normalizeColumns', () => {
  it('should fold a debit and credit pair into one signed amount', () => {
    const result = normalizeColumns({
      columns: ['trans date', 'narration', 'debit (₦)', 'credit (₦)', 'balance'],
      rows: [
        { 'trans date': '15/01/2026', narration: 'POS', 'debit (₦)': '5,000.00', 'credit (₦)': '', balance: '95000.00' },
        { 'trans date': '20/01/2026', narration: 'Salary', 'debit (₦)': '', 'credit (₦)': '150,000.00', balance: '245000.00' },
        { 'trans date': '21/01/2026', narration: 'Card fee', 'debit (₦)': 'abc', 'credit (₦)': '', balance: '244900.00' },
      ],
    });

    expect(result.table.columns).toEqual(['date', 'description', 'balance', 'amount']);
    expect(result.table.rows).toEqual([
      { date: '15/01/2026', description: 'POS', balance: '95000.00', amount: '-5000' },
      { date: '20/01/2026', description: 'Salary', balance: '245000.00', amount: '150000' },
      { date: '21/01/2026', description: 'Card fee', balance: '244900.00' },
    ]);
    expect(result.warnings).toEqual([]);
    expect(result.sourceColumns).toEqual(['trans date', 'narration', 'debit (₦)', 'credit (₦)', 'balance']);
  });

  it('should keep a unified amount column and leave split columns untouched', () => {
    const result = normalizeColumns({
      columns: ['Date', 'Description', 'Amount', 'Credit'],
      rows: [{ Date: '15/01/2026', Description: 'POS', Amount: '-5000', Credit: '' }],
    });

    expect(result.table.columns).toEqual(['date', 'description', 'amount', 'Credit']);
    expect(result.table.rows).toEqual([{ date: '15/01/2026', description: 'POS', amount: '-5000', Credit: '' }]);
  });

  it('should warn about contested columns', () => {
    const result = normalizeColumns({
      columns: ['Value Date', 'Trans Date', 'Narration', 'Amount'],
      rows: [],
    });

    expect(result.table.columns).toEqual(['Value Date', 'date', 'description', 'amount']);
    expect(result.warnings).toEqual(['Column "Value Date" also matches date; using "Trans Date".']);
  });
});

describe('validateColumns', () => {
  it('should accept a table with the required columns', () => {
    expect(() => validateColumns({ columns: ['date', 'description', 'amount'] })).not.toThrow();
  });

  it('should report missing columns against the source labels', () => {
    const { table, sourceColumns } = normalizeColumns({ columns: ['Date', 'Narration'], rows: [] });

    expect(() => validateColumns(table, sourceColumns)).toThrow(MissingColumnError);
    expect(() => validateColumns(table, sourceColumns)).toThrow(
      'Missing required columns: amount. Found: Date, Narration'
    );
  });
});
