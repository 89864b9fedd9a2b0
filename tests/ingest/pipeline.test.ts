import { describe, it, expect } from 'vitest';
import { buildExtractedPDF, type TextItem } from '@ledgerline/pdf-extract';
import { MissingColumnError, NoValidRowsError, type StagedTable } from '@ledgerline/types';
import {
  dropWarnings,
  ledgerToTable,
  normalizeLedgerTable,
  processStatement,
  runCsvDocument,
  runPdfPages,
  parseCsvContent,
} from '@ledgerline/ingest';

const STATEMENT_CSV = [
  'Account Name: Test Customer',
  'Trans Date,Narration,Debit (₦),Credit (₦),Balance',
  '15/01/2026,POS Purchase Shoprite,"5,000.00",,95000.00',
  '20/01/2026,Salary credit ACME,,"150,000.00",245000.00',
  '03/03/2026,Transfer to Savings,--,,240000.00',
  'bad date,Airtime,100.00,,239900.00',
  '10/04/2026,Card fee,abc,,239000.00',
  '25/04/2026,Transfer from Ada,,"2,500.00",241500.00',
].join('\n');

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

const item = (str: string, x: number, width: number, y: number): TextItem => ({ str, x, y, width, height: 12, page: 1 });

describe('processStatement', () => {
  it('should turn a CSV export into a signed ledger', async () => {
    const result = await processStatement({ fileName: 'statement.csv', data: bytes(STATEMENT_CSV) });

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.source).toEqual({ fileName: 'statement.csv', kind: 'csv' });
    expect(result.method).toBe('csv_import (6 rows)');
    expect(result.ledger).toEqual([
      { date: '2026-01-15', description: 'POS Purchase Shoprite', amount: -5000, type: 'Debit' },
      { date: '2026-01-20', description: 'Salary credit ACME', amount: 150000, type: 'Credit' },
      { date: '2026-03-03', description: 'Transfer to Savings', amount: 0, type: 'Credit' },
      { date: '2026-04-25', description: 'Transfer from Ada', amount: 2500, type: 'Credit' },
    ]);
    expect(result.warnings).toEqual([
      'Dropped 1 row(s) with unparseable dates.',
      'Dropped 1 row(s) with unparseable amounts.',
    ]);
    expect(result.dropped).toEqual({ sanitized: 0, date: 1, amount: 1 });
    expect(result.summary.daysCovered).toBe(100);
    expect(result.summary.monthsCovered).toBe(3);
    expect(result.summary.dateFormatDetected).toBe('dd/MM/yyyy');
    expect(result.summary.totalCredits).toBe(152500);
    expect(result.summary.totalDebits).toBe(5000);
  });

  it('should return a failure for missing columns', async () => {
    const result = await processStatement({
      fileName: 'statement.csv',
      data: bytes('Date,Narration\n15/01/2026,Something'),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.fileName).toBe('statement.csv');
    expect(result.ledger).toBeNull();
    expect(result.message).toBe('Missing required columns: amount. Found: date, narration');
    expect(result.error).toBeInstanceOf(MissingColumnError);
  });

  it('should return a failure when no row survives parsing', async () => {
    const result = await processStatement({
      fileName: 'statement.csv',
      data: bytes('Date,Narration,Amount\nbad,Something,1.00'),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(NoValidRowsError);
    expect(result.message).toBe('No transactions remained after parsing dates and amounts.');
  });

  it('should return a failure for unsupported documents', async () => {
    const result = await processStatement({ fileName: 'statement.xlsx', data: bytes('PK') });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.message).toBe('Unsupported document type: statement.xlsx');
  });

  it('should return a failure for a file that cannot be read', async () => {
    const result = await processStatement('/nonexistent-ledgerline-dir/statement.csv');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.fileName).toBe('statement.csv');
    expect(result.message).toMatch(/^Could not open \/nonexistent-ledgerline-dir\/statement\.csv: /);
  });

  it('should pass the minimum month count through', async () => {
    const result = await processStatement(
      { fileName: 'statement.csv', data: bytes(STATEMENT_CSV) },
      { minMonths: 6 }
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.warnings[2]).toBe(
      'Statement covers only 3 month(s). A minimum of 6 months is recommended for reliable scoring.'
    );
  });
});

describe('runCsvDocument', () => {
  it('should keep a debit column that is blank for the whole period', () => {
    const run = runCsvDocument(
      parseCsvContent('Date,Narration,Debit,Credit,Balance\n15/01/2026,Sale,,500,1500\n15/02/2026,Sale,,700,2200\n')
    );

    expect(run.ledger).toEqual([
      { date: '2026-01-15', description: 'Sale', amount: 500, type: 'Credit' },
      { date: '2026-02-15', description: 'Sale', amount: 700, type: 'Credit' },
    ]);
  });

  it('should label the method with the number of data rows', () => {
    const run = runCsvDocument(parseCsvContent('Date,Narration,Amount\n2026-01-15,POS,-12.50\n2026-04-20,Refund,3'));

    expect(run.method).toBe('csv_import (2 rows)');
    expect(run.ledger).toEqual([
      { date: '2026-01-15', description: 'POS', amount: -12.5, type: 'Debit' },
      { date: '2026-04-20', description: 'Refund', amount: 3, type: 'Credit' },
    ]);
  });
});

describe('runPdfPages', () => {
  it('should prefer the text reading on a tie', () => {
    const pdf = buildExtractedPDF({
      items: [
        item('Date', 50, 30, 700),
        item('Description', 150, 80, 700),
        item('Debit', 350, 30, 700),
        item('Credit', 420, 35, 700),
        item('Balance', 500, 45, 700),
        item('15/01/2026', 50, 55, 680),
        item('Fuel Station', 150, 70, 680),
        item('5,000.00', 345, 45, 680),
        item('20,000.00', 495, 50, 680),
      ],
      totalPages: 1,
      metadata: {},
    });

    const run = runPdfPages(pdf.pages);

    expect(run.method).toBe('text_extraction (1 valid rows)');
    expect(run.ledger).toEqual([{ date: '2026-01-15', description: 'Fuel Station', amount: -5000, type: 'Debit' }]);
    expect(run.warnings).toEqual([
      'Statement covers only 1 month(s). A minimum of 3 months is recommended for reliable scoring.',
    ]);
  });

  it('should use the table reading when it finds more dated rows', () => {
    const run = runPdfPages([
      {
        tables: [
          [
            ['Date', 'Narration', 'Amount'],
            ['15/01/2026', 'POS', '-5,000.00'],
            ['16/01/2026', 'Refund', '200.00'],
          ],
        ],
        lines: [],
      },
    ]);

    expect(run.method).toBe('table_extraction (2 valid rows)');
    expect(run.ledger.map((txn) => txn.amount)).toEqual([-5000, 200]);
  });

  it('should throw when neither reading finds transactions', () => {
    expect(() => runPdfPages([{ tables: [], lines: ['Account statement'] }])).toThrow(
      'Could not extract any valid transactions. Please try a CSV export.'
    );
  });
});

describe('normalizeLedgerTable', () => {
  it('should sort by date and keep the order of same-day rows', () => {
    const build = normalizeLedgerTable({
      columns: ['Date', 'Narration', 'Amount'],
      rows: [
        { Date: '20/01/2026', Narration: 'second', Amount: '1' },
        { Date: '15/01/2026', Narration: 'first', Amount: '2' },
        { Date: '20/01/2026', Narration: 'third', Amount: '3' },
      ],
    });

    expect(build.ledger.map((txn) => txn.description)).toEqual(['first', 'second', 'third']);
    expect(build.dateFormat).toBe('dd/MM/yyyy');
  });

  it('should return the same ledger when run on its own output', () => {
    const first = normalizeLedgerTable(csvTable());
    const second = normalizeLedgerTable(ledgerToTable(first.ledger));

    expect(second.ledger).toEqual(first.ledger);
    expect(second.dateFormat).toBe('yyyy-MM-dd');
    expect(second.warnings).toEqual([]);
  });

  it('should freeze the transactions it returns', () => {
    const build = normalizeLedgerTable(csvTable());

    expect(Object.isFrozen(build.ledger[0])).toBe(true);
  });
});

describe('dropWarnings', () => {
  it('should only mention reasons that dropped rows', () => {
    expect(dropWarnings({ sanitized: 3, date: 0, amount: 0 })).toEqual([]);
    expect(dropWarnings({ sanitized: 0, date: 2, amount: 0 })).toEqual(['Dropped 2 row(s) with unparseable dates.']);
  });
});

function csvTable(): StagedTable {
  return {
    columns: ['trans date', 'narration', 'amount'],
    rows: [
      { 'trans date': '15/01/2026', narration: 'POS Purchase Shoprite', amount: '-5,000.00' },
      { 'trans date': '20/01/2026', narration: 'Salary credit ACME', amount: '150,000.00' },
    ],
  };
}
