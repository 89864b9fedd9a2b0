import { describe, it, expect } from 'vitest';
import {
  DocumentOpenError,
  MissingColumnError,
  NoValidRowsError,
  StatementError,
  isStatementError,
} from '@ledgerline/types';

describe('StatementError taxonomy', () => {
  it('should list missing and found columns in the message', () => {
    const error = new MissingColumnError(['amount'], ['date', 'narration']);

    expect(error.message).toBe('Missing required columns: amount. Found: date, narration');
    expect(error.code).toBe('MISSING_COLUMN');
    expect(error.name).toBe('MissingColumnError');
    expect(error.missing).toEqual(['amount']);
    expect(error.found).toEqual(['date', 'narration']);
  });

  it('should suggest a CSV export by default when no rows are found', () => {
    const error = new NoValidRowsError();

    expect(error.message).toBe('Could not extract any valid transactions. Please try a CSV export.');
    expect(error.code).toBe('NO_VALID_ROWS');
  });

  it('should keep the cause of an open failure', () => {
    const cause = new Error('ENOENT');
    const error = new DocumentOpenError('Could not open PDF: ENOENT', { cause });

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('DOCUMENT_OPEN');
    expect(error).toBeInstanceOf(StatementError);
  });

  it('should tell statement errors apart from other errors', () => {
    expect(isStatementError(new NoValidRowsError())).toBe(true);
    expect(isStatementError(new Error('boom'))).toBe(false);
    expect(isStatementError('boom')).toBe(false);
  });
});
