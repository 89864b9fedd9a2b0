/**
 * Document-level failures. Each one aborts the pipeline for a single
 * document; row-level problems are counted instead of thrown.
 */

export type StatementErrorCode = 'DOCUMENT_OPEN' | 'MISSING_COLUMN' | 'NO_VALID_ROWS';

export abstract class StatementError extends Error {
  abstract readonly code: StatementErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source could not be opened or decoded (missing, corrupt, encrypted, unsupported). */
export class DocumentOpenError extends StatementError {
  readonly code = 'DOCUMENT_OPEN';
}

/** Required canonical columns are absent after header normalization. */
export class MissingColumnError extends StatementError {
  readonly code = 'MISSING_COLUMN';
  readonly missing: readonly string[];
  readonly found: readonly string[];

  constructor(missing: readonly string[], found: readonly string[]) {
    super(`Missing required columns: ${missing.join(', ')}. Found: ${found.join(', ')}`);
    this.missing = missing;
    this.found = found;
  }
}

/** Neither extraction strategy produced a row with a valid date. */
export class NoValidRowsError extends StatementError {
  readonly code = 'NO_VALID_ROWS';

  constructor(message = 'Could not extract any valid transactions. Please try a CSV export.') {
    super(message);
  }
}

export function isStatementError(error: unknown): error is StatementError {
  return error instanceof StatementError;
}
