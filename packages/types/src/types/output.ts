/**
 * Output document shape. Mirrors the JSON schema in
 * validation/ajv-validator.ts field for field.
 */
import type { CanonicalTransaction, DocumentKind, StatementSummary } from '../schemas/ledger.js';

export interface LedgerOutput {
  schemaVersion: '1.0.0';
  source: {
    fileName: string;
    fileType: DocumentKind;
  };
  method: string;
  ledger: CanonicalTransaction[];
  summary: StatementSummary;
  metadata: {
    parser: {
      name: string;
      version: string;
    };
    parsedAt: string;
    warnings: string[];
  };
}
