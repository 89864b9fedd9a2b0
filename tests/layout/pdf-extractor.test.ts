import { describe, it, expect } from 'vitest';
import { extractPDF } from '@ledgerline/pdf-extract';
import { DocumentOpenError } from '@ledgerline/types';

describe('extractPDF', () => {
  it('should report an unreadable file as an open failure', async () => {
    const pending = extractPDF('/nonexistent-ledgerline-dir/statement.pdf');

    await expect(pending).rejects.toBeInstanceOf(DocumentOpenError);
    await expect(pending).rejects.toThrow(/^Could not open PDF: /);
  });
});
