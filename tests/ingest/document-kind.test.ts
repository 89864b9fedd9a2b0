import { describe, it, expect } from 'vitest';
import { detectDocumentKind, hasPdfMagic } from '@ledgerline/ingest';
import { DocumentOpenError } from '@ledgerline/types';

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe('detectDocumentKind', () => {
  it('should go by extension first', () => {
    expect(detectDocumentKind('statement.PDF')).toBe('pdf');
    expect(detectDocumentKind('statement.csv')).toBe('csv');
    expect(detectDocumentKind('export.txt')).toBe('csv');
    expect(detectDocumentKind('statement.csv', bytes('%PDF-1.7'))).toBe('csv');
  });

  it('should recognise a PDF signature without an extension', () => {
    expect(detectDocumentKind('upload', bytes('%PDF-1.7\n'))).toBe('pdf');
  });

  it('should reject anything else', () => {
    expect(() => detectDocumentKind('upload.bin', bytes('hello'))).toThrow(DocumentOpenError);
    expect(() => detectDocumentKind('statement.xlsx')).toThrow('Unsupported document type: statement.xlsx');
  });
});

describe('hasPdfMagic', () => {
  it('should check the leading bytes', () => {
    expect(hasPdfMagic(bytes('%PDF-1.4 rest'))).toBe(true);
    expect(hasPdfMagic(bytes('%PD'))).toBe(false);
    expect(hasPdfMagic(new Uint8Array())).toBe(false);
  });
});
