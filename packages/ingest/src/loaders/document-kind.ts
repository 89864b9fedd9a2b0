import { extname } from 'path';
import { DocumentOpenError, type DocumentKind } from '@ledgerline/types';

const EXTENSION_KINDS: Readonly<Record<string, DocumentKind>> = Object.freeze({
  '.pdf': 'pdf',
  '.csv': 'csv',
  '.txt': 'csv',
});

const PDF_MAGIC = '%PDF-';

export function hasPdfMagic(head: Uint8Array): boolean {
  return Buffer.from(head.subarray(0, PDF_MAGIC.length)).toString('ascii') === PDF_MAGIC;
}

/**
 * Decide how to load a document: by extension first, then by the `%PDF-`
 * signature when the extension says nothing.
 *
 * @throws DocumentOpenError for anything that is neither PDF nor CSV
 */
export function detectDocumentKind(fileName: string, head?: Uint8Array): DocumentKind {
  const byExtension = EXTENSION_KINDS[extname(fileName).toLowerCase()];
  if (byExtension !== undefined) return byExtension;
  if (head !== undefined && hasPdfMagic(head)) return 'pdf';
  throw new DocumentOpenError(`Unsupported document type: ${fileName}`);
}
