import { readFile } from 'fs/promises';
import { DocumentOpenError, type RawRow } from '@ledgerline/types';
import { extractTextItemsFromBuffer, type LayoutExtractedPDF } from './layout-pdfjs.js';
import { buildLinesForPage, groupByRows, getRowsForPage } from './layout/rows.js';
import { detectPageTables } from './layout/tables.js';
import type { ColumnMapping } from './layout/columns.js';

export interface ExtractedPage {
  pageNumber: number;
  text: string;
  /** Flowed text, one entry per visual line; tabs separate distant columns. */
  lines: string[];
  /** Reconstructed tables, each a list of rows of cells. */
  tables: RawRow[][];
}

export interface ExtractedPDF {
  pages: ExtractedPage[];
  fullText: string;
  totalPages: number;
  metadata: LayoutExtractedPDF['metadata'];
}

/** Items this close vertically are treated as one table row. */
const TABLE_ROW_Y_TOLERANCE = 3.0;

/**
 * Open a PDF from disk and build per-page flowed text and table structures.
 *
 * @throws DocumentOpenError when the file cannot be read or is not a usable PDF
 */
export async function extractPDF(filePath: string): Promise<ExtractedPDF> {
  let dataBuffer: Buffer;
  try {
    dataBuffer = await readFile(filePath);
  } catch (error) {
    throw new DocumentOpenError(`Could not open PDF: ${describe(error)}`, { cause: error });
  }
  return extractPDFFromBuffer(new Uint8Array(dataBuffer));
}

/**
 * @throws DocumentOpenError when pdfjs rejects the data (corrupt, encrypted, not a PDF)
 */
export async function extractPDFFromBuffer(data: Uint8Array): Promise<ExtractedPDF> {
  let layout: LayoutExtractedPDF;
  try {
    layout = await extractTextItemsFromBuffer(data);
  } catch (error) {
    throw new DocumentOpenError(`Could not open PDF: ${describe(error)}`, { cause: error });
  }
  return buildExtractedPDF(layout);
}

/**
 * Assemble pages from positioned text items. Pure; separated from the pdfjs
 * call so layouts can be built by hand.
 */
export function buildExtractedPDF(layout: LayoutExtractedPDF): ExtractedPDF {
  const rows = groupByRows(layout.items, TABLE_ROW_Y_TOLERANCE);
  const pages: ExtractedPage[] = [];
  let carry: ColumnMapping | null = null;

  for (let pageNum = 1; pageNum <= layout.totalPages; pageNum++) {
    const lines = buildLinesForPage(layout.items, pageNum);
    const pageTables = detectPageTables(getRowsForPage(rows, pageNum), carry);
    carry = pageTables.carry;

    pages.push({
      pageNumber: pageNum,
      text: lines.join('\n'),
      lines,
      tables: pageTables.tables,
    });
  }

  return {
    pages,
    fullText: pages.map((p) => p.text).join('\n\n'),
    totalPages: layout.totalPages,
    metadata: layout.metadata,
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
