/**
 * Layout-aware PDF extraction using pdfjs-dist.
 * Extracts text items with positional coordinates for reliable row/column reconstruction.
 */

/**
 * A text item with positional information extracted from PDF.
 */
export interface TextItem {
  /** The text content */
  str: string;
  /** X coordinate (left edge) in PDF units */
  x: number;
  /** Y coordinate in PDF units (origin bottom-left) */
  y: number;
  width: number;
  /** Approximated from font size when the item carries none */
  height: number;
  /** Page number (1-indexed) */
  page: number;
}

/**
 * Result of layout-aware PDF extraction.
 */
export interface LayoutExtractedPDF {
  items: TextItem[];
  totalPages: number;
  metadata: {
    title?: string | undefined;
    author?: string | undefined;
    creationDate?: string | undefined;
  };
}

interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
}

/**
 * Extract text items from an in-memory PDF.
 * Errors from pdfjs (corrupt data, password protection) propagate to the caller.
 */
export async function extractTextItemsFromBuffer(buffer: Uint8Array): Promise<LayoutExtractedPDF> {
  // Dynamic import keeps pdfjs (ESM only) off the load path of CSV-only callers
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  // pdfjs transfers the underlying buffer to its worker, so hand it a copy
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(buffer),
    useSystemFonts: true,
    isEvalSupported: false,
  });

  try {
    const pdfDocument = await loadingTask.promise;
    const items: TextItem[] = [];
    const numPages = pdfDocument.numPages;

    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();
      const contentItems: readonly unknown[] = textContent.items;

      for (const item of contentItems) {
        // Marked-content entries carry no text
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // Transform matrix: [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform = item.transform;
        const x = Number(transform[4]) || 0;
        const y = Number(transform[5]) || 0;

        const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
        const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

        items.push({ str, x, y, width, height, page: pageNum });
      }
      page.cleanup();
    }

    return {
      items,
      totalPages: numPages,
      metadata: await readMetadata(pdfDocument),
    };
  } finally {
    await loadingTask.destroy();
  }
}

async function readMetadata(pdfDocument: { getMetadata(): Promise<{ info: unknown }> }): Promise<LayoutExtractedPDF['metadata']> {
  let info: unknown;
  try {
    ({ info } = await pdfDocument.getMetadata());
  } catch {
    // A broken info dictionary never makes the document unreadable
    return {};
  }
  if (typeof info !== 'object' || info === null) return {};

  const fields = new Map<string, unknown>(Object.entries(info));
  const text = (key: string): string | undefined => {
    const value = fields.get(key);
    return typeof value === 'string' ? value : undefined;
  };

  return {
    title: text('Title'),
    author: text('Author'),
    creationDate: text('CreationDate'),
  };
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}
