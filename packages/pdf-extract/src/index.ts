// PDF extraction
export { extractPDF, extractPDFFromBuffer, buildExtractedPDF } from './pdf-extractor.js';
export type { ExtractedPage, ExtractedPDF } from './pdf-extractor.js';

// Layout-aware extraction using pdfjs-dist
export { extractTextItemsFromBuffer } from './layout-pdfjs.js';
export type { TextItem, LayoutExtractedPDF } from './layout-pdfjs.js';

// Layout utilities (rows, columns, tables)
export * from './layout/index.js';
