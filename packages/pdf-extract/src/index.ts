// PDF line extraction
export {
  extractPdfLines,
  extractPdfLinesFromBuffer,
} from './pdf-extractor.js';

export type { ExtractedPage, ExtractedDocument } from './pdf-extractor.js';

// Layout-aware extraction using pdfjs-dist
export {
  extractTextItemsFromBuffer,
  buildLinesFromItems,
  buildLinesForPage,
} from './layout-pdfjs.js';

export type { TextItem, LayoutExtractedPDF } from './layout-pdfjs.js';
