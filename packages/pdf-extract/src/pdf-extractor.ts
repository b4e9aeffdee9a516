import { readFile } from 'fs/promises';
import { buildLinesForPage, extractTextItemsFromBuffer } from './layout-pdfjs.js';

export interface ExtractedPage {
  pageNumber: number;
  lines: string[];
}

export interface ExtractedDocument {
  pages: ExtractedPage[];
  /** Every page's lines, in page order */
  lines: string[];
  totalPages: number;
}

/**
 * Extract the text lines of a statement PDF held in memory.
 */
export async function extractPdfLinesFromBuffer(buffer: Buffer | Uint8Array): Promise<ExtractedDocument> {
  const layoutResult = await extractTextItemsFromBuffer(buffer);

  const pages: ExtractedPage[] = [];
  for (let pageNum = 1; pageNum <= layoutResult.totalPages; pageNum++) {
    pages.push({
      pageNumber: pageNum,
      lines: buildLinesForPage(layoutResult.items, pageNum),
    });
  }

  return {
    pages,
    lines: pages.flatMap(page => page.lines),
    totalPages: layoutResult.totalPages,
  };
}

/**
 * Extract the text lines of a statement PDF on disk.
 */
export async function extractPdfLines(filePath: string): Promise<ExtractedDocument> {
  const dataBuffer = await readFile(filePath);
  return extractPdfLinesFromBuffer(dataBuffer);
}
