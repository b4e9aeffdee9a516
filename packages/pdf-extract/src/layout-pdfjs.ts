/**
 * Layout-aware PDF text extraction using pdfjs-dist.
 *
 * Text items keep their page coordinates so that rows can be rebuilt
 * top to bottom and left to right, the way the statement prints them.
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
  height: number;
  /** Page number (1-indexed) */
  page: number;
}

export interface LayoutExtractedPDF {
  items: TextItem[];
  totalPages: number;
}

interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
}

/**
 * Extract text items from a PDF buffer.
 */
export async function extractTextItemsFromBuffer(buffer: Buffer | Uint8Array): Promise<LayoutExtractedPDF> {
  // Dynamic import for pdfjs-dist (ESM only)
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  // pdfjs detaches the buffer it is given
  const data = new Uint8Array(buffer);

  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
  });

  try {
    const pdfDocument = await loadingTask.promise;
    const items: TextItem[] = [];
    const numPages = pdfDocument.numPages;

    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();

      for (const item of textContent.items) {
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // transform = [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform = item.transform;
        const x = Number(transform[4]) || 0;
        const y = Number(transform[5]) || 0;
        const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
        const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

        items.push({ str, x, y, width, height, page: pageNum });
      }
    }

    return { items, totalPages: numPages };
  } finally {
    await loadingTask.destroy();
  }
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

/**
 * Build lines from text items. Items within Y_TOL of a row's first item
 * share that row; a horizontal gap wider than SPACE_GAP becomes one space.
 *
 * @returns Trimmed, non-empty lines in reading order
 */
export function buildLinesFromItems(items: TextItem[]): string[] {
  const Y_TOL = 2.0;
  const SPACE_GAP = 2.5;

  if (items.length === 0) return [];

  // Top to bottom, then left to right
  const sorted = [...items].sort((a, b) => (b.y - a.y) || (a.x - b.x));

  const rows: TextItem[][] = [];
  for (const item of sorted) {
    const lastRow = rows[rows.length - 1];
    const rowStart = lastRow?.[0];
    if (lastRow !== undefined && rowStart !== undefined && Math.abs(item.y - rowStart.y) <= Y_TOL) {
      lastRow.push(item);
    } else {
      rows.push([item]);
    }
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;

    for (const item of row) {
      if (prevEndX !== null && item.x - prevEndX > SPACE_GAP) {
        out += ' ';
      }
      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.trim();
    if (cleaned) {
      lines.push(cleaned);
    }
  }

  return lines;
}

/**
 * Build lines for a specific page from text items.
 *
 * @param pageNumber - The page number to extract (1-indexed)
 */
export function buildLinesForPage(items: TextItem[], pageNumber: number): string[] {
  return buildLinesFromItems(items.filter(item => item.page === pageNumber));
}
