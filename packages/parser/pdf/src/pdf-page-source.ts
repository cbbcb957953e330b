import type { PageBlock, PageSourcePort } from '@cubesheet/core';
import { InvalidFileFormatError, ParseError } from '@cubesheet/core';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

interface PdfTextItem {
  readonly str?: string;
  readonly transform?: readonly number[];
  readonly width?: number;
}

interface PdfTextContent {
  readonly items: readonly PdfTextItem[];
}

interface PdfPage {
  getTextContent(): Promise<PdfTextContent>;
  cleanup?(): void;
}

interface PdfDocument {
  readonly numPages: number;
  getPage(pageNumber: number): Promise<PdfPage>;
  cleanup?(): void;
  destroy?(): Promise<void>;
}

interface PdfLoadingTask {
  readonly promise: Promise<PdfDocument>;
  destroy?(): void;
}

type LoadPdfFn = (data: Uint8Array) => PdfLoadingTask;

interface PositionedText {
  readonly str: string;
  readonly x: number;
  readonly y: number;
  readonly width: number;
}

const MAX_PAGE_COUNT = 5000;
/** Vertical distance, in PDF units, within which fragments share a line */
const LINE_TOLERANCE = 3;
/** Horizontal gap above which adjacent fragments are separated by a space */
const WORD_GAP = 3;

export class PdfPageSource implements PageSourcePort {
  readonly id = 'pdf';
  readonly extensions = ['.pdf'];

  constructor(private readonly loadPdf: LoadPdfFn = loadPdfDocument) {}

  async readPages(data: ArrayBuffer): Promise<PageBlock[]> {
    const document = await this.loadDocument(data);

    try {
      if (document.numPages <= 0) {
        throw new ParseError('PDF contains no pages');
      }
      if (document.numPages > MAX_PAGE_COUNT) {
        throw new ParseError(`PDF contains too many pages (${document.numPages})`);
      }

      const pages: PageBlock[] = [];
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        pages.push({ index: pageNumber - 1, text: await this.readPageText(document, pageNumber) });
      }
      return pages;
    } finally {
      await this.cleanupDocument(document);
    }
  }

  private async loadDocument(data: ArrayBuffer): Promise<PdfDocument> {
    let task: PdfLoadingTask;
    try {
      task = this.loadPdf(new Uint8Array(data));
    } catch (error) {
      throw new InvalidFileFormatError(`Failed to open PDF: ${toErrorMessage(error)}`);
    }

    try {
      return await task.promise;
    } catch (error) {
      task.destroy?.();
      throw new InvalidFileFormatError(`Failed to open PDF: ${toErrorMessage(error)}`);
    }
  }

  /** A page whose text cannot be read yields an empty block so later pages still convert. */
  private async readPageText(document: PdfDocument, pageNumber: number): Promise<string> {
    try {
      const page = await document.getPage(pageNumber);
      try {
        const content = await page.getTextContent();
        return joinTextItems(content.items);
      } finally {
        page.cleanup?.();
      }
    } catch (error) {
      console.warn(
        `[Cubesheet:Parser] Failed to read text of page ${pageNumber}: ${toErrorMessage(error)}`,
      );
      return '';
    }
  }

  private async cleanupDocument(document: PdfDocument): Promise<void> {
    try {
      document.cleanup?.();
    } catch {
      // Ignore cleanup errors
    }

    try {
      await document.destroy?.();
    } catch {
      // Ignore destroy errors
    }
  }
}

/**
 * Rebuilds reading-order lines from positioned fragments: top to bottom,
 * then left to right, with a space wherever the horizontal gap is wide.
 */
export function joinTextItems(items: readonly PdfTextItem[]): string {
  const fragments = items.flatMap(toPositionedText);
  if (fragments.length === 0) return '';

  const sorted = [...fragments].sort((a, b) => {
    const yDiff = b.y - a.y;
    if (Math.abs(yDiff) > LINE_TOLERANCE) return yDiff;
    return a.x - b.x;
  });

  const lines: PositionedText[][] = [];
  let current: PositionedText[] = [];
  let currentY = sorted[0].y;

  for (const fragment of sorted) {
    if (Math.abs(fragment.y - currentY) > LINE_TOLERANCE && current.length > 0) {
      lines.push(current);
      current = [];
    }
    current.push(fragment);
    currentY = fragment.y;
  }
  lines.push(current);

  return lines.map(buildLine).join('\n');
}

function buildLine(fragments: readonly PositionedText[]): string {
  const ordered = [...fragments].sort((a, b) => a.x - b.x);
  let text = '';
  let lastEnd = 0;

  for (const fragment of ordered) {
    if (text.length > 0 && fragment.x - lastEnd > WORD_GAP && !/\s$/.test(text)) {
      text += ' ';
    }
    text += fragment.str;
    lastEnd = fragment.x + fragment.width;
  }

  return text.trimEnd();
}

function toPositionedText(item: PdfTextItem): PositionedText[] {
  const { str, transform } = item;
  if (str === undefined || str.length === 0 || transform === undefined || transform.length < 6) {
    return [];
  }
  return [{ str, x: transform[4], y: transform[5], width: item.width ?? 0 }];
}

function loadPdfDocument(data: Uint8Array): PdfLoadingTask {
  return getDocument({
    data,
    useWorkerFetch: false,
    isEvalSupported: false,
  }) as PdfLoadingTask;
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
