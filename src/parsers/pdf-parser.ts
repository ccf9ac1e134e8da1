import * as path from 'path';
import { readFile } from 'fs/promises';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { ParsedBook, ParsedSection } from '../types.js';
import { ExtractionError, getErrorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import { sanitizeInputPath, isPDFFile as validatePDFMagicBytes } from '../validators/path-validator.js';

const logger = getLogger('pdf-parser');

interface PageRef {
  num: number;
  gen: number;
}

interface OutlineEntry {
  title: string;
  dest: string | unknown[] | null;
}

/** The slice of a pdf.js document the chapter detection needs. */
export interface PdfDocumentLike {
  numPages: number;
  getOutline(): Promise<OutlineEntry[] | null>;
  getPage(pageNumber: number): Promise<{ getTextContent(): Promise<{ items: object[] }> }>;
  getPageIndex(ref: PageRef): Promise<number>;
  getDestination(id: string): Promise<unknown[] | null>;
}

export async function parsePDF(pdfPath: string, pagesPerChapter: number = 10): Promise<ParsedBook> {
  // Validate and sanitize path
  const sanitizedPath = sanitizeInputPath(pdfPath, ['.pdf']);

  let dataBuffer: Buffer;
  try {
    dataBuffer = await readFile(sanitizedPath);
  } catch (error) {
    throw new ExtractionError(`PDF file not readable: ${sanitizedPath}`, { cause: error });
  }

  // Verify it's actually a PDF by magic bytes
  const uint8Array = new Uint8Array(dataBuffer);
  if (!validatePDFMagicBytes(uint8Array)) {
    throw new ExtractionError('File is not a valid PDF');
  }

  const loadingTask = pdfjsLib.getDocument({ data: uint8Array });
  const pdfDocument = await loadingTask.promise;

  try {
    const metadata = await pdfDocument.getMetadata().catch((error: unknown) => {
      logger.debug(`No PDF metadata: ${getErrorMessage(error)}`);
      return null;
    });
    const info = metadata?.info;
    const title = readInfoString(info, 'Title') ?? path.basename(sanitizedPath, '.pdf');
    const author = readInfoString(info, 'Author');

    return {
      title,
      author,
      sections: await detectPDFSections(pdfDocument, pagesPerChapter),
      source: sanitizedPath,
      type: 'pdf'
    };
  } finally {
    await pdfDocument.destroy();
  }
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (typeof info !== 'object' || info === null || !(key in info)) return undefined;
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * One section per top-level outline entry, spanning the pages up to the next
 * entry. Documents without an outline are cut into fixed page groups.
 */
export async function detectPDFSections(pdfDocument: PdfDocumentLike, pagesPerChapter: number): Promise<ParsedSection[]> {
  const sections: ParsedSection[] = [];
  const numPages = pdfDocument.numPages;
  const outline = await pdfDocument.getOutline();

  if (outline && outline.length > 0) {
    for (let i = 0; i < outline.length; i++) {
      const item = outline[i];
      const nextItem = outline[i + 1];
      if (!item?.title) continue;

      const startPage = item.dest ? await getPageNumber(pdfDocument, item.dest) : 1;
      const endPage = nextItem?.dest ? Math.max(startPage, (await getPageNumber(pdfDocument, nextItem.dest)) - 1) : numPages;

      sections.push({
        title: item.title,
        text: await extractTextFromPages(pdfDocument, startPage, endPage)
      });
    }
  }

  if (sections.length === 0) {
    for (let i = 0; i < numPages; i += pagesPerChapter) {
      const startPage = i + 1;
      const endPage = Math.min(i + pagesPerChapter, numPages);

      sections.push({
        title: `Pages ${startPage}-${endPage}`,
        text: await extractTextFromPages(pdfDocument, startPage, endPage)
      });
    }
  }

  return sections;
}

async function getPageNumber(pdfDocument: PdfDocumentLike, dest: string | unknown[]): Promise<number> {
  try {
    let explicit: unknown[] | null = Array.isArray(dest) ? dest : null;

    if (typeof dest === 'string') {
      const match = dest.match(/^p(\d+)$/);
      if (match?.[1]) {
        return Number.parseInt(match[1], 10);
      }
      explicit = await pdfDocument.getDestination(dest);
    }

    const pageRef = explicit?.[0];
    if (typeof pageRef === 'number') return pageRef + 1;
    if (isPageRef(pageRef)) {
      return (await pdfDocument.getPageIndex({ num: pageRef.num, gen: pageRef.gen })) + 1;
    }

    return 1;
  } catch (error) {
    logger.warn(`Could not resolve outline destination, using page 1: ${getErrorMessage(error)}`);
    return 1;
  }
}

function isPageRef(value: unknown): value is PageRef {
  return typeof value === 'object' && value !== null
    && 'num' in value && typeof value.num === 'number'
    && 'gen' in value && typeof value.gen === 'number';
}

async function extractTextFromPages(pdfDocument: PdfDocumentLike, startPage: number, endPage: number): Promise<string> {
  const textParts: string[] = [];

  for (let pageNum = startPage; pageNum <= endPage; pageNum++) {
    const page = await pdfDocument.getPage(pageNum);
    const textContent = await page.getTextContent();

    const pageText = textContent.items
      .map(item => ('str' in item && typeof item.str === 'string' ? item.str : ''))
      .join(' ');
    textParts.push(pageText);
  }

  return textParts.join(' ').replace(/\s+/g, ' ').trim();
}
