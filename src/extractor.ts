import type { Book, Chapter, ParsedBook } from './types.js';
import { cleanHTMLContent, findHeading } from './cleaner.js';
import { normalizeWhitespace } from './chunker.js';
import { ExtractionError } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger('extractor');

export interface ExtractOptions {
  /** Sections with less text than this are treated as front matter and skipped. */
  minChapterLength: number;
}

/**
 * Turns a parsed book into its ordered chapter list. Sections come in reading
 * order; short or empty ones are skipped with a warning and the remaining
 * chapters are numbered densely from 0.
 *
 * @throws ExtractionError when no section yields a chapter
 */
export function extractChapters(parsed: ParsedBook, options: ExtractOptions): Book {
  const chapters: Chapter[] = [];

  parsed.sections.forEach((section, position) => {
    const text = section.text !== undefined
      ? normalizeWhitespace(section.text)
      : cleanHTMLContent(section.html ?? '');

    if (text.length === 0 || text.length < options.minChapterLength) {
      logger.warn(`Skipping section ${position + 1}: ${text.length} characters of text`, {
        title: section.title ?? null,
        minChapterLength: options.minChapterLength
      });
      return;
    }

    const title = normalizeWhitespace(section.title ?? '')
      || (section.html ? findHeading(section.html) : undefined)
      || `Chapter ${position + 1}`;

    chapters.push({ index: chapters.length, title, text });
  });

  if (chapters.length === 0) {
    throw new ExtractionError(
      `No readable chapters found in ${parsed.source} (${parsed.sections.length} section(s) inspected)`
    );
  }

  logger.info(`Extracted ${chapters.length} chapter(s) from ${parsed.sections.length} section(s)`);

  return {
    title: parsed.title,
    author: parsed.author,
    language: parsed.language,
    chapters
  };
}
