import * as path from 'path';
import { stat } from 'fs/promises';
import type { ParsedBook } from '../types.js';
import { parseEPUB } from './epub-parser.js';
import { parseHTML } from './html-parser.js';
import { parsePDF } from './pdf-parser.js';

export interface ParseOptions {
  pagesPerChapter?: number;
}

export async function parseInput(input: string, options: ParseOptions = {}): Promise<ParsedBook> {
  if (isURL(input)) {
    return await parseHTML(input);
  }

  if (!(await isFile(input))) {
    throw new Error(`Invalid input: ${input}. Must be a URL or an .epub, .html or .pdf file path.`);
  }

  switch (path.extname(input).toLowerCase()) {
    case '.epub':
      return await parseEPUB(input);
    case '.pdf':
      return await parsePDF(input, options.pagesPerChapter);
    case '.html':
    case '.htm':
    case '.xhtml':
      return await parseHTML(input);
    default:
      throw new Error(`Invalid input: ${input}. Must be a URL or an .epub, .html or .pdf file path.`);
  }
}

export function isURL(input: string): boolean {
  try {
    const url = new URL(input);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

async function isFile(input: string): Promise<boolean> {
  const stats = await stat(input).catch(() => null);
  return stats?.isFile() ?? false;
}
