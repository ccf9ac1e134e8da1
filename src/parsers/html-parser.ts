import * as path from 'path';
import { readFile } from 'fs/promises';
import * as cheerio from 'cheerio';
import type { ParsedBook, ParsedSection } from '../types.js';
import { sanitizeInputPath } from '../validators/path-validator.js';

const CHAPTER_HEADING = /chapter|section|prologue|epilogue|part/i;
const MIN_HEADING_CHAPTERS = 2;

export async function parseHTML(input: string): Promise<ParsedBook> {
  const isRemote = /^https?:\/\//i.test(input);
  const source = isRemote ? input : sanitizeInputPath(input, ['.html', '.htm', '.xhtml']);
  const html = isRemote ? await fetchHTML(input) : await readFile(source, 'utf8');

  return {
    ...detectHTMLChapters(html, fallbackTitle(source, isRemote)),
    source,
    type: 'html'
  };
}

function fallbackTitle(source: string, isRemote: boolean): string {
  if (!isRemote) return path.basename(source, path.extname(source));
  const { hostname, pathname } = new URL(source);
  const last = pathname.split('/').filter(Boolean).pop();
  return last ?? hostname;
}

async function fetchHTML(url: string): Promise<string> {
  // Validate URL and block SSRF
  const parsedUrl = new URL(url);

  // Whitelist protocols
  if (!['http:', 'https:'].includes(parsedUrl.protocol)) {
    throw new Error(`Unsupported protocol: ${parsedUrl.protocol}`);
  }

  // Block private IP ranges and internal hosts
  const hostname = parsedUrl.hostname;
  const blockedPatterns = [
    /^localhost$/i,
    /^127\./,
    /^10\./,
    /^172\.(1[6-9]|2[0-9]|3[0-1])\./,
    /^192\.168\./,
    /^169\.254\./,  // AWS metadata
    /^0\./,
    /^\[::/,        // IPv6 localhost
    /^fc00:/,       // IPv6 private
  ];

  if (blockedPatterns.some(pattern => pattern.test(hostname))) {
    throw new Error(`Access to private/internal hosts not allowed: ${hostname}`);
  }

  // Add timeout and size limit
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), 30000);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      redirect: 'manual'  // Don't follow redirects automatically
    });

    if (!response.ok) {
      throw new Error(`Failed to fetch ${url}: ${response.statusText}`);
    }

    // Check content length
    const contentLength = response.headers.get('content-length');
    if (contentLength && Number.parseInt(contentLength, 10) > 50 * 1024 * 1024) {
      throw new Error('Content too large (max 50MB)');
    }

    return await response.text();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Splits a single HTML page into chapters at h1/h2 headings that look like
 * chapter titles. Pages with too few such headings become one section.
 */
export function detectHTMLChapters(html: string, fallback: string): Pick<ParsedBook, 'title' | 'author' | 'sections'> {
  const $ = cheerio.load(html);

  const title = $('title').first().text().trim() || $('h1').first().text().trim() || fallback;
  const author = $('meta[name="author"]').attr('content')?.trim() || undefined;

  $('script, style, nav, header, footer, .ad, [class*="ad-"]').remove();
  $('[class*="toc"], [class*="table-of-contents"], [id*="toc"]').remove();
  $('[class*="sidebar"], [class*="menu"]').remove();

  const sections: ParsedSection[] = [];

  $('h1, h2').each((_, el) => {
    const $el = $(el);
    const text = $el.text();

    if (CHAPTER_HEADING.test(text) || $el.hasClass('chapter')) {
      let content = '';
      $el.nextUntil('h1, h2').each((_, nextEl) => {
        content += $.html(nextEl);
      });
      sections.push({ title: text.replace(/\s+/g, ' ').trim(), html: content });
    }
  });

  if (sections.length < MIN_HEADING_CHAPTERS) {
    const mainContent = $('main, article, .content').first();
    const content = mainContent.length ? $.html(mainContent) : $('body').html() || '';

    return { title, author, sections: [{ title, html: content }] };
  }

  return { title, author, sections };
}
