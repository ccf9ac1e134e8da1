import * as path from 'path';
import { readFile } from 'fs/promises';
import * as cheerio from 'cheerio';
import JSZip from 'jszip';
import type { ParsedBook, ParsedSection } from '../types.js';
import { ExtractionError, getErrorMessage } from '../errors.js';
import { findHeading } from '../cleaner.js';
import { getLogger } from '../logger.js';
import { isZipFile, sanitizeInputPath } from '../validators/path-validator.js';

const logger = getLogger('epub-parser');

interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
  properties: string[];
}

export async function parseEPUB(epubPath: string): Promise<ParsedBook> {
  const sanitizedPath = sanitizeInputPath(epubPath, ['.epub']);

  let data: Buffer;
  try {
    data = await readFile(sanitizedPath);
  } catch (error) {
    throw new ExtractionError(`EPUB file not readable: ${sanitizedPath}`, { cause: error });
  }

  if (!isZipFile(data)) {
    throw new ExtractionError('File is not a valid EPUB (not a ZIP container)');
  }

  return readEPUB(data, sanitizedPath);
}

/**
 * Reads an EPUB container: the OPF package gives metadata and the spine
 * (reading order); chapter titles come from the EPUB 3 navigation document
 * or the EPUB 2 NCX.
 */
export async function readEPUB(data: Uint8Array, source: string): Promise<ParsedBook> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new ExtractionError(`Cannot open EPUB container: ${getErrorMessage(error)}`, { cause: error });
  }

  const container = await readText(zip, 'META-INF/container.xml');
  const opfPath = cheerio.load(container, { xml: true })('rootfile').first().attr('full-path');
  if (!opfPath) {
    throw new ExtractionError('EPUB container.xml does not name a package document');
  }

  const $opf = cheerio.load(await readText(zip, opfPath), { xml: true });
  const opfDir = path.posix.dirname(opfPath);

  const manifest = new Map<string, ManifestItem>();
  $opf('manifest > item').each((_, el) => {
    const $item = $opf(el);
    const id = $item.attr('id');
    const href = $item.attr('href');
    if (!id || !href) return;
    manifest.set(id, {
      id,
      href: resolveHref(opfDir, href),
      mediaType: $item.attr('media-type') ?? '',
      properties: ($item.attr('properties') ?? '').split(/\s+/).filter(Boolean)
    });
  });

  const titles = await readTocTitles(zip, $opf, manifest);
  const sections: ParsedSection[] = [];

  const spine = $opf('spine > itemref').toArray();
  for (const itemref of spine) {
    const $itemref = $opf(itemref);
    if ($itemref.attr('linear') === 'no') continue;

    const idref = $itemref.attr('idref') ?? '';
    const item = manifest.get(idref);
    if (!item) {
      logger.warn(`Spine entry "${idref}" has no manifest item, skipping`);
      continue;
    }

    const file = zip.file(item.href);
    if (!file) {
      logger.warn(`Spine document ${item.href} is missing from the container, skipping`);
      continue;
    }

    const html = await file.async('string');
    sections.push({ title: titles.get(item.href) ?? findHeading(html), html });
  }

  const metaText = (selector: string): string | undefined => {
    const value = $opf(selector).first().text().trim();
    return value.length > 0 ? value : undefined;
  };

  return {
    title: metaText('metadata > dc\\:title') ?? path.basename(source, path.extname(source)),
    author: metaText('metadata > dc\\:creator'),
    language: metaText('metadata > dc\\:language'),
    sections,
    source,
    type: 'epub'
  };
}

async function readText(zip: JSZip, entry: string): Promise<string> {
  const file = zip.file(entry);
  if (!file) {
    throw new ExtractionError(`EPUB is missing ${entry}`);
  }
  return file.async('string');
}

function resolveHref(baseDir: string, href: string): string {
  const [withoutFragment = ''] = href.split('#');
  let decoded = withoutFragment;
  try {
    decoded = decodeURIComponent(withoutFragment);
  } catch (error) {
    logger.debug(`Keeping undecodable href as written: ${href}`, { error: getErrorMessage(error) });
  }
  return path.posix.normalize(path.posix.join(baseDir, decoded));
}

/** Maps content document paths to their first table-of-contents label. */
async function readTocTitles(
  zip: JSZip,
  $opf: cheerio.CheerioAPI,
  manifest: Map<string, ManifestItem>
): Promise<Map<string, string>> {
  const titles = new Map<string, string>();
  const add = (dir: string, href: string | undefined, label: string) => {
    const title = label.replace(/\s+/g, ' ').trim();
    if (!href || !title) return;
    const target = resolveHref(dir, href);
    if (!titles.has(target)) titles.set(target, title);
  };

  const nav = [...manifest.values()].find(item => item.properties.includes('nav'));
  if (nav && zip.file(nav.href)) {
    const $ = cheerio.load(await readText(zip, nav.href), { xml: true });
    const navDir = path.posix.dirname(nav.href);
    const tocNav = $('nav').filter((_, el) => ($(el).attr('epub:type') ?? '').split(/\s+/).includes('toc')).first();
    const root = tocNav.length > 0 ? tocNav : $('nav').first();
    root.find('a').each((_, a) => add(navDir, $(a).attr('href'), $(a).text()));
  }

  if (titles.size === 0) {
    const ncxId = $opf('spine').attr('toc');
    const ncx = (ncxId ? manifest.get(ncxId) : undefined)
      ?? [...manifest.values()].find(item => item.mediaType === 'application/x-dtbncx+xml');
    if (ncx && zip.file(ncx.href)) {
      const $ = cheerio.load(await readText(zip, ncx.href), { xml: true });
      const ncxDir = path.posix.dirname(ncx.href);
      // NCX element names are camel-cased; match them exactly
      const byTag = (tag: string) => (_: number, el: { tagName: string }) => el.tagName === tag;
      $('*').filter(byTag('navPoint')).each((_, point) => {
        const $point = $(point);
        const src = $point.children().filter(byTag('content')).attr('src');
        add(ncxDir, src, $point.children().filter(byTag('navLabel')).first().text());
      });
    }
  }

  return titles;
}
