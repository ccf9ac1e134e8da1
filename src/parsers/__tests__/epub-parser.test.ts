import * as os from 'os';
import * as path from 'path';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { parseEPUB, readEPUB } from '../epub-parser.js';
import { ExtractionError } from '../../errors.js';

const CONTAINER = `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>
</container>`;

function opf(options: { nav?: boolean; ncx?: boolean }): string {
  return `<?xml version="1.0"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title>Harbor Tales</dc:title>
    <dc:creator>A. Writer</dc:creator>
    <dc:language>en</dc:language>
  </metadata>
  <manifest>
    ${options.nav ? '<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>' : ''}
    ${options.ncx ? '<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>' : ''}
    <item id="cover" href="text/cover.xhtml" media-type="application/xhtml+xml"/>
    <item id="c1" href="text/chapter%201.xhtml" media-type="application/xhtml+xml"/>
    <item id="c2" href="text/chapter2.xhtml" media-type="application/xhtml+xml"/>
  </manifest>
  <spine${options.ncx ? ' toc="ncx"' : ''}>
    <itemref idref="cover" linear="no"/>
    <itemref idref="c1"/>
    <itemref idref="c2"/>
  </spine>
</package>`;
}

const NAV = `<?xml version="1.0"?>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops"><body>
  <nav epub:type="landmarks"><ol><li><a href="text/cover.xhtml">Cover</a></li></ol></nav>
  <nav epub:type="toc"><ol>
    <li><a href="text/chapter%201.xhtml#start">The  Arrival</a></li>
    <li><a href="text/chapter2.xhtml">The Departure</a></li>
  </ol></nav>
</body></html>`;

const NCX = `<?xml version="1.0"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1"><navMap>
  <navPoint id="p1" playOrder="1"><navLabel><text>First Light</text></navLabel><content src="text/chapter%201.xhtml"/></navPoint>
  <navPoint id="p2" playOrder="2"><navLabel><text>Last Light</text></navLabel><content src="text/chapter2.xhtml"/></navPoint>
</navMap></ncx>`;

const chapterDoc = (heading: string, body: string) =>
  `<?xml version="1.0"?><html xmlns="http://www.w3.org/1999/xhtml"><body><h1>${heading}</h1><p>${body}</p></body></html>`;

async function buildEPUB(options: { nav?: boolean; ncx?: boolean; omit?: string } = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip');
  zip.file('META-INF/container.xml', CONTAINER);
  zip.file('OEBPS/content.opf', opf(options));
  if (options.nav) zip.file('OEBPS/nav.xhtml', NAV);
  if (options.ncx) zip.file('OEBPS/toc.ncx', NCX);
  zip.file('OEBPS/text/cover.xhtml', chapterDoc('Cover', 'Cover image.'));
  zip.file('OEBPS/text/chapter 1.xhtml', chapterDoc('One', 'The ferry arrived at dawn.'));
  if (options.omit !== 'OEBPS/text/chapter2.xhtml') {
    zip.file('OEBPS/text/chapter2.xhtml', chapterDoc('Two', 'The ferry left at dusk.'));
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}

describe('readEPUB', () => {
  it('reads metadata and follows the spine, skipping non-linear items', async () => {
    const book = await readEPUB(await buildEPUB({ nav: true }), '/books/harbor.epub');

    expect(book.title).toBe('Harbor Tales');
    expect(book.author).toBe('A. Writer');
    expect(book.language).toBe('en');
    expect(book.type).toBe('epub');
    expect(book.sections).toHaveLength(2);
    expect(book.sections[0]?.html).toContain('The ferry arrived at dawn.');
    expect(book.sections[1]?.html).toContain('The ferry left at dusk.');
  });

  it('takes titles from the EPUB 3 navigation document', async () => {
    const book = await readEPUB(await buildEPUB({ nav: true }), '/books/harbor.epub');

    expect(book.sections.map(s => s.title)).toEqual(['The Arrival', 'The Departure']);
  });

  it('falls back to the NCX table of contents', async () => {
    const book = await readEPUB(await buildEPUB({ ncx: true }), '/books/harbor.epub');

    expect(book.sections.map(s => s.title)).toEqual(['First Light', 'Last Light']);
  });

  it('uses the first heading when there is no table of contents', async () => {
    const book = await readEPUB(await buildEPUB(), '/books/harbor.epub');

    expect(book.sections.map(s => s.title)).toEqual(['One', 'Two']);
  });

  it('skips spine documents missing from the container', async () => {
    const book = await readEPUB(await buildEPUB({ omit: 'OEBPS/text/chapter2.xhtml' }), '/books/harbor.epub');

    expect(book.sections.map(s => s.title)).toEqual(['One']);
  });

  it('rejects a container without a package document', async () => {
    const zip = new JSZip();
    zip.file('mimetype', 'application/epub+zip');

    await expect(readEPUB(await zip.generateAsync({ type: 'nodebuffer' }), 'x.epub'))
      .rejects.toThrow('EPUB is missing META-INF/container.xml');
  });

  it('rejects data that is not a ZIP archive', async () => {
    await expect(readEPUB(Buffer.from('not a zip at all'), 'x.epub')).rejects.toThrow(ExtractionError);
  });
});

describe('parseEPUB', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'epub-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads an EPUB file from disk', async () => {
    const file = path.join(dir, 'harbor.epub');
    await writeFile(file, await buildEPUB({ nav: true }));

    const book = await parseEPUB(file);

    expect(book.source).toBe(file);
    expect(book.sections).toHaveLength(2);
  });

  it('rejects a file that is not a ZIP container', async () => {
    const file = path.join(dir, 'fake.epub');
    await writeFile(file, 'plain text');

    await expect(parseEPUB(file)).rejects.toThrow('File is not a valid EPUB (not a ZIP container)');
  });

  it('reports a missing file', async () => {
    await expect(parseEPUB(path.join(dir, 'missing.epub'))).rejects.toThrow('EPUB file not readable');
  });
});
