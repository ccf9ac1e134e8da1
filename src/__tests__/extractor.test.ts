import { describe, it, expect } from 'vitest';
import { extractChapters } from '../extractor.js';
import { ExtractionError } from '../errors.js';
import type { ParsedBook, ParsedSection } from '../types.js';

function book(sections: ParsedSection[]): ParsedBook {
  return { title: 'Harbor Tales', author: 'A. Writer', sections, source: '/books/harbor.epub', type: 'epub' };
}

const BODY = 'The tide came in slowly and the boats rocked against the pier.';

describe('extractChapters', () => {
  it('keeps sections in order and numbers chapters from 0', () => {
    const result = extractChapters(book([
      { title: 'Arrival', html: `<p>${BODY}</p>` },
      { title: 'Departure', text: BODY }
    ]), { minChapterLength: 20 });

    expect(result.title).toBe('Harbor Tales');
    expect(result.author).toBe('A. Writer');
    expect(result.chapters).toEqual([
      { index: 0, title: 'Arrival', text: BODY },
      { index: 1, title: 'Departure', text: BODY }
    ]);
  });

  it('skips empty and short sections and keeps indexes dense', () => {
    const result = extractChapters(book([
      { title: 'Cover', html: '<img src="cover.jpg"/>' },
      { title: 'One', text: BODY },
      { title: 'Dedication', text: 'For Sam.' },
      { title: 'Two', text: BODY }
    ]), { minChapterLength: 20 });

    expect(result.chapters.map(c => [c.index, c.title])).toEqual([[0, 'One'], [1, 'Two']]);
  });

  it('keeps short sections when the threshold is 0', () => {
    const result = extractChapters(book([{ title: 'Dedication', text: 'For Sam.' }]), { minChapterLength: 0 });

    expect(result.chapters).toEqual([{ index: 0, title: 'Dedication', text: 'For Sam.' }]);
  });

  it('takes the title from the first heading, then from the section position', () => {
    const result = extractChapters(book([
      { html: `<h2>The  Lighthouse</h2><p>${BODY}</p>` },
      { text: BODY }
    ]), { minChapterLength: 20 });

    expect(result.chapters.map(c => c.title)).toEqual(['The Lighthouse', 'Chapter 2']);
  });

  it('normalizes whitespace in plain-text sections', () => {
    const result = extractChapters(book([{ title: 'Page 1', text: '  Line one\n\nline   two of the page.  ' }]), {
      minChapterLength: 0
    });

    expect(result.chapters[0]?.text).toBe('Line one line two of the page.');
  });

  it('fails when no section has readable text', () => {
    expect(() => extractChapters(book([{ html: '<p> </p>' }, { text: 'short' }]), { minChapterLength: 20 }))
      .toThrow(ExtractionError);
  });
});
