import * as cheerio from 'cheerio';

const BLOCK_TAGS = 'p, div, section, article, blockquote, li, tr, td, th, h1, h2, h3, h4, h5, h6, pre, dt, dd, figcaption';

/**
 * Reduces an (X)HTML document or fragment to plain prose: scripts, styles,
 * navigation and comments are dropped, block elements become word boundaries
 * and every run of whitespace collapses to a single space.
 */
export function cleanHTMLContent(html: string): string {
  const $ = cheerio.load(html);

  $('script, style, noscript, template, nav, head').remove();
  $('a[href^="#"]:empty').remove();

  $('*').contents().filter((_, node) => node.nodeType === 8).remove();

  $('br').replaceWith(' ');
  $(BLOCK_TAGS).each((_, el) => {
    $(el).prepend(' ').append(' ');
  });

  const root = $('body');
  const text = root.length > 0 ? root.text() : $.root().text();

  return text.replace(/\s+/g, ' ').trim();
}

/** Text of the first h1–h3 heading, if the document has one. */
export function findHeading(html: string): string | undefined {
  const $ = cheerio.load(html);
  const heading = $('h1, h2, h3').first().text().replace(/\s+/g, ' ').trim();
  return heading.length > 0 ? heading : undefined;
}
