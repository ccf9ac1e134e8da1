import { describe, it, expect } from 'vitest';
import { cleanHTMLContent, findHeading } from '../cleaner.js';

describe('cleanHTMLContent', () => {
  it('drops scripts, styles, navigation and comments', () => {
    const html = `<html><head><title>Ignored</title><style>p { color: red; }</style></head>
      <body><nav>Contents</nav><script>var x = 1;</script><!-- note --><p>Only this remains.</p></body></html>`;

    expect(cleanHTMLContent(html)).toBe('Only this remains.');
  });

  it('separates block elements and line breaks with spaces', () => {
    const html = '<body><h1>Title</h1><p>First<br/>line</p><p>Second</p><ul><li>a</li><li>b</li></ul></body>';

    expect(cleanHTMLContent(html)).toBe('Title First line Second a b');
  });

  it('keeps inline elements joined to their words', () => {
    expect(cleanHTMLContent('<p>un<em>break</em>able and <a href="x.html">linked</a></p>')).toBe('unbreakable and linked');
  });

  it('removes empty in-page anchors', () => {
    expect(cleanHTMLContent('<p><a href="#note1"></a>Text</p>')).toBe('Text');
  });

  it('returns an empty string for markup without text', () => {
    expect(cleanHTMLContent('<div><img src="a.png"/></div>')).toBe('');
  });
});

describe('findHeading', () => {
  it('returns the first h1-h3 heading', () => {
    expect(findHeading('<p>intro</p><h3>Small</h3><h1>Big</h1>')).toBe('Small');
  });

  it('returns undefined without a heading', () => {
    expect(findHeading('<p>No headings</p><h4>Too deep</h4>')).toBeUndefined();
  });
});
