/**
 * HTML Text Tests
 */

import { describe, it, expect } from 'vitest';

import { buildContent } from './content.js';
import { decodeEntities, htmlPublishedDate, htmlTitle, htmlToText, looksLikeHtml } from './html-text.js';

const ARTICLE_PAGE = [
  '<!DOCTYPE html>',
  '<html><head><title>Fish &amp; Chips</title>',
  '<meta property="article:published_time" content="2025-06-01T08:00:00Z">',
  '</head><body>',
  '<nav>Home About Contact</nav>',
  '<article><h2>Intro</h2><p>First paragraph — here.</p>',
  '<ul><li>One</li><li>Two</li></ul>',
  '<script>var hidden = 1;</script></article>',
  '<footer>Copyright notice</footer>',
  '</body></html>',
].join('\n');

describe('htmlToText', () => {
  it('keeps headings, paragraphs and list items of the article', () => {
    expect(htmlToText(ARTICLE_PAGE)).toBe('## Intro\n\nFirst paragraph — here.\n\n- One\n- Two');
  });

  it('falls back to main when there is no article', () => {
    const html = '<body><p>Outside</p><main><p>Inside main</p></main></body>';
    expect(htmlToText(html)).toBe('Inside main');
  });

  it('falls back to the body and strips inline tags', () => {
    const html = '<body><div>Hello <b>world</b></div><br>Next</body>';
    expect(htmlToText(html)).toBe('Hello world\n\nNext');
  });

  it('converts fragments and drops comments', () => {
    expect(htmlToText('<!-- hidden --><p>Shown</p>')).toBe('Shown');
  });

  it('decodes entities and collapses whitespace', () => {
    expect(htmlToText('<p>Fish &amp;   chips&nbsp;today</p>')).toBe('Fish & chips today');
  });
});

describe('decodeEntities', () => {
  it('decodes named, decimal and hex entities', () => {
    expect(decodeEntities('&#8212; &#x2014; &hellip; &LT;')).toBe('— — … <');
  });

  it('leaves unknown entities alone', () => {
    expect(decodeEntities('&unknown; &#xFFFFFFF;')).toBe('&unknown; &#xFFFFFFF;');
  });
});

describe('htmlTitle', () => {
  it('reads and decodes the title', () => {
    expect(htmlTitle(ARTICLE_PAGE)).toBe('Fish & Chips');
  });

  it('is undefined for a missing or blank title', () => {
    expect(htmlTitle('<p>no head</p>')).toBeUndefined();
    expect(htmlTitle('<title>   </title>')).toBeUndefined();
  });
});

describe('htmlPublishedDate', () => {
  it('reads article:published_time', () => {
    expect(htmlPublishedDate(ARTICLE_PAGE)).toBe('2025-06-01');
  });

  it('reads a meta tag with content before the name', () => {
    expect(htmlPublishedDate('<meta content="2024-02-29" name="date">')).toBe('2024-02-29');
  });

  it('reads JSON-LD datePublished', () => {
    const html = '<script type="application/ld+json">{"@type":"Article","datePublished": "2023-11-05T09:30:00+01:00"}</script>';
    expect(htmlPublishedDate(html)).toBe('2023-11-05');
  });

  it('reads a time element', () => {
    expect(htmlPublishedDate('<time datetime="2022-07-14T12:00">July 14</time>')).toBe('2022-07-14');
  });

  it('is undefined when nothing parses', () => {
    expect(htmlPublishedDate('<time datetime="someday">soon</time>')).toBeUndefined();
    expect(htmlPublishedDate('<p>plain</p>')).toBeUndefined();
  });
});

describe('looksLikeHtml', () => {
  it('spots common document markers', () => {
    expect(looksLikeHtml('<!DOCTYPE html><html></html>')).toBe(true);
    expect(looksLikeHtml('<p>para</p>')).toBe(true);
  });

  it('ignores plain text with angle brackets', () => {
    expect(looksLikeHtml('if a < b and b > c then a < c')).toBe(false);
    expect(looksLikeHtml('# Markdown heading\n\nText.')).toBe(false);
  });
});

describe('buildContent', () => {
  it('returns trimmed text and word count for plain text', () => {
    const content = buildContent('\r\n  Three plain words.\r\n', { html: false, minWords: 1, source: 'a.txt' });
    expect(content).toEqual({ text: 'Three plain words.', wordCount: 3, title: undefined, publishedDate: undefined });
  });

  it('extracts title and date from HTML', () => {
    const content = buildContent(ARTICLE_PAGE, { html: true, minWords: 1, source: 'page' });
    expect(content.title).toBe('Fish & Chips');
    expect(content.publishedDate).toBe('2025-06-01');
    expect(content.wordCount).toBe(10);
  });

  it('rejects sources with no text', () => {
    expect(() => buildContent('<script>x()</script>', { html: true, minWords: 1, source: 'empty.html' })).toThrow(
      'No extractable text in empty.html'
    );
  });

  it('rejects sources below the word minimum', () => {
    expect(() => buildContent('Too short.', { html: false, minWords: 5, source: 'short.txt' })).toThrow(
      'Only 2 words of readable text in short.txt (minimum 5).'
    );
  });
});
