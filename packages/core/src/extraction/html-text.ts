/**
 * HTML to plain text
 *
 * A tag-level conversion that keeps the structure the detectors look at:
 * headings become `#` lines, list items become `- ` lines and block
 * elements are separated by blank lines. When the page has an <article>
 * (or failing that a <main>) element, only its content is used.
 */

const DROPPED_ELEMENTS_RE =
  /<(script|style|noscript|template|svg|nav|header|footer|aside|form|iframe)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const COMMENT_RE = /<!--[\s\S]*?-->/g;
const ARTICLE_RE = /<article\b[^>]*>([\s\S]*?)<\/article\s*>/i;
const MAIN_RE = /<main\b[^>]*>([\s\S]*?)<\/main\s*>/i;
const BODY_RE = /<body\b[^>]*>([\s\S]*?)<\/body\s*>/i;
const HEADING_OPEN_RE = /<h([1-6])\b[^>]*>/gi;
const LIST_ITEM_RE = /<li\b[^>]*>/gi;
const BREAK_RE = /<br\s*\/?>/gi;
const BLOCK_TAG_RE = /<\/?(p|div|section|blockquote|pre|ul|ol|table|tr|h[1-6]|li|figure|figcaption|dl|dt|dd)\b[^>]*>/gi;
const ANY_TAG_RE = /<[^>]+>/g;
const TITLE_RE = /<title\b[^>]*>([\s\S]*?)<\/title\s*>/i;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  mdash: '—',
  ndash: '–',
  hellip: '…',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  bull: '•',
  middot: '·',
  copy: '©',
};

const ENTITY_RE = /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi;

export function decodeEntities(text: string): string {
  return text.replace(ENTITY_RE, (whole, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(Number.parseInt(entity.slice(2), 16)) ?? whole;
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(Number.parseInt(entity.slice(1), 10)) ?? whole;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

function fromCodePoint(code: number): string | undefined {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) {return undefined;}
  return String.fromCodePoint(code);
}

export function htmlTitle(html: string): string | undefined {
  const match = TITLE_RE.exec(html);
  const title = match?.[1] ? decodeEntities(match[1].replace(ANY_TAG_RE, '')).trim() : '';
  return title || undefined;
}

/**
 * Convert an HTML document or fragment to plain text
 */
export function htmlToText(html: string): string {
  const cleaned = html.replace(COMMENT_RE, '').replace(DROPPED_ELEMENTS_RE, '');
  const content =
    ARTICLE_RE.exec(cleaned)?.[1] ?? MAIN_RE.exec(cleaned)?.[1] ?? BODY_RE.exec(cleaned)?.[1] ?? cleaned;

  const marked = content
    .replace(HEADING_OPEN_RE, (_tag, level: string) => `\n\n${'#'.repeat(Number(level))} `)
    .replace(LIST_ITEM_RE, '\n- ')
    .replace(BREAK_RE, '\n')
    .replace(BLOCK_TAG_RE, (tag) => (/^<\/?li\b/i.test(tag) ? '' : '\n\n'))
    .replace(ANY_TAG_RE, '');

  const lines = decodeEntities(marked)
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v ]+/g, ' ').trim());

  // Collapse runs of blank lines into one paragraph break
  const out: string[] = [];
  for (const line of lines) {
    if (line === '' && (out.length === 0 || out[out.length - 1] === '')) {continue;}
    out.push(line);
  }
  while (out.length > 0 && out[out.length - 1] === '') {out.pop();}
  return out.join('\n');
}

// ============================================================================
// Published date
// ============================================================================

const DATE_SOURCES: readonly RegExp[] = [
  /<meta\b[^>]*(?:property|name)=["'](?:article:published_time|og:published_time|datePublished|pubdate|publish[_-]?date|date)["'][^>]*content=["']([^"']+)["']/i,
  /<meta\b[^>]*content=["']([^"']+)["'][^>]*(?:property|name)=["'](?:article:published_time|og:published_time|datePublished|pubdate|publish[_-]?date|date)["']/i,
  /<[^>]+itemprop=["']datePublished["'][^>]*(?:content|datetime)=["']([^"']+)["']/i,
  /"datePublished"\s*:\s*"([^"]+)"/i,
  /<time\b[^>]*datetime=["']([^"']+)["']/i,
];

/**
 * Publication date declared in the page, as YYYY-MM-DD
 */
export function htmlPublishedDate(html: string): string | undefined {
  for (const re of DATE_SOURCES) {
    const value = re.exec(html)?.[1];
    if (!value) {continue;}
    const date = toIsoDate(value);
    if (date) {return date;}
  }
  return undefined;
}

function toIsoDate(value: string): string | undefined {
  const direct = /^(\d{4}-\d{2}-\d{2})/.exec(value.trim());
  if (direct?.[1]) {return direct[1];}
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString().slice(0, 10);
}

const HTML_HINT_RE = /<(?:!doctype\s+html|html|body|article|p)\b/i;

export function looksLikeHtml(text: string): boolean {
  return HTML_HINT_RE.test(text.slice(0, 2048));
}
