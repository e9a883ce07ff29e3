/**
 * Text Document - structural features of extracted text
 *
 * Built once per target and shared by every detector, so word, sentence
 * and paragraph boundaries are computed the same way for all patterns.
 */

/** Markdown ATX header (`# Title` … `###### Title`) */
const HEADER_RE = /^ {0,3}#{1,6}\s+\S/;

/** Bulleted or numbered list item */
const BULLET_RE = /^\s*(?:[-*+•·◦▪▸►✓✗]|\d+[.)])\s+\S/u;

/** Sentence boundary: terminal punctuation, whitespace, then an uppercase letter, digit or opening quote */
const SENTENCE_BOUNDARY_RE = /(?<=[.!?…])\s+(?=["'“‘(\[]?[\p{Lu}\p{N}])/u;

/** One emoji, including variation selectors and ZWJ sequences */
const EMOJI_RE = /\p{Extended_Pictographic}(?:\u{FE0F}|\u{200D}\p{Extended_Pictographic})*/gu;

/** Leading and trailing non-alphanumerics stripped from tokens */
const TOKEN_EDGE_RE = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export interface TextDocument {
  /** Text as extracted */
  readonly text: string;
  readonly lowerText: string;
  /** Whitespace-delimited words */
  readonly words: readonly string[];
  readonly wordCount: number;
  /** Lowercased words without surrounding punctuation */
  readonly tokens: readonly string[];
  /** Non-blank lines */
  readonly lines: readonly string[];
  /** Blocks separated by blank lines */
  readonly paragraphs: readonly string[];
  readonly sentences: readonly string[];
  readonly headerLines: number;
  readonly bulletLines: number;
  readonly emojiCount: number;
}

/**
 * Split text into whitespace-delimited words
 */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Lowercase and strip surrounding punctuation; empty tokens are dropped
 */
export function tokenize(text: string): string[] {
  return splitWords(text)
    .map((w) => w.toLowerCase().replace(TOKEN_EDGE_RE, ''))
    .filter((t) => t.length > 0);
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(/\r?\n[ \t]*\r?\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Split text into sentences. Paragraph breaks always end a sentence.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const paragraph of splitParagraphs(text)) {
    for (const sentence of paragraph.split(SENTENCE_BOUNDARY_RE)) {
      const trimmed = sentence.replace(/\s+/g, ' ').trim();
      if (trimmed.length > 0) {
        sentences.push(trimmed);
      }
    }
  }
  return sentences;
}

export function countEmoji(text: string): number {
  return text.match(EMOJI_RE)?.length ?? 0;
}

/**
 * Compute every structural feature of a text
 */
export function createTextDocument(text: string): TextDocument {
  const words = splitWords(text);
  const lines = text.split(/\r?\n/).filter((l) => l.trim().length > 0);

  return Object.freeze({
    text,
    lowerText: text.toLowerCase(),
    words,
    wordCount: words.length,
    tokens: tokenize(text),
    lines,
    paragraphs: splitParagraphs(text),
    sentences: splitSentences(text),
    headerLines: lines.filter((l) => HEADER_RE.test(l)).length,
    bulletLines: lines.filter((l) => BULLET_RE.test(l)).length,
    emojiCount: countEmoji(text),
  });
}
