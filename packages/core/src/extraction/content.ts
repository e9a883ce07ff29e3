/**
 * Build ExtractedContent from a fetched or read source
 */

import { splitWords } from '../detectors/text-document.js';
import { ExtractionError } from '../errors/index.js';

import { htmlPublishedDate, htmlTitle, htmlToText } from './html-text.js';

import type { ExtractedContent } from './types.js';

export interface ContentOptions {
  html: boolean;
  minWords: number;
  /** URL or path, used in error messages */
  source: string;
}

export function buildContent(raw: string, options: ContentOptions): ExtractedContent {
  const normalized = raw.replace(/\r\n?/g, '\n');
  const text = options.html ? htmlToText(normalized) : normalized.trim();
  const wordCount = splitWords(text).length;

  if (wordCount === 0) {
    throw new ExtractionError(`No extractable text in ${options.source}`);
  }
  if (wordCount < options.minWords) {
    throw new ExtractionError(
      `Only ${wordCount} words of readable text in ${options.source} (minimum ${options.minWords}). ` +
        'The page may be script-rendered, paywalled or have no article body.'
    );
  }

  return {
    text,
    wordCount,
    title: options.html ? htmlTitle(normalized) : undefined,
    publishedDate: options.html ? htmlPublishedDate(normalized) : undefined,
  };
}
