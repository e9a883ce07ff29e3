/**
 * File Extractor - reads .txt, .md and .html files from disk
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { CancelledError, ExtractionError, FetchError, errorMessage } from '../errors/index.js';

import { buildContent } from './content.js';
import { looksLikeHtml } from './html-text.js';

import type { ExtractOptions, ExtractedContent, Extractor } from './types.js';
import type { ScanIdentity } from '../types/results.js';

const HTML_EXTENSIONS = new Set(['.html', '.htm', '.xhtml']);

export interface FileExtractorOptions {
  /** @default 1 */
  minWords?: number;
}

export class FileExtractor implements Extractor {
  private readonly minWords: number;

  constructor(options: FileExtractorOptions = {}) {
    this.minWords = options.minWords ?? 1;
  }

  async extract(identity: ScanIdentity, options: ExtractOptions = {}): Promise<ExtractedContent> {
    if (identity.kind !== 'file') {
      throw new ExtractionError(`FileExtractor cannot read ${identity.url}`);
    }

    const { filePath } = identity;
    let raw: string;
    try {
      raw = await fs.readFile(filePath, { encoding: 'utf8', signal: options.signal });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError(`Read of ${filePath} cancelled`);
      }
      throw new FetchError(`Cannot read ${filePath}: ${errorMessage(error)}`, { transient: false, cause: error });
    }

    const html = HTML_EXTENSIONS.has(path.extname(filePath).toLowerCase()) || looksLikeHtml(raw);
    return buildContent(raw, { html, minWords: this.minWords, source: filePath });
  }
}
