/**
 * Extraction types
 */

import type { ScanIdentity } from '../types/results.js';

/**
 * Readable text recovered from a target
 */
export interface ExtractedContent {
  text: string;
  wordCount: number;
  title?: string | undefined;
  /** ISO date (YYYY-MM-DD) when the source declares one */
  publishedDate?: string | undefined;
}

export interface ExtractOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Turns a scan identity into plain text. Implementations throw FetchError
 * when the target cannot be retrieved and ExtractionError when it holds no
 * usable text.
 */
export interface Extractor {
  extract(identity: ScanIdentity, options?: ExtractOptions): Promise<ExtractedContent>;
}
