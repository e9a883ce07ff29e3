import { FileExtractor } from './file-extractor.js';
import { HttpExtractor } from './http-extractor.js';

import type { FetchFn } from './http-extractor.js';
import type { ExtractOptions, ExtractedContent, Extractor } from './types.js';
import type { ScanIdentity } from '../types/results.js';

export interface ExtractorOptions {
  timeoutMs?: number;
  /** Applies to URLs; local files only need to be non-empty */
  minWords?: number;
  userAgent?: string;
  fetch?: FetchFn;
}

/**
 * Routes URLs to HTTP and everything else to the file system
 */
export class RoutingExtractor implements Extractor {
  constructor(
    private readonly http: Extractor,
    private readonly file: Extractor
  ) {}

  extract(identity: ScanIdentity, options?: ExtractOptions): Promise<ExtractedContent> {
    return identity.kind === 'url' ? this.http.extract(identity, options) : this.file.extract(identity, options);
  }
}

export function createExtractor(options: ExtractorOptions = {}): Extractor {
  return new RoutingExtractor(new HttpExtractor(options), new FileExtractor());
}
