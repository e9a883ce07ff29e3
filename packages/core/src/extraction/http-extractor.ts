/**
 * HTTP Extractor - downloads a page and reduces it to article text
 *
 * Failure classes:
 * - timeout, network failure, 408/429/5xx: transient FetchError (retryable)
 * - any other non-2xx status: permanent FetchError
 * - too little text: ExtractionError
 */

import { CancelledError, ExtractionError, FetchError, errorMessage } from '../errors/index.js';

import { buildContent } from './content.js';
import { looksLikeHtml } from './html-text.js';

import type { ExtractOptions, ExtractedContent, Extractor } from './types.js';
import type { ScanIdentity } from '../types/results.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpExtractorOptions {
  /** @default 30000 */
  timeoutMs?: number;
  /** @default 20 */
  minWords?: number;
  userAgent?: string;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; lexiscan/0.1)';

export function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

export class HttpExtractor implements Extractor {
  private readonly timeoutMs: number;
  private readonly minWords: number;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpExtractorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.minWords = options.minWords ?? 20;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async extract(identity: ScanIdentity, options: ExtractOptions = {}): Promise<ExtractedContent> {
    if (identity.kind !== 'url') {
      throw new ExtractionError(`HttpExtractor cannot fetch ${identity.filePath}`);
    }

    const { body, contentType } = await this.download(identity.url, options.signal);
    const html = contentType.includes('html') || looksLikeHtml(body);
    return buildContent(body, { html, minWords: this.minWords, source: identity.url });
  }

  /**
   * GET a URL as text, honouring both the per-request timeout and the
   * caller's signal
   */
  async download(url: string, signal?: AbortSignal): Promise<{ body: string; contentType: string }> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      throw new CancelledError(`Fetch of ${url} cancelled`);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
      });

      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status} fetching ${url}`, {
          transient: isTransientStatus(response.status),
          status: response.status,
        });
      }

      const contentType = response.headers.get('content-type') ?? '';
      return { body: await response.text(), contentType };
    } catch (error) {
      if (error instanceof FetchError) {throw error;}
      if (signal?.aborted) {
        throw new CancelledError(`Fetch of ${url} cancelled`);
      }
      if (controller.signal.aborted) {
        throw new FetchError(`Timed out after ${this.timeoutMs} ms fetching ${url}`, { transient: true, cause: error });
      }
      throw new FetchError(`Request failed for ${url}: ${errorMessage(error)}`, { transient: true, cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
