/**
 * URL discovery from sitemaps and RSS/Atom feeds
 */

import { FetchError } from '../errors/index.js';
import { silentLogger } from '../logging/index.js';

import { decodeEntities } from './html-text.js';
import { HttpExtractor } from './http-extractor.js';

import type { FetchFn } from './http-extractor.js';
import type { Logger } from '../logging/index.js';

export type DiscoverySource = 'auto' | 'sitemap' | 'rss';

export const DISCOVERY_SOURCES = ['auto', 'sitemap', 'rss'] as const satisfies readonly DiscoverySource[];

export interface Discoverer {
  /** Candidate article URLs in document order, without duplicates */
  discover(domain: string, source: DiscoverySource, options?: { signal?: AbortSignal }): Promise<string[]>;
}

export interface HttpDiscovererOptions {
  timeoutMs?: number;
  userAgent?: string;
  fetch?: FetchFn;
  logger?: Logger;
}

const SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml'];
const FEED_PATHS = ['/feed', '/rss.xml', '/feed.xml', '/atom.xml', '/index.xml'];

const LOC_RE = /<loc>\s*([\s\S]*?)\s*<\/loc>/gi;
const SITEMAP_INDEX_RE = /<sitemapindex\b/i;
const RSS_LINK_RE = /<item\b[^>]*>[\s\S]*?<link>\s*([\s\S]*?)\s*<\/link>/gi;
const ATOM_ENTRY_RE = /<entry\b[^>]*>([\s\S]*?)<\/entry>/gi;
const LINK_TAG_RE = /<link\b[^>]*>/gi;
const HREF_RE = /\bhref=["']([^"']+)["']/i;
const REL_RE = /\brel=["']([^"']+)["']/i;
const CDATA_RE = /^<!\[CDATA\[([\s\S]*?)\]\]>$/;
const FEED_FILE_RE = /\.(xml|rss|atom)$/i;

/**
 * Accept `example.com` or `https://example.com/...`; return the origin
 */
export function normalizeBaseUrl(domain: string): string {
  const withScheme = /^https?:\/\//i.test(domain) ? domain : `https://${domain}`;
  return new URL(withScheme).origin;
}

/**
 * Drop every URL containing one of the exclusion substrings
 */
export function filterTargets(urls: readonly string[], excludes: readonly string[]): string[] {
  const active = excludes.filter((e) => e.length > 0);
  if (active.length === 0) {return [...urls];}
  return urls.filter((url) => !active.some((e) => url.includes(e)));
}

export function dedupe(urls: readonly string[]): string[] {
  return [...new Set(urls)];
}

function cleanValue(value: string): string {
  return decodeEntities(value.trim().replace(CDATA_RE, '$1')).trim();
}

export function parseSitemap(xml: string): { isIndex: boolean; locations: string[] } {
  const locations = [...xml.matchAll(LOC_RE)].map((m) => cleanValue(m[1] ?? '')).filter((u) => u.length > 0);
  return { isIndex: SITEMAP_INDEX_RE.test(xml), locations };
}

export function parseFeed(xml: string): string[] {
  const links = [...xml.matchAll(RSS_LINK_RE)].map((m) => cleanValue(m[1] ?? ''));
  for (const entry of xml.matchAll(ATOM_ENTRY_RE)) {
    const href = entryLink(entry[1] ?? '');
    if (href) {links.push(cleanValue(href));}
  }
  return links.filter((u) => u.length > 0 && !FEED_FILE_RE.test(u));
}

/**
 * href of an Atom entry's alternate link
 */
function entryLink(entry: string): string | undefined {
  for (const [tag] of entry.matchAll(LINK_TAG_RE)) {
    const href = HREF_RE.exec(tag)?.[1];
    const rel = REL_RE.exec(tag)?.[1];
    if (href && (rel === undefined || rel === 'alternate')) {return href;}
  }
  return undefined;
}

export class HttpDiscoverer implements Discoverer {
  private readonly http: HttpExtractor;
  private readonly logger: Logger;

  constructor(options: HttpDiscovererOptions = {}) {
    this.http = new HttpExtractor({ timeoutMs: options.timeoutMs, userAgent: options.userAgent, fetch: options.fetch });
    this.logger = options.logger ?? silentLogger;
  }

  async discover(domain: string, source: DiscoverySource, options: { signal?: AbortSignal } = {}): Promise<string[]> {
    const base = normalizeBaseUrl(domain);
    let urls: string[] = [];

    if (source === 'auto' || source === 'sitemap') {
      urls = await this.fromSitemap(base, options.signal);
      this.logger.debug(`Found ${urls.length} URLs via sitemap for ${base}`);
    }
    if (urls.length === 0 && (source === 'auto' || source === 'rss')) {
      urls = await this.fromFeed(base, options.signal);
      this.logger.debug(`Found ${urls.length} URLs via feed for ${base}`);
    }

    const home = new Set([base, `${base}/`]);
    return dedupe(urls.filter((u) => !home.has(u)));
  }

  private async fromSitemap(base: string, signal?: AbortSignal): Promise<string[]> {
    for (const sitemapPath of SITEMAP_PATHS) {
      const xml = await this.fetchOptional(`${base}${sitemapPath}`, signal);
      if (xml === null) {continue;}

      const sitemap = parseSitemap(xml);
      if (!sitemap.isIndex) {return sitemap.locations;}

      // Follow one level of sitemap index
      const urls: string[] = [];
      for (const child of sitemap.locations) {
        const childXml = await this.fetchOptional(child, signal);
        if (childXml !== null) {urls.push(...parseSitemap(childXml).locations);}
      }
      return urls;
    }
    return [];
  }

  private async fromFeed(base: string, signal?: AbortSignal): Promise<string[]> {
    for (const feedPath of FEED_PATHS) {
      const xml = await this.fetchOptional(`${base}${feedPath}`, signal);
      if (xml === null) {continue;}
      const links = parseFeed(xml);
      if (links.length > 0) {return links;}
    }
    return [];
  }

  /**
   * Body of `url`, or null when it cannot be fetched. A failing source
   * only moves discovery on to the next one; cancellation still throws.
   */
  private async fetchOptional(url: string, signal?: AbortSignal): Promise<string | null> {
    try {
      return (await this.http.download(url, signal)).body;
    } catch (error) {
      if (!(error instanceof FetchError)) {throw error;}
      if (error.transient) {
        this.logger.warn(`Skipping ${url}: ${error.message}`);
      } else {
        this.logger.debug(`Skipping ${url}: ${error.message}`);
      }
      return null;
    }
  }
}
