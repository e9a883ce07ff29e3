export { FileExtractor } from './file-extractor.js';
export type { FileExtractorOptions } from './file-extractor.js';
export { HttpExtractor, DEFAULT_USER_AGENT, isTransientStatus } from './http-extractor.js';
export type { HttpExtractorOptions, FetchFn } from './http-extractor.js';
export { RoutingExtractor, createExtractor } from './create-extractor.js';
export type { ExtractorOptions } from './create-extractor.js';
export { buildContent } from './content.js';
export { htmlToText, htmlTitle, htmlPublishedDate, decodeEntities, looksLikeHtml } from './html-text.js';
export {
  HttpDiscoverer,
  DISCOVERY_SOURCES,
  filterTargets,
  dedupe,
  normalizeBaseUrl,
  parseSitemap,
  parseFeed,
} from './discoverer.js';
export type { Discoverer, DiscoverySource, HttpDiscovererOptions } from './discoverer.js';
export type { Extractor, ExtractedContent, ExtractOptions } from './types.js';
