// Crawl coordinator and service wiring
export * from './lib/Crawler/Crawler.service.js';
export { CRAWLER_DEFAULTS } from './lib/Crawler/Crawler.defaults.js';
export * from './lib/layers.js';

// Configuration
export type {
  CrawlerConfigOptions,
  CrawlerConfigService,
} from './lib/Config/CrawlerConfig.service.js';
export {
  CrawlerConfig,
  CrawlerConfigOptionsSchema,
  DEFAULT_CRAWLER_OPTIONS,
  loadCrawlerOptions,
  makeCrawlerConfig,
} from './lib/Config/CrawlerConfig.service.js';

// URL handling
export type { NormalizedLink } from './lib/UrlFilter/UrlFilter.js';
export {
  domainOf,
  isValidUrl,
  normalizeLink,
  normalizeUrl,
  rejectionReason,
} from './lib/UrlFilter/UrlFilter.js';
export * from './lib/VisitedSet/VisitedSet.js';

// Politeness
export * from './lib/Robots/Robots.service.js';
export * from './lib/Politeness/PolitenessGate.service.js';

// Fetching and extraction
export * from './lib/HttpClient/HttpTransport.js';
export * from './lib/Fetcher/RetryPolicy.js';
export * from './lib/Fetcher/Fetcher.service.js';
export * from './lib/PageRecord/PageRecord.js';
export * from './lib/Extractor/PageExtractor.service.js';

// Graph output
export * from './lib/GraphSink/GraphSink.js';
export * from './lib/GraphSink/GraphRenderer.js';

// Logging
export type {
  CrawlLogEvent,
  CrawlLogEventType,
  CrawlLogWriter,
  SkipReason,
} from './lib/Logging/CrawlLogger.service.js';
export {
  CrawlLogger,
  CrawlLoggerLive,
  consoleWriter,
  jsonlFileWriter,
  makeCrawlLogger,
  makeCrawlLoggerLayer,
} from './lib/Logging/CrawlLogger.service.js';

// Errors
export * from './lib/errors.js';
