/**
 * Fixed operational constants of the crawler. Everything here is a default;
 * the tunable ones are surfaced through CrawlerConfig.
 */
export const CRAWLER_DEFAULTS = Object.freeze({
  /** Concurrency permits shared by every crawl task of a run */
  MAX_CONCURRENT_TASKS: 10,

  /** Minimum seconds between two requests to the same domain */
  RATE_LIMIT_SECONDS: 1,

  /** Soft ceiling on URLs admitted to the visited set */
  MAX_PAGES: 100,

  /** Seeds are depth 0; pages at this depth are recorded but not expanded */
  MAX_DEPTH: 3,

  /** Interval of the periodic graph render */
  RENDER_INTERVAL_SECONDS: 5,

  USER_AGENT: 'CrawlGraph/1.0 (+polite-crawler)',

  /** Timeout for a page fetch */
  FETCH_TIMEOUT_MS: 10_000,

  /** Timeout for a robots.txt lookup */
  ROBOTS_TIMEOUT_MS: 5_000,

  /** Total attempts for a page fetch, first try included */
  FETCH_ATTEMPTS: 3,

  /** Fixed pause between fetch attempts */
  RETRY_DELAY_MS: 2_000,

  /** Longest URL considered crawlable */
  MAX_URL_LENGTH: 2083,

  OUTPUT_PATH: 'crawl-graph.dot',
});
