import { Config, ConfigError, Context, Effect, Layer, Option, Schema } from 'effect';
import { CRAWLER_DEFAULTS } from '../Crawler/Crawler.defaults.js';
import { ConfigurationError } from '../errors.js';

const PositiveInt = Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(1));
const NonNegativeInt = Schema.Number.pipe(Schema.int(), Schema.nonNegative());

/**
 * Validated shape of the crawler options.
 *
 * @group Configuration
 * @public
 */
export const CrawlerConfigOptionsSchema = Schema.Struct({
  /** Seed URLs; each starts a crawl tree at depth 0 */
  seeds: Schema.Array(Schema.String),
  /** Size of the concurrency permit pool */
  maxConcurrentTasks: PositiveInt,
  /** Minimum seconds between requests to one domain, raised to robots.txt Crawl-delay when larger */
  rateLimitSeconds: Schema.Number.pipe(Schema.nonNegative()),
  /**
   * Ceiling on URLs admitted to the visited set. In `soft` mode this is
   * checked without holding the visited-set lock and may be overshot by up to
   * `maxConcurrentTasks` pages.
   */
  maxPages: PositiveInt,
  /** Deepest level that is fetched; pages at this depth are not expanded */
  maxDepth: NonNegativeInt,
  /** Interval of the periodic graph render (not used by the crawl itself) */
  renderIntervalSeconds: Schema.Number.pipe(Schema.positive()),
  userAgent: Schema.NonEmptyString,
  fetchTimeoutMs: PositiveInt,
  robotsTimeoutMs: PositiveInt,
  /** Total attempts per page fetch, first try included */
  fetchAttempts: PositiveInt,
  retryDelayMs: NonNegativeInt,
  /** `soft` keeps the racy count check; `strict` reserves a slot atomically */
  pageCeiling: Schema.Literal('soft', 'strict'),
  /** When set, only these domains (and their subdomains) are expanded */
  allowedDomains: Schema.optional(Schema.Array(Schema.String)),
  /** Domains (and their subdomains) never expanded */
  blockedDomains: Schema.optional(Schema.Array(Schema.String)),
  /** Where the rendered graph is written */
  outputPath: Schema.NonEmptyString,
  /** When set, structured JSONL logs are written here */
  logDir: Schema.optional(Schema.String),
});

export type CrawlerConfigOptions = Schema.Schema.Type<
  typeof CrawlerConfigOptionsSchema
>;

export const DEFAULT_CRAWLER_OPTIONS: CrawlerConfigOptions = {
  seeds: [],
  maxConcurrentTasks: CRAWLER_DEFAULTS.MAX_CONCURRENT_TASKS,
  rateLimitSeconds: CRAWLER_DEFAULTS.RATE_LIMIT_SECONDS,
  maxPages: CRAWLER_DEFAULTS.MAX_PAGES,
  maxDepth: CRAWLER_DEFAULTS.MAX_DEPTH,
  renderIntervalSeconds: CRAWLER_DEFAULTS.RENDER_INTERVAL_SECONDS,
  userAgent: CRAWLER_DEFAULTS.USER_AGENT,
  fetchTimeoutMs: CRAWLER_DEFAULTS.FETCH_TIMEOUT_MS,
  robotsTimeoutMs: CRAWLER_DEFAULTS.ROBOTS_TIMEOUT_MS,
  fetchAttempts: CRAWLER_DEFAULTS.FETCH_ATTEMPTS,
  retryDelayMs: CRAWLER_DEFAULTS.RETRY_DELAY_MS,
  pageCeiling: 'soft',
  outputPath: CRAWLER_DEFAULTS.OUTPUT_PATH,
};

/**
 * Service interface for accessing crawler configuration.
 *
 * @group Configuration
 * @public
 */
export interface CrawlerConfigService {
  /** Get the complete configuration options */
  getOptions: () => Effect.Effect<CrawlerConfigOptions>;
  /** Check the allowed/blocked domain lists for a URL */
  shouldFollowDomain: (
    url: string
  ) => Effect.Effect<{ follow: boolean; reason?: string }>;
}

const matchesDomain = (hostname: string, domain: string): boolean =>
  hostname === domain || hostname.endsWith(`.${domain}`);

/**
 * Merges `options` over the defaults and validates the result.
 *
 * @group Configuration
 * @public
 */
export const makeCrawlerConfig = (
  options: Partial<CrawlerConfigOptions> = {}
): Effect.Effect<CrawlerConfigService, ConfigurationError> =>
  Schema.decodeUnknown(CrawlerConfigOptionsSchema)({
    ...DEFAULT_CRAWLER_OPTIONS,
    ...options,
  }).pipe(
    Effect.mapError(
      (error) =>
        new ConfigurationError({
          message: `Invalid crawler configuration: ${error.message}`,
          details: error,
        })
    ),
    Effect.map((config) => ({
      getOptions: () => Effect.succeed(config),

      shouldFollowDomain: (urlString: string) =>
        Effect.sync(() => {
          let hostname: string;
          try {
            hostname = new URL(urlString).hostname;
          } catch {
            return { follow: false, reason: 'Malformed URL' };
          }

          if (config.allowedDomains && config.allowedDomains.length > 0) {
            const isDomainAllowed = config.allowedDomains.some((domain) =>
              matchesDomain(hostname, domain)
            );
            if (!isDomainAllowed) {
              return {
                follow: false,
                reason: `Domain ${hostname} not in allowlist`,
              };
            }
          }

          if (config.blockedDomains && config.blockedDomains.length > 0) {
            const isDomainBlocked = config.blockedDomains.some((domain) =>
              matchesDomain(hostname, domain)
            );
            if (isDomainBlocked) {
              return {
                follow: false,
                reason: `Domain ${hostname} is blocked`,
              };
            }
          }

          return { follow: true };
        }),
    }))
  );

/**
 * Options read from `CRAWLER_*` environment variables, defaults filled in.
 */
const EnvOptions = Config.all({
  seeds: Config.array(Config.string(), 'CRAWLER_SEEDS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.seeds)
  ),
  maxConcurrentTasks: Config.integer('CRAWLER_MAX_CONCURRENT_TASKS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.maxConcurrentTasks)
  ),
  rateLimitSeconds: Config.number('CRAWLER_RATE_LIMIT_SECONDS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.rateLimitSeconds)
  ),
  maxPages: Config.integer('CRAWLER_MAX_PAGES').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.maxPages)
  ),
  maxDepth: Config.integer('CRAWLER_MAX_DEPTH').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.maxDepth)
  ),
  renderIntervalSeconds: Config.number('CRAWLER_RENDER_INTERVAL_SECONDS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.renderIntervalSeconds)
  ),
  userAgent: Config.string('CRAWLER_USER_AGENT').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.userAgent)
  ),
  fetchTimeoutMs: Config.integer('CRAWLER_FETCH_TIMEOUT_MS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.fetchTimeoutMs)
  ),
  robotsTimeoutMs: Config.integer('CRAWLER_ROBOTS_TIMEOUT_MS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.robotsTimeoutMs)
  ),
  fetchAttempts: Config.integer('CRAWLER_FETCH_ATTEMPTS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.fetchAttempts)
  ),
  retryDelayMs: Config.integer('CRAWLER_RETRY_DELAY_MS').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.retryDelayMs)
  ),
  pageCeiling: Config.literal('soft', 'strict')('CRAWLER_PAGE_CEILING').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.pageCeiling)
  ),
  allowedDomains: Config.option(
    Config.array(Config.string(), 'CRAWLER_ALLOWED_DOMAINS')
  ),
  blockedDomains: Config.option(
    Config.array(Config.string(), 'CRAWLER_BLOCKED_DOMAINS')
  ),
  outputPath: Config.string('CRAWLER_OUTPUT_PATH').pipe(
    Config.withDefault(DEFAULT_CRAWLER_OPTIONS.outputPath)
  ),
  logDir: Config.option(Config.string('CRAWLER_LOG_DIR')),
});

/**
 * Reads crawler options from the environment (through the current
 * `ConfigProvider`), then applies `overrides` on top.
 */
export const loadCrawlerOptions = (
  overrides: Partial<CrawlerConfigOptions> = {}
): Effect.Effect<Partial<CrawlerConfigOptions>, ConfigurationError> =>
  EnvOptions.pipe(
    Effect.map(
      ({ allowedDomains, blockedDomains, logDir, ...rest }) => ({
        ...rest,
        allowedDomains: Option.getOrUndefined(allowedDomains),
        blockedDomains: Option.getOrUndefined(blockedDomains),
        logDir: Option.getOrUndefined(logDir),
        ...overrides,
      })
    ),
    Effect.mapError(
      (error: ConfigError.ConfigError) =>
        new ConfigurationError({
          message: `Invalid environment configuration: ${String(error)}`,
          details: error,
        })
    )
  );

/**
 * The crawler configuration tag.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const config = yield* CrawlerConfig;
 *   const { maxPages } = yield* config.getOptions();
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(CrawlerConfig.Live({ maxPages: 20 })))
 * );
 * ```
 *
 * @group Configuration
 * @public
 */
export class CrawlerConfig extends Context.Tag('crawlgraph/CrawlerConfig')<
  CrawlerConfig,
  CrawlerConfigService
>() {
  static readonly Default = Layer.effect(this, makeCrawlerConfig());

  /**
   * Layer with the given options merged over the defaults.
   */
  static readonly Live = (options: Partial<CrawlerConfigOptions>) =>
    Layer.effect(this, makeCrawlerConfig(options));

  /**
   * Layer built from `CRAWLER_*` environment variables plus `overrides`.
   */
  static readonly fromEnv = (overrides: Partial<CrawlerConfigOptions> = {}) =>
    Layer.effect(
      this,
      Effect.flatMap(loadCrawlerOptions(overrides), makeCrawlerConfig)
    );
}
