import { Deferred, Effect, MutableHashMap, Option } from 'effect';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import { HttpTransport } from '../HttpClient/HttpTransport.js';
import { CrawlLogger } from '../Logging/CrawlLogger.service.js';
import { RobotsTxtError } from '../errors.js';
import { domainOf } from '../UrlFilter/UrlFilter.js';

/**
 * A single Allow/Disallow line of the wildcard user-agent group.
 *
 * @group Data Types
 * @public
 */
export interface RobotsRule {
  readonly allow: boolean;
  readonly path: string;
}

/**
 * Rules that apply to every user agent (`User-agent: *`), merged across all
 * wildcard groups of a robots.txt file.
 *
 * @group Data Types
 * @public
 */
export interface RobotsPolicy {
  readonly rules: ReadonlyArray<RobotsRule>;
  /** Crawl-delay in seconds, when declared */
  readonly crawlDelaySeconds: Option.Option<number>;
}

/**
 * Parses the wildcard user-agent section of a robots.txt file.
 *
 * Consecutive `User-agent` lines form one group. Only groups naming `*` are
 * kept; other agents' rules are ignored. An empty `Disallow` is a no-op.
 */
export const parseRobotsTxt = (content: string): RobotsPolicy => {
  const rules: RobotsRule[] = [];
  let crawlDelaySeconds: Option.Option<number> = Option.none();

  let isRelevantSection = false;
  let previousWasUserAgent = false;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.replace(/#.*$/, '').trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf(':');
    if (separator === -1) continue;

    const directive = trimmed.slice(0, separator).trim().toLowerCase();
    const value = trimmed.slice(separator + 1).trim();

    if (directive === 'user-agent') {
      const matches = value === '*';
      isRelevantSection = previousWasUserAgent
        ? isRelevantSection || matches
        : matches;
      previousWasUserAgent = true;
      continue;
    }
    previousWasUserAgent = false;

    if (!isRelevantSection) continue;

    if (directive === 'disallow' && value) {
      rules.push({ allow: false, path: value });
    } else if (directive === 'allow' && value) {
      rules.push({ allow: true, path: value });
    } else if (directive === 'crawl-delay') {
      const delay = Number(value);
      if (value !== '' && Number.isFinite(delay) && delay >= 0) {
        crawlDelaySeconds = Option.some(delay);
      }
    }
  }

  return { rules, crawlDelaySeconds };
};

const patternToRegExp = (pattern: string): RegExp => {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\\\*/g, '.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
};

/**
 * Decides a URL against a policy. The longest matching rule wins and `Allow`
 * wins a tie; with no matching rule the URL is allowed.
 */
export const isPathAllowed = (policy: RobotsPolicy, urlString: string): boolean => {
  let target: string;
  try {
    const url = new URL(urlString);
    target = url.pathname + url.search;
  } catch {
    return true;
  }

  let best: RobotsRule | undefined;
  for (const rule of policy.rules) {
    if (!patternToRegExp(rule.path).test(target)) continue;
    if (
      !best ||
      rule.path.length > best.path.length ||
      (rule.path.length === best.path.length && rule.allow && !best.allow)
    ) {
      best = rule;
    }
  }

  return best ? best.allow : true;
};

/**
 * Service for fetching, parsing and caching robots.txt policies.
 *
 * Each domain's robots.txt is requested at most once per service lifetime.
 * Tasks that ask for the same domain while the first lookup is in flight
 * wait on the same result. Any failure or non-200 answer is cached as "no
 * restrictions known".
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const robots = yield* RobotsService;
 *   if (!(yield* robots.isAllowed('https://example.com/admin'))) {
 *     return;
 *   }
 *   const policy = yield* robots.policyFor('https://example.com/');
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class RobotsService extends Effect.Service<RobotsService>()(
  'crawlgraph/RobotsService',
  {
    effect: Effect.gen(function* () {
      const config = yield* CrawlerConfig;
      const transport = yield* HttpTransport;
      const logger = yield* CrawlLogger;
      const { userAgent, robotsTimeoutMs } = yield* config.getOptions();

      const robotsCache = MutableHashMap.empty<
        string,
        Deferred.Deferred<Option.Option<RobotsPolicy>>
      >();
      const cacheMutex = yield* Effect.makeSemaphore(1);

      /** Status and, on a 200, the body; other bodies are left unread. */
      const fetchRobotsTxt = (robotsUrl: string) =>
        Effect.gen(function* () {
          const response = yield* transport.get(robotsUrl, {
            timeout: `${robotsTimeoutMs} millis`,
            headers: { 'user-agent': userAgent },
          });
          if (response.status !== 200) {
            yield* response.discard;
            return { status: response.status, body: Option.none<string>() };
          }
          return { status: response.status, body: Option.some(yield* response.text) };
        }).pipe(
          Effect.mapError((error) => RobotsTxtError.fromCause(robotsUrl, error.message))
        );

      const loadPolicy = (url: URL, domain: string) =>
        Effect.gen(function* () {
          const robotsUrl = `${url.protocol}//${url.host}/robots.txt`;
          const outcome = yield* Effect.either(fetchRobotsTxt(robotsUrl));

          if (outcome._tag === 'Left') {
            yield* logger.logRobotsPolicy(domain, 'unavailable', {
              error: outcome.left.message,
            });
            return Option.none<RobotsPolicy>();
          }

          const { status, body } = outcome.right;
          if (Option.isNone(body)) {
            yield* logger.logRobotsPolicy(domain, 'unavailable', {
              httpStatus: status,
            });
            return Option.none<RobotsPolicy>();
          }

          const policy = parseRobotsTxt(body.value);
          yield* logger.logRobotsPolicy(domain, 'loaded', {
            rules: policy.rules.length,
            crawlDelaySeconds: Option.getOrUndefined(policy.crawlDelaySeconds),
          });
          return Option.some(policy);
        });

      const policyFor = (urlString: string) =>
        Effect.gen(function* () {
          let url: URL;
          try {
            url = new URL(urlString);
          } catch {
            return Option.none<RobotsPolicy>();
          }
          const domain = domainOf(urlString);

          // Claim or join the lookup for this domain under the cache lock;
          // the lookup itself runs outside it.
          const { deferred, owner } = yield* cacheMutex.withPermits(1)(
            Effect.gen(function* () {
              const existing = MutableHashMap.get(robotsCache, domain);
              if (Option.isSome(existing)) {
                return { deferred: existing.value, owner: false };
              }
              const created = yield* Deferred.make<Option.Option<RobotsPolicy>>();
              MutableHashMap.set(robotsCache, domain, created);
              return { deferred: created, owner: true };
            })
          );

          if (owner) {
            yield* loadPolicy(url, domain).pipe(
              Effect.catchAllDefect(() => Effect.succeed(Option.none<RobotsPolicy>())),
              Effect.onInterrupt(() => Deferred.succeed(deferred, Option.none())),
              Effect.flatMap((policy) => Deferred.succeed(deferred, policy))
            );
          }

          return yield* Deferred.await(deferred);
        });

      return {
        policyFor,

        isAllowed: (urlString: string) =>
          Effect.map(policyFor(urlString), (policy) =>
            Option.match(policy, {
              onNone: () => true,
              onSome: (rules) => isPathAllowed(rules, urlString),
            })
          ),
      };
    }),
  }
) {}
