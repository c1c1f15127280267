import { Clock, Duration, Effect, MutableHashMap, Option } from 'effect';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import { CrawlLogger } from '../Logging/CrawlLogger.service.js';
import { RobotsService } from '../Robots/Robots.service.js';
import { domainOf } from '../UrlFilter/UrlFilter.js';

/**
 * Per-domain pacing state. Created on the first URL seen for a domain and
 * kept for the lifetime of the gate.
 *
 * @internal
 */
interface DomainState {
  /** Exclusive section around read-clock, wait, record */
  readonly lock: Effect.Semaphore;
  lastAccessMs: Option.Option<number>;
}

/**
 * Decides whether and when a URL may be fetched.
 *
 * Robots decisions are delegated to {@link RobotsService}. Pacing keeps one
 * lock per domain, so tasks on the same domain are spaced by the effective
 * interval while unrelated domains proceed in parallel.
 *
 * @group Services
 * @public
 */
export class PolitenessGate extends Effect.Service<PolitenessGate>()(
  'crawlgraph/PolitenessGate',
  {
    effect: Effect.gen(function* () {
      const robots = yield* RobotsService;
      const config = yield* CrawlerConfig;
      const logger = yield* CrawlLogger;
      const { rateLimitSeconds } = yield* config.getOptions();

      const domains = MutableHashMap.empty<string, DomainState>();
      const registryMutex = yield* Effect.makeSemaphore(1);

      const stateFor = (domain: string) =>
        registryMutex.withPermits(1)(
          Effect.gen(function* () {
            const existing = MutableHashMap.get(domains, domain);
            if (Option.isSome(existing)) return existing.value;

            const state: DomainState = {
              lock: yield* Effect.makeSemaphore(1),
              lastAccessMs: Option.none(),
            };
            MutableHashMap.set(domains, domain, state);
            return state;
          })
        );

      /**
       * The configured rate limit, raised to the domain's Crawl-delay when
       * that is larger.
       */
      const effectiveIntervalMs = (url: string) =>
        Effect.map(robots.policyFor(url), (policy) => {
          const crawlDelaySeconds = policy.pipe(
            Option.flatMap((p) => p.crawlDelaySeconds),
            Option.getOrElse(() => 0)
          );
          return Math.max(rateLimitSeconds, crawlDelaySeconds) * 1000;
        });

      return {
        isAllowed: (url: string) => robots.isAllowed(url),

        effectiveIntervalMs,

        /**
         * Suspends until the domain's next slot, records it as the domain's
         * last access and returns the slot time in epoch milliseconds.
         */
        waitForSlot: (url: string) =>
          Effect.gen(function* () {
            const domain = domainOf(url);
            const intervalMs = yield* effectiveIntervalMs(url);
            const state = yield* stateFor(domain);

            return yield* state.lock.withPermits(1)(
              Effect.gen(function* () {
                const remaining = (now: number) =>
                  Option.match(state.lastAccessMs, {
                    onNone: () => 0,
                    onSome: (last) => Math.max(0, last + intervalMs - now),
                  });

                let now = yield* Clock.currentTimeMillis;
                const initialWait = remaining(now);
                if (initialWait > 0) {
                  yield* logger.logRateLimitWait(domain, initialWait);
                }

                // Timers may fire slightly early; keep waiting until the clock agrees.
                while (remaining(now) > 0) {
                  yield* Effect.sleep(Duration.millis(remaining(now)));
                  now = yield* Clock.currentTimeMillis;
                }

                state.lastAccessMs = Option.some(now);
                return now;
              })
            );
          }),
      };
    }),
  }
) {}
