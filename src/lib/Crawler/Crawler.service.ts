import { Cause, Clock, Effect, Option, Ref } from 'effect';
import {
  CrawlerConfig,
  type CrawlerConfigOptions,
} from '../Config/CrawlerConfig.service.js';
import { PageExtractorService } from '../Extractor/PageExtractor.service.js';
import { FetcherService } from '../Fetcher/Fetcher.service.js';
import { GraphSink } from '../GraphSink/GraphSink.js';
import { CrawlLogger, type SkipReason } from '../Logging/CrawlLogger.service.js';
import { PolitenessGate } from '../Politeness/PolitenessGate.service.js';
import type { PageRecord } from '../PageRecord/PageRecord.js';
import { domainOf, normalizeLink } from '../UrlFilter/UrlFilter.js';
import { makeVisitedSet, type VisitedSet } from '../VisitedSet/VisitedSet.js';

/**
 * A URL waiting to be processed, with its distance from the seed.
 *
 * @group Data Types
 * @public
 */
export interface CrawlTask {
  readonly url: string;
  readonly depth: number;
  /** The page this URL was discovered on */
  readonly fromUrl?: string;
}

/**
 * Counts for a task and everything it spawned. Parents add their children's
 * summaries to their own; failures travel upward only as counts.
 *
 * @group Data Types
 * @public
 */
export interface TaskSummary {
  readonly pagesCrawled: number;
  readonly skipped: number;
  readonly failed: number;
}

/**
 * @group Data Types
 * @public
 */
export interface CrawlSummary extends TaskSummary {
  readonly seeds: ReadonlyArray<string>;
  /** URLs admitted to the visited set */
  readonly visited: number;
  readonly durationMs: number;
}

const EMPTY_SUMMARY: TaskSummary = { pagesCrawled: 0, skipped: 0, failed: 0 };

export const combineSummaries = (
  summaries: Iterable<TaskSummary>
): TaskSummary => {
  let total = EMPTY_SUMMARY;
  for (const summary of summaries) {
    total = {
      pagesCrawled: total.pagesCrawled + summary.pagesCrawled,
      skipped: total.skipped + summary.skipped,
      failed: total.failed + summary.failed,
    };
  }
  return total;
};

type VisitOutcome =
  | { readonly type: 'crawled'; readonly record: PageRecord }
  | { readonly type: 'skipped'; readonly reason: SkipReason }
  | { readonly type: 'failed' };

/**
 * State shared by every task of one crawl run.
 *
 * @internal
 */
interface CrawlRun {
  readonly options: CrawlerConfigOptions;
  readonly visited: VisitedSet;
  readonly permits: Effect.Semaphore;
  readonly crawledCount: Ref.Ref<number>;
}

/**
 * The crawl coordinator.
 *
 * Each URL becomes a task that passes, in order: a concurrency permit, the
 * page ceiling, the visited set, robots.txt, the fetch (which waits for the
 * domain's rate-limit slot before each attempt) and the extraction. A crawled page is forwarded to the
 * {@link GraphSink}; when below `maxDepth` its outbound links become child
 * tasks that run concurrently and are awaited by the parent.
 *
 * The permit covers admission through extraction and is released before the
 * parent waits on its children, so a deep tree can never hold every permit
 * while waiting on descendants that need one.
 *
 * In `soft` ceiling mode the page count is read outside the visited-set lock,
 * so up to `maxConcurrentTasks` extra URLs may be admitted once the ceiling is
 * crossed. `strict` mode folds the count check into the insert.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const crawler = yield* CrawlerService;
 *   const summary = yield* crawler.crawl(['https://example.com/']);
 *   yield* Effect.logInfo(`Crawled ${summary.pagesCrawled} pages`);
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class CrawlerService extends Effect.Service<CrawlerService>()(
  'crawlgraph/CrawlerService',
  {
    effect: Effect.gen(function* () {
      const config = yield* CrawlerConfig;
      const gate = yield* PolitenessGate;
      const fetcher = yield* FetcherService;
      const extractor = yield* PageExtractorService;
      const sink = yield* GraphSink;
      const logger = yield* CrawlLogger;

      const skip = (task: CrawlTask, reason: SkipReason, log = true) =>
        (log
          ? logger.logTaskSkipped(
              task.url,
              reason,
              task.fromUrl ? { fromUrl: task.fromUrl } : undefined
            )
          : Effect.void
        ).pipe(
          Effect.as<VisitOutcome>({ type: 'skipped', reason })
        );

      const admit = (run: CrawlRun, url: string) =>
        Effect.gen(function* () {
          if (run.options.pageCeiling === 'strict') {
            const reservation = yield* run.visited.reserve(url, run.options.maxPages);
            if (reservation === 'full') return Option.some<SkipReason>('page_ceiling');
            if (reservation === 'duplicate') return Option.some<SkipReason>('already_visited');
            return Option.none<SkipReason>();
          }

          const visitedCount = yield* run.visited.size();
          if (visitedCount >= run.options.maxPages) {
            return Option.some<SkipReason>('page_ceiling');
          }
          const added = yield* run.visited.tryAdd(url);
          return added ? Option.none<SkipReason>() : Option.some<SkipReason>('already_visited');
        });

      /**
       * Forwards a record to the graph sink. Sink failures are logged and
       * never affect the crawl.
       */
      const publish = (record: PageRecord, task: CrawlTask) =>
        Effect.gen(function* () {
          const host = domainOf(record.url);
          yield* sink.addNode(
            record.url,
            record.title,
            record.description || record.url,
            task.depth === 0 ? 'seed' : 'page'
          );
          yield* Effect.forEach(
            record.outboundLinks,
            (link) =>
              sink.addEdge(
                record.url,
                link,
                domainOf(link) === host ? 'internal' : 'external'
              ),
            { discard: true }
          );
        }).pipe(
          Effect.catchAllCause((cause) =>
            logger.logEvent({
              type: 'sink_error',
              url: record.url,
              message: `Graph sink rejected ${record.url}`,
              details: { cause: Cause.pretty(cause) },
            })
          )
        );

      /**
       * Admission through publishing; runs while holding a permit.
       */
      const visit = (run: CrawlRun, task: CrawlTask): Effect.Effect<VisitOutcome> =>
        Effect.gen(function* () {
          const rejection = yield* admit(run, task.url);
          if (Option.isSome(rejection)) {
            return yield* skip(task, rejection.value);
          }

          const allowed = yield* gate.isAllowed(task.url);
          if (!allowed) {
            return yield* skip(task, 'robots_disallowed');
          }

          const content = yield* Effect.either(fetcher.fetch(task.url));
          if (content._tag === 'Left') {
            return { type: 'failed' } as const;
          }
          if (Option.isNone(content.right)) {
            // Already logged by the fetcher with status and content type.
            return yield* skip(task, 'content_rejected', false);
          }

          const record = yield* extractor.extract(content.right.value, task.url);
          yield* publish(record, task);
          return { type: 'crawled', record } as const;
        });

      /**
       * Outbound links worth spawning: in scope and not yet visited. The
       * visited check here only saves work; admission re-checks atomically.
       */
      const childrenOf = (run: CrawlRun, record: PageRecord) =>
        Effect.filter(record.outboundLinks, (link) =>
          Effect.gen(function* () {
            const scope = yield* config.shouldFollowDomain(link);
            if (!scope.follow) return false;
            return !(yield* run.visited.contains(link));
          })
        );

      const processTask = (
        run: CrawlRun,
        task: CrawlTask
      ): Effect.Effect<TaskSummary> =>
        Effect.gen(function* () {
          const outcome = yield* run.permits.withPermits(1)(visit(run, task));

          if (outcome.type === 'skipped') {
            return { ...EMPTY_SUMMARY, skipped: 1 };
          }
          if (outcome.type === 'failed') {
            return { ...EMPTY_SUMMARY, failed: 1 };
          }

          const own: TaskSummary = { ...EMPTY_SUMMARY, pagesCrawled: 1 };
          const pageNumber = yield* Ref.updateAndGet(run.crawledCount, (n) => n + 1);
          yield* logger.logPageCrawled(task.url, task.depth, pageNumber);

          if (task.depth >= run.options.maxDepth) {
            return own;
          }

          const children = yield* childrenOf(run, outcome.record);
          const childSummaries = yield* Effect.forEach(
            children,
            (link) =>
              processTask(run, {
                url: link,
                depth: task.depth + 1,
                fromUrl: task.url,
              }),
            { concurrency: 'unbounded' }
          );

          return combineSummaries([own, ...childSummaries]);
        }).pipe(
          Effect.catchAllCause((cause) =>
            Cause.isInterruptedOnly(cause)
              ? Effect.failCause(cause)
              : logger
                  .logTaskFailed(task.url, Cause.pretty(cause))
                  .pipe(Effect.as<TaskSummary>({ ...EMPTY_SUMMARY, failed: 1 }))
          )
        );

      return {
        /**
         * Crawls from `seeds` (the configured seeds when omitted) until every
         * task has finished, and returns the run's totals.
         */
        crawl: (seeds?: ReadonlyArray<string>) =>
          Effect.gen(function* () {
            const options = yield* config.getOptions();
            const startMs = yield* Clock.currentTimeMillis;
            const requested = seeds ?? options.seeds;

            const roots: string[] = [];
            for (const seed of requested) {
              const link = normalizeLink(seed, seed);
              if (link.valid) {
                roots.push(link.url);
              } else {
                yield* logger.logEvent({
                  type: 'task_skipped',
                  url: seed,
                  message: `Ignoring seed ${seed}: ${link.reason ?? 'not crawlable'}`,
                  details: { reason: 'invalid_seed' },
                });
              }
            }

            const run: CrawlRun = {
              options,
              visited: yield* makeVisitedSet(),
              permits: yield* Effect.makeSemaphore(options.maxConcurrentTasks),
              crawledCount: yield* Ref.make(0),
            };

            yield* logger.logCrawlLifecycle('start', {
              seeds: roots,
              maxPages: options.maxPages,
              maxDepth: options.maxDepth,
              maxConcurrentTasks: options.maxConcurrentTasks,
            });

            const totals = combineSummaries(
              yield* Effect.forEach(
                roots,
                (url) => processTask(run, { url, depth: 0 }),
                { concurrency: 'unbounded' }
              )
            );

            const summary: CrawlSummary = {
              ...totals,
              seeds: roots,
              visited: yield* run.visited.size(),
              durationMs: (yield* Clock.currentTimeMillis) - startMs,
            };

            yield* logger.logCrawlLifecycle('complete', { ...summary });
            return summary;
          }),
      };
    }),
  }
) {}
