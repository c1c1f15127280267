import { Effect, Option, Ref } from 'effect';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import { HttpTransport, type HttpResponse } from '../HttpClient/HttpTransport.js';
import { CrawlLogger } from '../Logging/CrawlLogger.service.js';
import { PolitenessGate } from '../Politeness/PolitenessGate.service.js';
import { FetchError } from '../errors.js';
import { fixedDelay, retrySchedule, type RetryPolicy } from './RetryPolicy.js';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

export const isHtmlResponse = (
  response: Pick<HttpResponse, 'status' | 'headers'>
): boolean => {
  const contentType = (response.headers['content-type'] ?? '').toLowerCase();
  return (
    response.status === 200 &&
    HTML_CONTENT_TYPES.some((type) => contentType.includes(type))
  );
};

/**
 * Retrieves page HTML with bounded retries.
 *
 * Every attempt, the first and each retry, waits for the domain's slot in
 * the {@link PolitenessGate} before it goes out. Only transport failures are
 * retried. A response that arrives is final: a 200 HTML response yields its
 * body, anything else yields `None` without reading the body or consuming an
 * attempt.
 *
 * @group Services
 * @public
 */
export class FetcherService extends Effect.Service<FetcherService>()(
  'crawlgraph/FetcherService',
  {
    effect: Effect.gen(function* () {
      const transport = yield* HttpTransport;
      const gate = yield* PolitenessGate;
      const config = yield* CrawlerConfig;
      const logger = yield* CrawlLogger;
      const options = yield* config.getOptions();

      const policy: RetryPolicy = fixedDelay(
        options.fetchAttempts,
        `${options.retryDelayMs} millis`
      );

      const attempt = (url: string) =>
        Effect.gen(function* () {
          yield* gate.waitForSlot(url);
          const response = yield* transport.get(url, {
            timeout: `${options.fetchTimeoutMs} millis`,
            headers: { 'user-agent': options.userAgent },
          });

          if (!isHtmlResponse(response)) {
            yield* response.discard;
            yield* logger.logTaskSkipped(url, 'content_rejected', {
              status: response.status,
              contentType: response.headers['content-type'] ?? '',
            });
            return Option.none<string>();
          }

          return Option.some(yield* response.text);
        });

      return {
        policy,

        fetch: (
          url: string
        ): Effect.Effect<Option.Option<string>, FetchError> =>
          Effect.gen(function* () {
            const attempts = yield* Ref.make(0);

            return yield* Ref.updateAndGet(attempts, (n) => n + 1).pipe(
              Effect.zipRight(attempt(url)),
              Effect.tapError((error) =>
                Effect.flatMap(Ref.get(attempts), (count) =>
                  count < policy.maxAttempts
                    ? logger.logFetchRetry(url, count, error.message)
                    : Effect.void
                )
              ),
              Effect.retry(retrySchedule(policy)),
              Effect.catchAll((error) =>
                Effect.flatMap(Ref.get(attempts), (count) =>
                  logger
                    .logFetchFailed(url, count, error.message)
                    .pipe(Effect.zipRight(Effect.fail(FetchError.exhausted(url, count, error))))
                )
              )
            );
          }),
      };
    }),
  }
) {}
