import { Effect, MutableHashSet } from 'effect';
import { normalizeUrl } from '../UrlFilter/UrlFilter.js';

/**
 * Result of {@link VisitedSet.reserve}.
 */
export type ReserveResult = 'added' | 'duplicate' | 'full';

/**
 * Set of URLs admitted for fetching during one crawl run.
 *
 * Every operation runs under a single mutex, so check-and-insert is one
 * indivisible step even when many tasks race on the same URL. URLs are
 * normalized before storage.
 *
 * @group Data Types
 * @public
 */
export interface VisitedSet {
  /**
   * Inserts the URL unless present.
   *
   * @returns true if this call inserted it
   */
  readonly tryAdd: (url: string) => Effect.Effect<boolean>;

  /**
   * Inserts the URL only if it is new and the set holds fewer than `limit`
   * entries, as one atomic step.
   */
  readonly reserve: (url: string, limit: number) => Effect.Effect<ReserveResult>;

  readonly contains: (url: string) => Effect.Effect<boolean>;

  readonly size: () => Effect.Effect<number>;
}

export const makeVisitedSet = (): Effect.Effect<VisitedSet> =>
  Effect.gen(function* () {
    const seenUrls = MutableHashSet.empty<string>();
    const mutex = yield* Effect.makeSemaphore(1);

    return {
      tryAdd: (url) =>
        mutex.withPermits(1)(
          Effect.sync(() => {
            const normalizedUrl = normalizeUrl(url);
            if (MutableHashSet.has(seenUrls, normalizedUrl)) {
              return false;
            }
            MutableHashSet.add(seenUrls, normalizedUrl);
            return true;
          })
        ),

      reserve: (url, limit) =>
        mutex.withPermits(1)(
          Effect.sync((): ReserveResult => {
            const normalizedUrl = normalizeUrl(url);
            if (MutableHashSet.has(seenUrls, normalizedUrl)) {
              return 'duplicate';
            }
            if (MutableHashSet.size(seenUrls) >= limit) {
              return 'full';
            }
            MutableHashSet.add(seenUrls, normalizedUrl);
            return 'added';
          })
        ),

      contains: (url) =>
        mutex.withPermits(1)(
          Effect.sync(() => MutableHashSet.has(seenUrls, normalizeUrl(url)))
        ),

      size: () =>
        mutex.withPermits(1)(Effect.sync(() => MutableHashSet.size(seenUrls))),
    };
  });
