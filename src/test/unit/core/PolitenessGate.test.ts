/**
 * PolitenessGate Tests
 * Per-domain spacing and Crawl-delay handling
 */

import { describe, expect, it } from 'vitest';
import { Effect } from 'effect';
import { PolitenessGate } from '../../../lib/Politeness/PolitenessGate.service.js';
import { makeTestCrawler, robots } from '../../helpers/CrawlTestKit.js';

const gaps = (times: ReadonlyArray<number>) => {
  const sorted = [...times].sort((a, b) => a - b);
  return sorted.slice(1).map((time, i) => time - sorted[i]);
};

describe('PolitenessGate', () => {
  it('should space same-domain slots by the rate limit', async () => {
    const { layer } = makeTestCrawler({}, { rateLimitSeconds: 0.05 });

    const slots = await Effect.runPromise(
      Effect.gen(function* () {
        const gate = yield* PolitenessGate;
        return yield* Effect.forEach(
          ['/a', '/b', '/c', '/d'],
          (path) => gate.waitForSlot(`https://site.test${path}`),
          { concurrency: 'unbounded' }
        );
      }).pipe(Effect.provide(layer))
    );

    for (const gap of gaps(slots)) {
      expect(gap).toBeGreaterThanOrEqual(50);
    }
  });

  it('should not delay different domains against each other', async () => {
    const { log, layer } = makeTestCrawler({}, { rateLimitSeconds: 1 });

    const elapsedMs = await Effect.runPromise(
      Effect.gen(function* () {
        const gate = yield* PolitenessGate;
        const slots = yield* Effect.forEach(
          ['https://one.test/', 'https://two.test/', 'https://three.test/'],
          (url) => gate.waitForSlot(url),
          { concurrency: 'unbounded' }
        );
        return Math.max(...slots) - Math.min(...slots);
      }).pipe(Effect.provide(layer))
    );

    expect(elapsedMs).toBeLessThan(1000);
    expect(log.ofType('rate_limit_wait')).toHaveLength(0);
  });

  it('should log the wait when a slot is not yet free', async () => {
    const { log, layer } = makeTestCrawler({}, { rateLimitSeconds: 0.02 });

    await Effect.runPromise(
      Effect.gen(function* () {
        const gate = yield* PolitenessGate;
        yield* gate.waitForSlot('https://site.test/a');
        yield* gate.waitForSlot('https://site.test/b');
      }).pipe(Effect.provide(layer))
    );

    const waits = log.ofType('rate_limit_wait');
    expect(waits).toHaveLength(1);
    expect(waits[0]?.domain).toBe('site.test');
  });

  it('should raise the interval to a larger Crawl-delay', async () => {
    const { layer } = makeTestCrawler(
      {
        'https://slow.test/robots.txt': robots('User-agent: *\nCrawl-delay: 3'),
        'https://fast.test/robots.txt': robots('User-agent: *\nCrawl-delay: 0.5'),
      },
      { rateLimitSeconds: 1 }
    );

    const intervals = await Effect.runPromise(
      Effect.gen(function* () {
        const gate = yield* PolitenessGate;
        return [
          yield* gate.effectiveIntervalMs('https://slow.test/'),
          yield* gate.effectiveIntervalMs('https://fast.test/'),
          yield* gate.effectiveIntervalMs('https://plain.test/'),
        ];
      }).pipe(Effect.provide(layer))
    );

    expect(intervals).toEqual([3000, 1000, 1000]);
  });

  it('should space slots by a Crawl-delay above the rate limit', async () => {
    const { layer } = makeTestCrawler(
      { 'https://slow.test/robots.txt': robots('User-agent: *\nCrawl-delay: 0.1') },
      { rateLimitSeconds: 0.001 }
    );

    const slots = await Effect.runPromise(
      Effect.gen(function* () {
        const gate = yield* PolitenessGate;
        return yield* Effect.forEach(
          ['/a', '/b', '/c'],
          (path) => gate.waitForSlot(`https://slow.test${path}`),
          { concurrency: 'unbounded' }
        );
      }).pipe(Effect.provide(layer))
    );

    expect(gaps(slots)).toHaveLength(2);
    for (const gap of gaps(slots)) {
      expect(gap).toBeGreaterThanOrEqual(100);
    }
  });

  it('should delegate robots decisions', async () => {
    const { layer } = makeTestCrawler({
      'https://site.test/robots.txt': robots('User-agent: *\nDisallow: /private'),
    });

    const decisions = await Effect.runPromise(
      Effect.gen(function* () {
        const gate = yield* PolitenessGate;
        return [
          yield* gate.isAllowed('https://site.test/private/page'),
          yield* gate.isAllowed('https://site.test/public'),
        ];
      }).pipe(Effect.provide(layer))
    );

    expect(decisions).toEqual([false, true]);
  });
});
