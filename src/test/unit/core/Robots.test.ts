/**
 * Robots Tests
 * Tests for robots.txt parsing, rule matching and per-domain caching
 */

import { describe, expect, it } from 'vitest';
import { Effect, Option } from 'effect';
import {
  RobotsService,
  isPathAllowed,
  parseRobotsTxt,
} from '../../../lib/Robots/Robots.service.js';
import { alwaysRefused, makeTestCrawler, robots } from '../../helpers/CrawlTestKit.js';

describe('parseRobotsTxt', () => {
  it('should keep only the wildcard group', () => {
    const policy = parseRobotsTxt(
      [
        'User-agent: OtherBot',
        'Disallow: /',
        '',
        'User-agent: *',
        'Disallow: /private # members only',
        'Allow: /private/press',
        'Crawl-delay: 2',
      ].join('\n')
    );
    expect(policy.rules).toEqual([
      { allow: false, path: '/private' },
      { allow: true, path: '/private/press' },
    ]);
    expect(policy.crawlDelaySeconds).toEqual(Option.some(2));
  });

  it('should treat consecutive user-agent lines as one group', () => {
    const policy = parseRobotsTxt(
      ['User-agent: OtherBot', 'User-agent: *', 'Disallow: /tmp'].join('\r\n')
    );
    expect(policy.rules).toEqual([{ allow: false, path: '/tmp' }]);
  });

  it('should ignore an empty Disallow and an invalid Crawl-delay', () => {
    const policy = parseRobotsTxt('User-agent: *\nDisallow:\nCrawl-delay: soon');
    expect(policy.rules).toEqual([]);
    expect(Option.isNone(policy.crawlDelaySeconds)).toBe(true);
  });
});

describe('isPathAllowed', () => {
  const policy = parseRobotsTxt(
    [
      'User-agent: *',
      'Disallow: /private',
      'Allow: /private/press',
      'Disallow: /*.php$',
      'Disallow: /search?',
      'Allow: /shared',
      'Disallow: /shared',
    ].join('\n')
  );

  it('should block paths under a disallowed prefix', () => {
    expect(isPathAllowed(policy, 'https://site.test/private/secret')).toBe(false);
  });

  it('should let the longest matching rule win', () => {
    expect(isPathAllowed(policy, 'https://site.test/private/press/2024')).toBe(true);
  });

  it('should prefer Allow when rules are equally long', () => {
    expect(isPathAllowed(policy, 'https://site.test/shared/doc')).toBe(true);
  });

  it('should support wildcards and end anchors', () => {
    expect(isPathAllowed(policy, 'https://site.test/app/index.php')).toBe(false);
    expect(isPathAllowed(policy, 'https://site.test/app/index.php?x=1')).toBe(true);
  });

  it('should match against the query string', () => {
    expect(isPathAllowed(policy, 'https://site.test/search?q=a')).toBe(false);
    expect(isPathAllowed(policy, 'https://site.test/search')).toBe(true);
  });

  it('should allow paths no rule matches', () => {
    expect(isPathAllowed(policy, 'https://site.test/about')).toBe(true);
  });
});

describe('RobotsService', () => {
  it('should fetch robots.txt once per domain under concurrent lookups', async () => {
    const { http, log, layer } = makeTestCrawler({
      'https://site.test/robots.txt': robots('User-agent: *\nDisallow: /private'),
    });

    const decisions = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* RobotsService;
        return yield* Effect.forEach(
          ['/a', '/private/x', '/b', '/private', '/c'],
          (path) => service.isAllowed(`https://site.test${path}`),
          { concurrency: 'unbounded' }
        );
      }).pipe(Effect.provide(layer))
    );

    expect(decisions).toEqual([true, false, true, false, true]);
    expect(http.requestsFor('https://site.test/robots.txt')).toHaveLength(1);
    expect(log.ofType('robots_policy').map((event) => event.details?.status)).toEqual(['loaded']);
  });

  it('should send the configured user agent', async () => {
    const { http, layer } = makeTestCrawler({}, { userAgent: 'TestCrawler/0.1' });

    await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* RobotsService;
        yield* service.isAllowed('https://site.test/');
      }).pipe(Effect.provide(layer))
    );

    expect(http.requests[0]?.userAgent).toBe('TestCrawler/0.1');
  });

  it('should allow everything when robots.txt is missing', async () => {
    const { log, layer } = makeTestCrawler({});

    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* RobotsService;
        const allowed = yield* service.isAllowed('https://site.test/anything');
        const policy = yield* service.policyFor('https://site.test/');
        return { allowed, hasPolicy: Option.isSome(policy) };
      }).pipe(Effect.provide(layer))
    );

    expect(result).toEqual({ allowed: true, hasPolicy: false });
    expect(log.ofType('robots_policy')[0]?.details).toEqual({
      status: 'unavailable',
      httpStatus: 404,
    });
  });

  it('should fail open when robots.txt cannot be fetched', async () => {
    const { http, log, layer } = makeTestCrawler({
      'https://down.test/robots.txt': alwaysRefused,
    });

    const allowed = await Effect.runPromise(
      Effect.gen(function* () {
        const service = yield* RobotsService;
        const first = yield* service.isAllowed('https://down.test/page');
        const second = yield* service.isAllowed('https://down.test/other');
        return [first, second];
      }).pipe(Effect.provide(layer))
    );

    expect(allowed).toEqual([true, true]);
    expect(http.requestsFor('https://down.test/robots.txt')).toHaveLength(1);
    expect(log.ofType('robots_policy')[0]?.message).toBe(
      'No robots.txt policy for down.test, crawling unrestricted'
    );
  });
});
