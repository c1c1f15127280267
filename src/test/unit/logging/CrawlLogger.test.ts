import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Effect } from 'effect';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  jsonlFileWriter,
  makeCrawlLogger,
  type CrawlLogEvent,
} from '../../../lib/Logging/CrawlLogger.service.js';

let logDir: string;

beforeEach(() => {
  logDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'crawlgraph-log-')), 'logs');
});

afterEach(() => {
  fs.rmSync(path.dirname(logDir), { recursive: true, force: true });
});

describe('makeCrawlLogger', () => {
  it('should build page events with the domain and details', () => {
    const events: CrawlLogEvent[] = [];
    const logger = makeCrawlLogger((event) => Effect.sync(() => void events.push(event)));

    Effect.runSync(logger.logPageCrawled('https://site.test/a', 1, 3));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'page_crawled',
      domain: 'site.test',
      url: 'https://site.test/a',
      message: 'Crawled page #3 at depth 1: https://site.test/a',
      details: { depth: 1, pageNumber: 3 },
    });
    expect(Number.isNaN(Date.parse(events[0]?.timestamp ?? ''))).toBe(false);
  });

  it('should hand the same event to every writer', () => {
    const first: CrawlLogEvent[] = [];
    const second: CrawlLogEvent[] = [];
    const logger = makeCrawlLogger(
      (event) => Effect.sync(() => void first.push(event)),
      (event) => Effect.sync(() => void second.push(event))
    );

    Effect.runSync(logger.logTaskSkipped('https://site.test/p', 'robots_disallowed'));

    expect(second).toEqual(first);
    expect(first[0]?.details).toEqual({ reason: 'robots_disallowed' });
  });
});

describe('jsonlFileWriter', () => {
  it('should create the directory and append one JSON line per event', () => {
    const logger = makeCrawlLogger(jsonlFileWriter(logDir));

    Effect.runSync(logger.logCrawlLifecycle('start', { seeds: ['https://site.test/'] }));
    Effect.runSync(logger.logRateLimitWait('site.test', 250));

    const files = fs.readdirSync(logDir);
    expect(files).toHaveLength(1);
    const lines = fs
      .readFileSync(path.join(logDir, files[0] ?? ''), 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    expect(lines.map((line) => line.type)).toEqual(['crawl_lifecycle', 'rate_limit_wait']);
    expect(lines[1].message).toBe('Waiting 250ms for a slot on site.test');
  });
});
