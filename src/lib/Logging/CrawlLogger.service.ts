import { Context, Effect, Layer, LogLevel } from 'effect';
import * as fs from 'fs';
import * as path from 'path';

export type CrawlLogEventType =
  | 'crawl_lifecycle'
  | 'page_crawled'
  | 'task_skipped'
  | 'fetch_retry'
  | 'fetch_failed'
  | 'task_failed'
  | 'rate_limit_wait'
  | 'robots_policy'
  | 'graph_render'
  | 'sink_error';

export interface CrawlLogEvent {
  timestamp: string;
  type: CrawlLogEventType;
  domain?: string;
  url?: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Why a task ended without producing a page record. These are expected
 * control-flow outcomes, not errors.
 */
export type SkipReason =
  | 'page_ceiling'
  | 'already_visited'
  | 'out_of_scope'
  | 'robots_disallowed'
  | 'content_rejected';

export interface CrawlLogger {
  readonly logEvent: (
    event: Omit<CrawlLogEvent, 'timestamp'>
  ) => Effect.Effect<void>;
  readonly logCrawlLifecycle: (
    event: 'start' | 'complete',
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logPageCrawled: (
    url: string,
    depth: number,
    pageNumber: number
  ) => Effect.Effect<void>;
  readonly logTaskSkipped: (
    url: string,
    reason: SkipReason,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logFetchRetry: (
    url: string,
    attempt: number,
    error: string
  ) => Effect.Effect<void>;
  readonly logFetchFailed: (
    url: string,
    attempts: number,
    error: string
  ) => Effect.Effect<void>;
  readonly logTaskFailed: (url: string, cause: string) => Effect.Effect<void>;
  readonly logRateLimitWait: (
    domain: string,
    waitMs: number
  ) => Effect.Effect<void>;
  readonly logRobotsPolicy: (
    domain: string,
    status: 'loaded' | 'unavailable',
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
}

export const CrawlLogger = Context.GenericTag<CrawlLogger>('CrawlLogger');

/**
 * A destination for crawl log events.
 */
export type CrawlLogWriter = (event: CrawlLogEvent) => Effect.Effect<void>;

const levelOf = (type: CrawlLogEventType): LogLevel.LogLevel => {
  switch (type) {
    case 'crawl_lifecycle':
    case 'page_crawled':
      return LogLevel.Info;
    case 'fetch_retry':
    case 'fetch_failed':
    case 'sink_error':
      return LogLevel.Warning;
    case 'task_failed':
      return LogLevel.Error;
    default:
      return LogLevel.Debug;
  }
};

/**
 * Routes events through Effect's logger, so the runtime's minimum log level
 * and logger implementation decide what reaches the console.
 */
export const consoleWriter: CrawlLogWriter = (event) =>
  Effect.logWithLevel(levelOf(event.type), `[${event.type}] ${event.message}`).pipe(
    Effect.annotateLogs({
      ...(event.domain ? { domain: event.domain } : {}),
      ...(event.url ? { url: event.url } : {}),
    })
  );

/**
 * Appends one JSON line per event to a timestamped file under `logDir`.
 */
export const jsonlFileWriter = (logDir: string): CrawlLogWriter => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFileName = `crawl-${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
  const logFilePath = path.join(logDir, logFileName);

  return (event) =>
    Effect.sync(() => {
      fs.appendFileSync(logFilePath, JSON.stringify(event) + '\n');
    });
};

export const makeCrawlLogger = (...writers: CrawlLogWriter[]): CrawlLogger => {
  const write = (event: Omit<CrawlLogEvent, 'timestamp'>) =>
    Effect.suspend(() => {
      const fullEvent: CrawlLogEvent = {
        ...event,
        timestamp: new Date().toISOString(),
      };
      return Effect.forEach(writers, (writer) => writer(fullEvent), {
        discard: true,
      });
    });

  return {
    logEvent: write,

    logCrawlLifecycle: (event, details) =>
      write({
        type: 'crawl_lifecycle',
        message: `Crawl ${event}`,
        details,
      }),

    logPageCrawled: (url, depth, pageNumber) =>
      write({
        type: 'page_crawled',
        domain: hostOf(url),
        url,
        message: `Crawled page #${pageNumber} at depth ${depth}: ${url}`,
        details: { depth, pageNumber },
      }),

    logTaskSkipped: (url, reason, details) =>
      write({
        type: 'task_skipped',
        domain: hostOf(url),
        url,
        message: `Skipped ${url} (${reason})`,
        details: { reason, ...details },
      }),

    logFetchRetry: (url, attempt, error) =>
      write({
        type: 'fetch_retry',
        domain: hostOf(url),
        url,
        message: `Attempt ${attempt} for ${url} failed: ${error}`,
        details: { attempt, error },
      }),

    logFetchFailed: (url, attempts, error) =>
      write({
        type: 'fetch_failed',
        domain: hostOf(url),
        url,
        message: `Fetch failed for ${url} after ${attempts} attempt(s)`,
        details: { attempts, error },
      }),

    logTaskFailed: (url, cause) =>
      write({
        type: 'task_failed',
        domain: hostOf(url),
        url,
        message: `Task for ${url} failed unexpectedly`,
        details: { cause },
      }),

    logRateLimitWait: (domain, waitMs) =>
      write({
        type: 'rate_limit_wait',
        domain,
        message: `Waiting ${waitMs}ms for a slot on ${domain}`,
        details: { waitMs },
      }),

    logRobotsPolicy: (domain, status, details) =>
      write({
        type: 'robots_policy',
        domain,
        message:
          status === 'loaded'
            ? `Loaded robots.txt for ${domain}`
            : `No robots.txt policy for ${domain}, crawling unrestricted`,
        details: { status, ...details },
      }),
  };
};

const hostOf = (url: string): string | undefined => {
  try {
    return new URL(url).host;
  } catch {
    return undefined;
  }
};

export const CrawlLoggerLive = Layer.succeed(
  CrawlLogger,
  makeCrawlLogger(consoleWriter)
);

/**
 * Console logging plus, when `logDir` is set, a JSONL event file.
 */
export const makeCrawlLoggerLayer = (logDir?: string) =>
  Layer.sync(CrawlLogger, () =>
    logDir
      ? makeCrawlLogger(consoleWriter, jsonlFileWriter(logDir))
      : makeCrawlLogger(consoleWriter)
  );
