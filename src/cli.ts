#!/usr/bin/env node

/**
 * Command-line entry point.
 *
 *   crawlgraph [seed-url ...]
 *
 * Seeds given as arguments replace `CRAWLER_SEEDS`; every other option comes
 * from `CRAWLER_*` environment variables. The graph is re-rendered to the
 * output path while the crawl runs and once more when it finishes.
 */

import { Cause, Duration, Effect, Exit } from 'effect';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import {
  CrawlerConfig,
  loadCrawlerOptions,
} from './lib/Config/CrawlerConfig.service.js';
import { CrawlerService } from './lib/Crawler/Crawler.service.js';
import { ConfigurationError } from './lib/errors.js';
import { renderPeriodically, renderToFile } from './lib/GraphSink/GraphRenderer.js';
import { makeCrawlLoggerLayer } from './lib/Logging/CrawlLogger.service.js';
import { makeCrawlerLayer } from './lib/layers.js';

const crawlAndRender = Effect.gen(function* () {
  const config = yield* CrawlerConfig;
  const options = yield* config.getOptions();
  if (options.seeds.length === 0) {
    return yield* Effect.fail(
      new ConfigurationError({
        message: 'No seed URLs given; pass them as arguments or set CRAWLER_SEEDS',
      })
    );
  }

  const crawler = yield* CrawlerService;
  yield* Effect.forkScoped(
    renderPeriodically(
      options.outputPath,
      Duration.seconds(options.renderIntervalSeconds)
    )
  );

  const summary = yield* crawler.crawl();
  const bytes = yield* renderToFile(options.outputPath);

  yield* Effect.logInfo(
    `Crawled ${summary.pagesCrawled} page(s), skipped ${summary.skipped}, failed ${summary.failed} in ${summary.durationMs}ms; graph written to ${options.outputPath} (${bytes} bytes)`
  );
  return summary;
}).pipe(Effect.scoped);

export const main = (args: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const options = yield* loadCrawlerOptions(
      args.length > 0 ? { seeds: [...args] } : {}
    );
    const layer = makeCrawlerLayer(CrawlerConfig.Live(options), {
      logger: makeCrawlLoggerLayer(options.logDir),
    });
    return yield* crawlAndRender.pipe(Effect.provide(layer));
  });

const invokedDirectly =
  process.argv[1] !== undefined &&
  realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  Effect.runPromiseExit(main(process.argv.slice(2))).then((exit) => {
    if (Exit.isFailure(exit)) {
      console.error('Crawl failed:', Cause.pretty(exit.cause));
      process.exit(1);
    }
  });
}
