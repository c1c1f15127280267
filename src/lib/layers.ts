import { Layer } from 'effect';
import type { CrawlerConfig } from './Config/CrawlerConfig.service.js';
import { CrawlerService } from './Crawler/Crawler.service.js';
import { PageExtractorService } from './Extractor/PageExtractor.service.js';
import { FetcherService } from './Fetcher/Fetcher.service.js';
import { GraphSink, InMemoryGraphSinkLive } from './GraphSink/GraphSink.js';
import { FetchHttpTransportLive, HttpTransport } from './HttpClient/HttpTransport.js';
import { CrawlLogger, CrawlLoggerLive } from './Logging/CrawlLogger.service.js';
import { PolitenessGate } from './Politeness/PolitenessGate.service.js';
import { RobotsService } from './Robots/Robots.service.js';

/**
 * Replacements for the edge services of a crawler layer. Tests swap in an
 * in-process transport and a collecting logger here.
 */
export interface CrawlerLayerOverrides {
  readonly transport?: Layer.Layer<HttpTransport>;
  readonly logger?: Layer.Layer<CrawlLogger>;
  readonly graph?: Layer.Layer<GraphSink>;
}

/**
 * Builds the full service graph around a configuration layer. Every service
 * is part of the output, so callers can reach the gate or the graph sink
 * used by the crawler.
 */
export const makeCrawlerLayer = <E>(
  config: Layer.Layer<CrawlerConfig, E>,
  overrides: CrawlerLayerOverrides = {}
) => {
  const edges = Layer.mergeAll(
    config,
    overrides.transport ?? FetchHttpTransportLive,
    overrides.logger ?? CrawlLoggerLive,
    overrides.graph ?? InMemoryGraphSinkLive
  );

  return CrawlerService.Default.pipe(
    Layer.provideMerge(
      Layer.mergeAll(FetcherService.Default, PageExtractorService.Default)
    ),
    Layer.provideMerge(PolitenessGate.Default),
    Layer.provideMerge(RobotsService.Default),
    Layer.provideMerge(edges)
  );
};
