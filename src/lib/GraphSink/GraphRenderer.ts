import { Duration, Effect, Schedule } from 'effect';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FileSystemError } from '../errors.js';
import { CrawlLogger } from '../Logging/CrawlLogger.service.js';
import { GraphSink } from './GraphSink.js';

/**
 * Renders the current graph and writes it to `outputPath`.
 */
export const renderToFile = (outputPath: string) =>
  Effect.gen(function* () {
    const sink = yield* GraphSink;
    const artifact = yield* sink.render();
    const directory = path.dirname(outputPath);

    yield* Effect.tryPromise({
      try: () => fs.mkdir(directory, { recursive: true }),
      catch: (error) => FileSystemError.create(directory, error),
    });
    yield* Effect.tryPromise({
      try: () => fs.writeFile(outputPath, artifact, 'utf-8'),
      catch: (error) => FileSystemError.write(outputPath, error),
    });

    return artifact.length;
  });

/**
 * Re-renders the graph every `interval` until interrupted. Write failures are
 * logged and the loop carries on, so the crawl never waits on rendering.
 */
export const renderPeriodically = (
  outputPath: string,
  interval: Duration.DurationInput
) =>
  Effect.gen(function* () {
    const logger = yield* CrawlLogger;

    const renderOnce = renderToFile(outputPath).pipe(
      Effect.tap((bytes) =>
        logger.logEvent({
          type: 'graph_render',
          message: `Rendered graph to ${outputPath}`,
          details: { bytes },
        })
      ),
      Effect.catchAll((error) =>
        logger.logEvent({
          type: 'sink_error',
          message: `Graph render failed: ${error.message}`,
          details: { path: error.path, operation: error.operation },
        })
      )
    );

    yield* renderOnce.pipe(Effect.repeat(Schedule.spaced(interval)));
  });
