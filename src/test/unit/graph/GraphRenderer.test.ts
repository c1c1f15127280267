import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Effect, Fiber, Layer } from 'effect';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GraphSink, makeInMemoryGraphSink } from '../../../lib/GraphSink/GraphSink.js';
import { renderPeriodically, renderToFile } from '../../../lib/GraphSink/GraphRenderer.js';
import { makeCollectingLogger } from '../../helpers/CrawlTestKit.js';

let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crawlgraph-render-'));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

const seededSink = () => {
  const sink = makeInMemoryGraphSink();
  Effect.runSync(sink.addNode('https://s.test/', 'Home', 'Welcome', 'seed'));
  return sink;
};

describe('renderToFile', () => {
  it('should create missing directories and write the artifact', async () => {
    const sink = seededSink();
    const outputPath = path.join(workDir, 'nested', 'graph.dot');

    const bytes = await Effect.runPromise(
      renderToFile(outputPath).pipe(Effect.provide(Layer.succeed(GraphSink, sink)))
    );

    const written = fs.readFileSync(outputPath, 'utf-8');
    expect(written).toBe(Effect.runSync(sink.render()));
    expect(bytes).toBe(written.length);
  });

  it('should fail with FileSystemError when the directory cannot be created', async () => {
    const blocker = path.join(workDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');

    const error = await Effect.runPromise(
      renderToFile(path.join(blocker, 'graph.dot')).pipe(
        Effect.flip,
        Effect.provide(Layer.succeed(GraphSink, seededSink()))
      )
    );

    expect(error._tag).toBe('FileSystemError');
    expect(error.operation).toBe('create');
    expect(error.path).toBe(blocker);
  });
});

describe('renderPeriodically', () => {
  it('should keep re-rendering until interrupted', async () => {
    const log = makeCollectingLogger();
    const outputPath = path.join(workDir, 'live.dot');

    await Effect.runPromise(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(renderPeriodically(outputPath, '10 millis'));
        yield* Effect.sleep('45 millis');
        yield* Fiber.interrupt(fiber);
      }).pipe(
        Effect.provide(Layer.merge(Layer.succeed(GraphSink, seededSink()), log.layer))
      )
    );

    expect(log.ofType('graph_render').length).toBeGreaterThanOrEqual(2);
    expect(fs.existsSync(outputPath)).toBe(true);
  });

  it('should log write failures and carry on', async () => {
    const log = makeCollectingLogger();
    const blocker = path.join(workDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');

    await Effect.runPromise(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(
          renderPeriodically(path.join(blocker, 'graph.dot'), '10 millis')
        );
        yield* Effect.sleep('35 millis');
        yield* Fiber.interrupt(fiber);
      }).pipe(
        Effect.provide(Layer.merge(Layer.succeed(GraphSink, seededSink()), log.layer))
      )
    );

    expect(log.ofType('sink_error').length).toBeGreaterThanOrEqual(2);
    expect(log.ofType('sink_error')[0]?.details?.operation).toBe('create');
  });
});
