/**
 * GraphSink Tests
 * In-memory graph accumulation and DOT rendering
 */

import { describe, expect, it } from 'vitest';
import { Effect } from 'effect';
import { makeInMemoryGraphSink, renderDot } from '../../../lib/GraphSink/GraphSink.js';

describe('InMemoryGraphSink', () => {
  it('should render nodes, placeholder targets and coloured edges', async () => {
    const sink = makeInMemoryGraphSink();

    const dot = await Effect.runPromise(
      Effect.gen(function* () {
        yield* sink.addNode('https://s.test/', 'Home "Page"', 'Welcome', 'seed');
        yield* sink.addEdge('https://s.test/', 'https://s.test/a', 'internal');
        yield* sink.addEdge('https://s.test/', 'https://s.test/a', 'internal');
        yield* sink.addEdge('https://s.test/', 'https://x.test/', 'external');
        return yield* sink.render();
      })
    );

    expect(dot).toBe(
      [
        'digraph crawl {',
        '  graph [rankdir=LR];',
        '  node [shape=box, style=filled, fontcolor=white];',
        '  "https://s.test/" [label="Home \\"Page\\"", tooltip="Welcome", fillcolor="#e4572e"];',
        '  "https://s.test/a" [label="https://s.test/a", fillcolor="#d3d3d3"];',
        '  "https://x.test/" [label="https://x.test/", fillcolor="#d3d3d3"];',
        '  "https://s.test/" -> "https://s.test/a" [color="#7a7a7a"];',
        '  "https://s.test/" -> "https://x.test/" [color="#f3a712"];',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should keep the first write for a node', async () => {
    const sink = makeInMemoryGraphSink();

    await Effect.runPromise(
      Effect.gen(function* () {
        yield* sink.addNode('https://s.test/', 'First', 'first', 'seed');
        yield* sink.addNode('https://s.test/', 'Second', 'second', 'page');
      })
    );

    expect(sink.snapshot().nodes).toEqual([
      { id: 'https://s.test/', label: 'First', tooltip: 'first', colorTag: 'seed' },
    ]);
  });
});

describe('renderDot', () => {
  it('should flatten newlines and escape backslashes', () => {
    const dot = renderDot({
      nodes: [{ id: 'n', label: 'two\nlines', tooltip: 'C:\\path', colorTag: 'page' }],
      edges: [],
    });
    expect(dot.split('\n')[3]).toBe(
      '  "n" [label="two lines", tooltip="C:\\\\path", fillcolor="#4c8bf5"];'
    );
  });

  it('should render an empty graph', () => {
    expect(renderDot({ nodes: [], edges: [] })).toBe(
      'digraph crawl {\n  graph [rankdir=LR];\n  node [shape=box, style=filled, fontcolor=white];\n}\n'
    );
  });
});
