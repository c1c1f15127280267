import { Context, Effect, Layer } from 'effect';

export type NodeColorTag = 'seed' | 'page';
export type EdgeColorTag = 'internal' | 'external';

/**
 * Receiver of crawl results for visualization. The crawler only appends to
 * it and never reads back.
 */
export interface GraphSink {
  readonly addNode: (
    id: string,
    label: string,
    tooltip: string,
    colorTag: NodeColorTag
  ) => Effect.Effect<void>;
  readonly addEdge: (
    fromId: string,
    toId: string,
    colorTag: EdgeColorTag
  ) => Effect.Effect<void>;
  /** Produces the displayable artifact for the graph so far */
  readonly render: () => Effect.Effect<string>;
}

export const GraphSink = Context.GenericTag<GraphSink>('GraphSink');

export interface GraphNode {
  readonly id: string;
  readonly label: string;
  readonly tooltip: string;
  readonly colorTag: NodeColorTag;
}

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  readonly colorTag: EdgeColorTag;
}

export interface GraphSnapshot {
  readonly nodes: ReadonlyArray<GraphNode>;
  readonly edges: ReadonlyArray<GraphEdge>;
}

export interface InMemoryGraphSink extends GraphSink {
  readonly snapshot: () => GraphSnapshot;
}

const NODE_COLORS: Record<NodeColorTag | 'pending', string> = {
  seed: '#e4572e',
  page: '#4c8bf5',
  pending: '#d3d3d3',
};

const EDGE_COLORS: Record<EdgeColorTag, string> = {
  internal: '#7a7a7a',
  external: '#f3a712',
};

const quote = (value: string): string =>
  `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\r?\n/g, ' ')}"`;

/**
 * Renders a snapshot as a Graphviz DOT digraph. Nodes that only appear as
 * edge targets are drawn as grey `pending` placeholders.
 */
export const renderDot = ({ nodes, edges }: GraphSnapshot): string => {
  const known = new Set(nodes.map((node) => node.id));
  const pending = new Set<string>();
  for (const edge of edges) {
    for (const id of [edge.from, edge.to]) {
      if (!known.has(id)) pending.add(id);
    }
  }

  const lines = [
    'digraph crawl {',
    '  graph [rankdir=LR];',
    '  node [shape=box, style=filled, fontcolor=white];',
    ...nodes.map(
      (node) =>
        `  ${quote(node.id)} [label=${quote(node.label)}, tooltip=${quote(node.tooltip)}, fillcolor=${quote(NODE_COLORS[node.colorTag])}];`
    ),
    ...Array.from(pending).map(
      (id) => `  ${quote(id)} [label=${quote(id)}, fillcolor=${quote(NODE_COLORS.pending)}];`
    ),
    ...edges.map(
      (edge) =>
        `  ${quote(edge.from)} -> ${quote(edge.to)} [color=${quote(EDGE_COLORS[edge.colorTag])}];`
    ),
    '}',
  ];
  return lines.join('\n') + '\n';
};

/**
 * Append-only graph held in memory. The first `addNode` for an id wins and
 * repeated edges are kept once.
 */
export const makeInMemoryGraphSink = (): InMemoryGraphSink => {
  const nodes = new Map<string, GraphNode>();
  const edges = new Map<string, GraphEdge>();

  const snapshot = (): GraphSnapshot => ({
    nodes: Array.from(nodes.values()),
    edges: Array.from(edges.values()),
  });

  return {
    addNode: (id, label, tooltip, colorTag) =>
      Effect.sync(() => {
        if (!nodes.has(id)) {
          nodes.set(id, { id, label, tooltip, colorTag });
        }
      }),

    addEdge: (from, to, colorTag) =>
      Effect.sync(() => {
        const key = `${from}\u0000${to}`;
        if (!edges.has(key)) {
          edges.set(key, { from, to, colorTag });
        }
      }),

    render: () => Effect.sync(() => renderDot(snapshot())),

    snapshot,
  };
};

export const InMemoryGraphSinkLive = Layer.sync(GraphSink, makeInMemoryGraphSink);
