import dagre from 'dagre';
import type { GraphModel, LayoutWarning } from './types.js';

export type Adjacency = dagre.graphlib.Graph;

export interface Layering {
  layerOf: Map<string, number>;
  /** Node ids per layer, in graph insertion order. */
  layers: string[][];
  /** Indices of edges left out of layering because they close a cycle. */
  excluded: Set<number>;
  warnings: LayoutWarning[];
}

/**
 * Multigraph keyed by node id; each edge is named by its index in
 * `graph.edges` so parallel edges stay distinct.
 */
export function buildAdjacency(graph: GraphModel): Adjacency {
  const g = new dagre.graphlib.Graph({ directed: true, multigraph: true });
  for (const node of graph.nodes) g.setNode(node.id, { label: node.label });
  graph.edges.forEach((edge, index) => g.setEdge(edge.from, edge.to, { index }, String(index)));
  return g;
}

function edgeIndices(edges: dagre.Edge[] | undefined): number[] {
  return (edges ?? []).map((e) => Number(e.name)).sort((a, b) => a - b);
}

export function outEdgeIndices(g: Adjacency, id: string): number[] {
  return edgeIndices(g.outEdges(id));
}

export function inEdgeIndices(g: Adjacency, id: string): number[] {
  return edgeIndices(g.inEdges(id));
}

type VisitState = 'active' | 'done';

interface Frame {
  id: string;
  edges: number[];
  next: number;
}

/**
 * Depth-first walk that drops every edge reaching a node still on the stack.
 * Returns the finishing order and the dropped edges.
 */
function breakCycles(graph: GraphModel, g: Adjacency): { postorder: string[]; excluded: Set<number> } {
  const state = new Map<string, VisitState>();
  const postorder: string[] = [];
  const excluded = new Set<number>();

  const sources = graph.nodes.filter((n) => inEdgeIndices(g, n.id).length === 0).map((n) => n.id);
  const roots = [...sources, ...graph.nodes.map((n) => n.id)];

  for (const root of roots) {
    if (state.has(root)) continue;
    state.set(root, 'active');
    const stack: Frame[] = [{ id: root, edges: outEdgeIndices(g, root), next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.edges.length) {
        state.set(frame.id, 'done');
        postorder.push(frame.id);
        stack.pop();
        continue;
      }
      const edgeIndex = frame.edges[frame.next];
      frame.next += 1;
      const target = graph.edges[edgeIndex].to;
      const seen = state.get(target);
      if (seen === 'active') {
        excluded.add(edgeIndex);
      } else if (seen === undefined) {
        state.set(target, 'active');
        stack.push({ id: target, edges: outEdgeIndices(g, target), next: 0 });
      }
    }
  }

  return { postorder, excluded };
}

/**
 * Longest-path layering over the edges that survive cycle breaking: sources
 * sit on layer 0, every other node one past its deepest predecessor.
 */
export function assignLayers(graph: GraphModel, g: Adjacency = buildAdjacency(graph)): Layering {
  const { postorder, excluded } = breakCycles(graph, g);
  const layerOf = new Map<string, number>();

  for (let i = postorder.length - 1; i >= 0; i--) {
    const id = postorder[i];
    let layer = 0;
    for (const edgeIndex of inEdgeIndices(g, id)) {
      if (excluded.has(edgeIndex)) continue;
      const pred = layerOf.get(graph.edges[edgeIndex].from);
      if (pred !== undefined) layer = Math.max(layer, pred + 1);
    }
    layerOf.set(id, layer);
  }

  const depth = Math.max(-1, ...layerOf.values()) + 1;
  const layers: string[][] = Array.from({ length: depth }, () => []);
  for (const node of graph.nodes) {
    const layer = layerOf.get(node.id) ?? 0;
    layers[layer].push(node.id);
  }

  const warnings: LayoutWarning[] = [...excluded].sort((a, b) => a - b).map((edgeIndex) => {
    const { from, to } = graph.edges[edgeIndex];
    return {
      code: 'CYCLE_EXCLUDED',
      message: `Edge ${from} -> ${to} closes a cycle; it is drawn but does not constrain layers`,
      edgeIndex,
      from,
      to,
    };
  });

  return { layerOf, layers, excluded, warnings };
}
