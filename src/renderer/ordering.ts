import type { GraphModel } from './types.js';
import type { Layering } from './layering.js';

/**
 * Index of each node's first appearance in the edge list; nodes without
 * edges follow in insertion order. This is both the starting order and the
 * tie-break of every sweep.
 */
export function firstAppearance(graph: GraphModel): Map<string, number> {
  const seen = new Map<string, number>();
  const visit = (id: string) => {
    if (!seen.has(id)) seen.set(id, seen.size);
  };
  for (const edge of graph.edges) {
    visit(edge.from);
    visit(edge.to);
  }
  for (const node of graph.nodes) visit(node.id);
  return seen;
}

function neighbourMap(graph: GraphModel): Map<string, string[]> {
  const out = new Map<string, string[]>();
  const add = (a: string, b: string) => {
    const list = out.get(a);
    if (list) list.push(b);
    else out.set(a, [b]);
  };
  for (const edge of graph.edges) {
    if (edge.from === edge.to) continue;
    add(edge.from, edge.to);
    add(edge.to, edge.from);
  }
  return out;
}

/** Reorder `layer` in place by barycenter against `fixed`. Reports whether anything moved. */
function sweep(
  layer: string[],
  fixed: string[],
  neighbours: Map<string, string[]>,
  key: (id: string) => number,
): boolean {
  const pos = new Map(fixed.map((id, i) => [id, i] as const));
  const bary = new Map<string, number>();
  layer.forEach((id, i) => {
    const idx = (neighbours.get(id) ?? []).flatMap((n) => {
      const p = pos.get(n);
      return p === undefined ? [] : [p];
    });
    bary.set(id, idx.length > 0 ? idx.reduce((s, p) => s + p, 0) / idx.length : i);
  });

  const sorted = [...layer].sort((a, b) => (bary.get(a) ?? 0) - (bary.get(b) ?? 0) || key(a) - key(b));
  const changed = sorted.some((id, i) => id !== layer[i]);
  layer.splice(0, layer.length, ...sorted);
  return changed;
}

/**
 * Barycenter ordering: alternate down and up sweeps for `passes` rounds or
 * until a round changes nothing.
 */
export function orderLayers(graph: GraphModel, layering: Layering, passes: number): string[][] {
  const appearance = firstAppearance(graph);
  const key = (id: string) => appearance.get(id) ?? 0;
  const order = layering.layers.map((layer) => [...layer].sort((a, b) => key(a) - key(b)));
  const neighbours = neighbourMap(graph);

  for (let pass = 0; pass < passes; pass++) {
    let changed = false;
    for (let l = 1; l < order.length; l++) {
      changed = sweep(order[l], order[l - 1], neighbours, key) || changed;
    }
    for (let l = order.length - 2; l >= 0; l--) {
      changed = sweep(order[l], order[l + 1], neighbours, key) || changed;
    }
    if (!changed) break;
  }

  return order;
}
