import type { GraphModel } from './types.js';
import type { CanonicalBox, CanonicalFrame } from './coordinates.js';

export interface CanonicalPoint {
  u: number;
  v: number;
}

export interface CanonicalRoute {
  index: number;
  points: CanonicalPoint[];
  /** Shared branching cell when several edges leave the same node. */
  junction?: CanonicalPoint;
  groupIndex?: number;
  groupSize?: number;
  back: boolean;
}

/** Edges whose target does not sit on a later layer than the source (cycles, self-loops). */
export function backEdgeIndices(graph: GraphModel, layerOf: Map<string, number>): number[] {
  const out: number[] = [];
  graph.edges.forEach((edge, i) => {
    if ((layerOf.get(edge.to) ?? 0) <= (layerOf.get(edge.from) ?? 0)) out.push(i);
  });
  return out;
}

function centre(box: CanonicalBox): number {
  return box.u + Math.floor(box.cross / 2);
}

/**
 * Forward edges spanning more than one layer whose straight descent would
 * run through a box on a layer in between. Those take a lane of their own.
 */
export function blockedSkipEdges(graph: GraphModel, frame: CanonicalFrame): number[] {
  const byLayer = new Map<number, CanonicalBox[]>();
  for (const box of frame.boxes.values()) {
    const list = byLayer.get(box.layer);
    if (list) list.push(box);
    else byLayer.set(box.layer, [box]);
  }
  const out: number[] = [];
  graph.edges.forEach((edge, i) => {
    if (edge.kind === 'invisible') return;
    const source = frame.boxes.get(edge.from);
    const target = frame.boxes.get(edge.to);
    if (!source || !target || target.layer - source.layer < 2) return;
    const column = centre(target);
    for (let l = source.layer + 1; l < target.layer; l++) {
      if ((byLayer.get(l) ?? []).some((b) => b.u <= column && column < b.u + b.cross)) {
        out.push(i);
        return;
      }
    }
  });
  return out;
}

/** First cell past the source's exit border. */
export function exitAnchor(box: CanonicalBox): CanonicalPoint {
  return { u: centre(box), v: box.v + box.flow };
}

/** Cell that receives the arrowhead, `clearance` cells clear of the entry border. */
export function entryAnchor(box: CanonicalBox, clearance: number): CanonicalPoint {
  return { u: centre(box), v: box.v - 1 - clearance };
}

function dedupe(points: CanonicalPoint[]): CanonicalPoint[] {
  return points.filter((p, i) => i === 0 || p.u !== points[i - 1].u || p.v !== points[i - 1].v);
}

/**
 * Orthogonal routes in the canonical frame. Forward edges drop out of the
 * source, run across on the row below it and descend to the target; edges
 * sharing a source branch from one junction cell. Back edges, then blocked
 * skip edges, detour through their own lane past the right edge of the
 * drawing.
 */
export function routeEdges(
  graph: GraphModel,
  frame: CanonicalFrame,
  back: number[],
  clearance: (id: string) => number,
  skip: number[] = [],
): CanonicalRoute[] {
  const boxOf = (id: string): CanonicalBox =>
    frame.boxes.get(id) ?? { id, layer: 0, order: 0, u: 0, v: 0, cross: 1, flow: 1 };
  const lane = new Map([...back, ...skip].map((index, i) => [index, frame.lanes[i] ?? 0] as const));
  const isBack = new Set(back);

  const routes: CanonicalRoute[] = graph.edges.map((edge, index) => {
    const S = exitAnchor(boxOf(edge.from));
    const E = entryAnchor(boxOf(edge.to), clearance(edge.to));
    const u = lane.get(index);
    if (u !== undefined) {
      const above = E.v - 1;
      return {
        index,
        back: isBack.has(index),
        points: dedupe([S, { u, v: S.v }, { u, v: above }, { u: E.u, v: above }, E]),
      };
    }
    return { index, back: false, points: dedupe([S, { u: E.u, v: S.v }, E]) };
  });

  const bySource = new Map<string, CanonicalRoute[]>();
  for (const route of routes) {
    const from = graph.edges[route.index].from;
    const list = bySource.get(from);
    if (list) list.push(route);
    else bySource.set(from, [route]);
  }

  for (const [from, group] of bySource) {
    if (group.length < 2) continue;
    const junction = exitAnchor(boxOf(from));
    const targetKey = (r: CanonicalRoute) => boxOf(graph.edges[r.index].to);
    const sorted = [...group].sort((a, b) => {
      const ta = targetKey(a);
      const tb = targetKey(b);
      return ta.u - tb.u || ta.v - tb.v || (ta.id < tb.id ? -1 : ta.id > tb.id ? 1 : 0) || a.index - b.index;
    });
    sorted.forEach((route, i) => {
      route.junction = junction;
      route.groupIndex = i;
      route.groupSize = sorted.length;
    });
  }

  return routes;
}
