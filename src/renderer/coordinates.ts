import type { LayoutConfig } from '../core/config.js';
import type { Direction, Point } from './types.js';
import type { AxisSize } from './sizing.js';

/**
 * A node placed in the canonical frame: `u` runs across layers (left to
 * right), `v` runs with the flow (top to bottom). All four directions are
 * computed here and mapped by {@link orient} afterwards.
 */
export interface CanonicalBox {
  id: string;
  layer: number;
  order: number;
  u: number;
  v: number;
  cross: number;
  flow: number;
}

export interface CanonicalFrame {
  boxes: Map<string, CanonicalBox>;
  /** Flow position where each layer starts. */
  layerStart: number[];
  layerFlow: number[];
  /** Cross positions reserved for detours: one per back edge, then one per blocked skip edge. */
  lanes: number[];
  crossExtent: number;
  flowExtent: number;
}

export interface FrameOptions {
  /** Number of edges routed around the drawing (cycles, self-loops). */
  backEdges: number;
  /** Forward edges that would cross a box on an intermediate layer. */
  skipEdges?: number;
  /** Lower bound on the gap after each layer, e.g. to fit edge labels. */
  minGaps?: number[];
}

// Rows a back edge needs above its target: the detour row, the arrow row and
// a possible standoff cell.
const BACK_EDGE_HEADROOM = 3;

export function assignCoordinates(
  order: string[][],
  sizes: Map<string, AxisSize>,
  config: LayoutConfig,
  opts: FrameOptions,
): CanonicalFrame {
  const sizeOf = (id: string): AxisSize => sizes.get(id) ?? { cross: 1, flow: 1 };
  const hasBack = opts.backEdges > 0;
  const headroom = hasBack ? Math.max(0, BACK_EDGE_HEADROOM - config.padding) : 0;
  const footroom = hasBack ? Math.max(0, 1 - config.padding) : 0;

  const layerFlow = order.map((layer) => Math.max(0, ...layer.map((id) => sizeOf(id).flow)));
  const layerSpan = order.map((layer) =>
    layer.reduce((sum, id) => sum + sizeOf(id).cross, 0) + Math.max(0, layer.length - 1) * config.nodeSep,
  );
  const widest = Math.max(0, ...layerSpan);
  const center = config.padding + Math.floor(widest / 2);

  const layerStart: number[] = [];
  let v = config.padding + headroom;
  for (let l = 0; l < order.length; l++) {
    layerStart.push(v);
    const gap = Math.max(config.rankSep, opts.minGaps?.[l] ?? 0);
    v += layerFlow[l] + gap;
  }

  const boxes = new Map<string, CanonicalBox>();
  order.forEach((layer, l) => {
    let u = center - Math.floor(layerSpan[l] / 2);
    layer.forEach((id, i) => {
      const size = sizeOf(id);
      boxes.set(id, { id, layer: l, order: i, u, v: layerStart[l], cross: size.cross, flow: size.flow });
      u += size.cross + config.nodeSep;
    });
  });

  const detours = opts.backEdges + (opts.skipEdges ?? 0);
  const lanes = Array.from({ length: detours }, (_, i) => config.padding + widest + 1 + 2 * i);
  const last = order.length - 1;
  const flowEnd = last >= 0 ? layerStart[last] + layerFlow[last] : config.padding;

  return {
    boxes,
    layerStart,
    layerFlow,
    lanes,
    crossExtent: config.padding + widest + 2 * detours + config.padding,
    flowExtent: flowEnd + config.padding + footroom,
  };
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** The single direction-aware step: swap axes for LR/RL, reflect the flow axis for BT/RL. */
export interface Orientation {
  width: number;
  height: number;
  box(b: { u: number; v: number; cross: number; flow: number }): Rect;
  point(u: number, v: number): Point;
}

export function orient(direction: Direction, crossExtent: number, flowExtent: number): Orientation {
  const V = flowExtent;
  switch (direction) {
    case 'TD':
      return {
        width: crossExtent,
        height: V,
        box: (b) => ({ x: b.u, y: b.v, width: b.cross, height: b.flow }),
        point: (u, v) => ({ x: u, y: v }),
      };
    case 'BT':
      return {
        width: crossExtent,
        height: V,
        box: (b) => ({ x: b.u, y: V - b.v - b.flow, width: b.cross, height: b.flow }),
        point: (u, v) => ({ x: u, y: V - 1 - v }),
      };
    case 'LR':
      return {
        width: V,
        height: crossExtent,
        box: (b) => ({ x: b.v, y: b.u, width: b.flow, height: b.cross }),
        point: (u, v) => ({ x: v, y: u }),
      };
    case 'RL':
      return {
        width: V,
        height: crossExtent,
        box: (b) => ({ x: V - b.v - b.flow, y: b.u, width: b.flow, height: b.cross }),
        point: (u, v) => ({ x: V - 1 - v, y: u }),
      };
  }
}
