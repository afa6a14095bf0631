import { resolveLayoutConfig, type LayoutConfig, type LayoutConfigInput } from '../core/config.js';
import { silentLogger, type EngineLogger } from '../core/logger.js';
import { labelWidth } from '../core/text.js';
import { assignLayers, buildAdjacency, type Layering } from './layering.js';
import { orderLayers } from './ordering.js';
import { entryClearance, isHorizontal, measureNode, normalizeLayers } from './sizing.js';
import { assignCoordinates, orient, type Orientation, type Rect } from './coordinates.js';
import { backEdgeIndices, blockedSkipEdges, routeEdges } from './routing.js';
import { validateGraph } from './validate.js';
import { defaultMarkerEnd } from './types.js';
import type {
  Direction,
  GraphModel,
  LayoutResult,
  PositionedEdge,
  PositionedGroup,
  PositionedNode,
} from './types.js';
import type { ILayoutEngine } from './interfaces.js';

export interface GridLayoutOptions {
  config?: LayoutConfigInput;
  logger?: EngineLogger;
}

/**
 * Calculates node and edge positions on a character grid: layering,
 * barycenter ordering, sizing, coordinates, then orthogonal routing.
 */
export class GridLayoutEngine implements ILayoutEngine {
  private readonly config: LayoutConfig;
  private readonly logger: EngineLogger;

  constructor(options: GridLayoutOptions = {}) {
    this.config = resolveLayoutConfig(options.config);
    this.logger = options.logger ?? silentLogger('layout');
  }

  layout(input: GraphModel, direction?: Direction, config?: LayoutConfigInput): LayoutResult {
    const graph = validateGraph(input);
    const dir = direction ?? graph.direction;
    const cfg = config ? resolveLayoutConfig({ ...this.config, ...config }) : this.config;

    if (graph.nodes.length === 0) {
      this.logger.debug('Empty graph, nothing to lay out');
      return { direction: dir, width: 0, height: 0, nodes: [], edges: [], groups: [], warnings: [] };
    }

    const layering = assignLayers(graph, buildAdjacency(graph));
    this.logger.debug('Layers assigned', { phase: 'layering', count: layering.layers.length });
    for (const warning of layering.warnings) {
      this.logger.warn(warning.message, { phase: 'layering', code: warning.code });
    }

    const order = orderLayers(graph, layering, cfg.orderingPasses);
    this.logger.debug('Layers ordered', { phase: 'ordering', count: cfg.orderingPasses });

    const sizes = new Map(graph.nodes.map((n) => [n.id, measureNode(n, cfg)] as const));
    const axes = normalizeLayers(order, sizes, dir);
    const back = backEdgeIndices(graph, layering.layerOf);
    const frameOptions = {
      backEdges: back.length,
      minGaps: isHorizontal(dir) ? labelGaps(graph, layering, order.length) : undefined,
    };
    let frame = assignCoordinates(order, axes, cfg, frameOptions);
    // Lanes sit past the widest layer, so box positions do not move when they are added.
    const skip = blockedSkipEdges(graph, frame);
    if (skip.length > 0) {
      frame = assignCoordinates(order, axes, cfg, { ...frameOptions, skipEdges: skip.length });
      this.logger.debug('Skip edges detoured', { phase: 'routing', count: skip.length });
    }
    this.logger.debug('Coordinates assigned', { phase: 'coordinates', count: frame.boxes.size });

    const shapes = new Map(graph.nodes.map((n) => [n.id, n.shape] as const));
    const routes = routeEdges(graph, frame, back, (id) => {
      const shape = shapes.get(id);
      return shape ? entryClearance(shape) : 0;
    }, skip);
    this.logger.debug('Edges routed', { phase: 'routing', count: routes.length });

    const o = orient(dir, frame.crossExtent, frame.flowExtent);

    const nodes: PositionedNode[] = graph.nodes.map((node) => {
      const box = frame.boxes.get(node.id) ?? { layer: 0, order: 0, u: 0, v: 0, cross: 1, flow: 1 };
      return { ...node, layer: box.layer, order: box.order, ...o.box(box) };
    });

    const edges: PositionedEdge[] = routes.map((route) => {
      const edge = graph.edges[route.index];
      const positioned: PositionedEdge = {
        index: route.index,
        from: edge.from,
        to: edge.to,
        kind: edge.kind,
        markerStart: edge.markerStart ?? 'none',
        markerEnd: edge.markerEnd ?? defaultMarkerEnd(edge.kind),
        waypoints: route.points.map((p) => o.point(p.u, p.v)),
      };
      if (edge.label !== undefined && edge.label !== '') positioned.label = edge.label;
      if (route.junction) {
        positioned.junction = o.point(route.junction.u, route.junction.v);
        positioned.groupIndex = route.groupIndex;
        positioned.groupSize = route.groupSize;
      }
      return positioned;
    });

    return {
      direction: dir,
      width: o.width,
      height: o.height,
      nodes,
      edges,
      groups: placeGroups(graph, nodes, o),
      warnings: layering.warnings,
    };
  }
}

/** Gap needed after each layer so horizontal edge labels fit between boxes. */
function labelGaps(graph: GraphModel, layering: Layering, depth: number): number[] {
  const gaps = new Array<number>(depth).fill(0);
  for (const edge of graph.edges) {
    if (!edge.label || edge.kind === 'invisible') continue;
    const layer = layering.layerOf.get(edge.from) ?? 0;
    gaps[layer] = Math.max(gaps[layer] ?? 0, labelWidth(edge.label) + 2);
  }
  return gaps;
}

function placeGroups(graph: GraphModel, nodes: PositionedNode[], o: Orientation): PositionedGroup[] {
  const byId = new Map(nodes.map((n) => [n.id, n] as const));
  const out: PositionedGroup[] = [];
  for (const group of graph.groups ?? []) {
    const members = group.members.flatMap((id) => {
      const n = byId.get(id);
      return n ? [n] : [];
    });
    if (members.length === 0) continue;
    const bounds: Rect = boundingBox(members);
    const x = Math.max(0, bounds.x - 1);
    const y = Math.max(0, bounds.y - 1);
    const right = Math.min(o.width, bounds.x + bounds.width + 1);
    const bottom = Math.min(o.height, bounds.y + bounds.height + 1);
    out.push({ id: group.id, label: group.label, x, y, width: right - x, height: bottom - y });
  }
  return out;
}

function boundingBox(rects: Rect[]): Rect {
  const left = Math.min(...rects.map((r) => r.x));
  const top = Math.min(...rects.map((r) => r.y));
  const right = Math.max(...rects.map((r) => r.x + r.width));
  const bottom = Math.max(...rects.map((r) => r.y + r.height));
  return { x: left, y: top, width: right - left, height: bottom - top };
}
