export type NodeShape =
  | 'rectangle'
  | 'rounded'
  | 'terminal'
  | 'subroutine'
  | 'circle'
  | 'diamond'
  | 'hexagon'
  | 'cylinder'
  | 'asymmetric'
  | 'parallelogram'
  | 'trapezoid';

export const NODE_SHAPES = [
  'rectangle', 'rounded', 'terminal', 'subroutine', 'circle', 'diamond',
  'hexagon', 'cylinder', 'asymmetric', 'parallelogram', 'trapezoid',
] as const satisfies readonly NodeShape[];

export type EdgeKind = 'arrow' | 'line' | 'dotted' | 'thick' | 'invisible';

export const EDGE_KINDS = ['arrow', 'line', 'dotted', 'thick', 'invisible'] as const satisfies readonly EdgeKind[];

/** `triangle`, `diamond` and `hollowDiamond` are the class-diagram relation ends. */
export type EdgeMarker = 'none' | 'arrow' | 'circle' | 'cross' | 'triangle' | 'diamond' | 'hollowDiamond';

export const EDGE_MARKERS = [
  'none', 'arrow', 'circle', 'cross', 'triangle', 'diamond', 'hollowDiamond',
] as const satisfies readonly EdgeMarker[];

export type DiamondStyle = 'tall' | 'box' | 'inline';

export const DIAMOND_STYLES = ['tall', 'box', 'inline'] as const satisfies readonly DiamondStyle[];

export type Direction = 'TD' | 'BT' | 'LR' | 'RL';

export const DIRECTIONS = ['TD', 'BT', 'LR', 'RL'] as const satisfies readonly Direction[];

export interface NodeRecord {
  id: string;
  label: string;
  shape: NodeShape;
  /** Extra sections below the label, each drawn after a separator row (class members). */
  compartments?: string[];
  /** Fill colour from styling, a CSS name or `#rgb`/`#rrggbb`. */
  fill?: string;
}

export interface EdgeRecord {
  from: string;
  to: string;
  kind: EdgeKind;
  label?: string;
  markerStart?: EdgeMarker;
  markerEnd?: EdgeMarker;
}

/** Single-level grouping box (a flowchart subgraph or a composite state). */
export interface GroupRecord {
  id: string;
  label: string;
  members: string[];
}

export interface GraphModel {
  direction: Direction;
  nodes: NodeRecord[];
  edges: EdgeRecord[];
  groups?: GroupRecord[];
}

export interface Point {
  x: number;
  y: number;
}

export interface PositionedNode extends NodeRecord {
  layer: number;
  order: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PositionedEdge {
  /** Index of the edge in `GraphModel.edges`. */
  index: number;
  from: string;
  to: string;
  kind: EdgeKind;
  label?: string;
  markerStart: EdgeMarker;
  markerEnd: EdgeMarker;
  waypoints: Point[];
  junction?: Point;
  groupIndex?: number;
  groupSize?: number;
}

export interface PositionedGroup {
  id: string;
  label: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LayoutWarning {
  code: 'CYCLE_EXCLUDED';
  message: string;
  edgeIndex: number;
  from: string;
  to: string;
}

/** Everything the renderer needs; nothing flows from layout to rendering besides this. */
export interface LayoutResult {
  direction: Direction;
  width: number;
  height: number;
  nodes: PositionedNode[];
  edges: PositionedEdge[];
  groups: PositionedGroup[];
  warnings: LayoutWarning[];
}

export function defaultMarkerEnd(kind: EdgeKind): EdgeMarker {
  return kind === 'line' || kind === 'invisible' ? 'none' : 'arrow';
}
