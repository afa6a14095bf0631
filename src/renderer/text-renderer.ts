import { displayWidth, labelLines } from '../core/text.js';
import { Canvas, DOWN, LEFT, RIGHT, UP, type LineStyle } from './canvas.js';
import { getCharacterSet, type CharacterSet, type GlyphRole } from './charset.js';
import { ansiColor } from './color.js';
import type { IRenderer } from './interfaces.js';
import { inlineLabel } from './sizing.js';
import type {
  DiamondStyle,
  Direction,
  EdgeKind,
  EdgeMarker,
  LayoutResult,
  NodeShape,
  Point,
  PositionedEdge,
  PositionedGroup,
  PositionedNode,
} from './types.js';

interface ShapeFrame {
  topLeft: GlyphRole;
  topRight: GlyphRole;
  bottomLeft: GlyphRole;
  bottomRight: GlyphRole;
  horizontal: GlyphRole;
  /** Side glyphs for body row `row` (1 .. height-2). */
  left(row: number, height: number): GlyphRole;
  right(row: number, height: number): GlyphRole;
}

const BOX = {
  topLeft: 'box.topLeft',
  topRight: 'box.topRight',
  bottomLeft: 'box.bottomLeft',
  bottomRight: 'box.bottomRight',
  horizontal: 'box.horizontal',
} as const satisfies Partial<ShapeFrame>;

const ROUND = {
  topLeft: 'round.topLeft',
  topRight: 'round.topRight',
  bottomLeft: 'round.bottomLeft',
  bottomRight: 'round.bottomRight',
  horizontal: 'box.horizontal',
} as const satisfies Partial<ShapeFrame>;

const side = (role: GlyphRole) => (): GlyphRole => role;
const middle = (h: number) => Math.floor(h / 2);

const FRAMES: Record<NodeShape, ShapeFrame> = {
  rectangle: { ...BOX, left: side('box.vertical'), right: side('box.vertical') },
  rounded: { ...ROUND, left: side('box.vertical'), right: side('box.vertical') },
  terminal: { ...BOX, left: side('circle.left'), right: side('circle.right') },
  circle: { ...ROUND, left: side('circle.left'), right: side('circle.right') },
  subroutine: { ...BOX, left: side('box.vertical'), right: side('box.vertical') },
  diamond: {
    topLeft: 'diamond.topLeft',
    topRight: 'diamond.topRight',
    bottomLeft: 'diamond.bottomLeft',
    bottomRight: 'diamond.bottomRight',
    horizontal: 'box.horizontal',
    left: (row, h) => (row === middle(h) ? 'diamond.left' : 'box.vertical'),
    right: (row, h) => (row === middle(h) ? 'diamond.right' : 'box.vertical'),
  },
  hexagon: {
    topLeft: 'double.topLeft',
    topRight: 'double.topRight',
    bottomLeft: 'double.bottomLeft',
    bottomRight: 'double.bottomRight',
    horizontal: 'double.horizontal',
    left: side('double.vertical'),
    right: side('double.vertical'),
  },
  cylinder: { ...ROUND, left: side('box.vertical'), right: side('box.vertical') },
  asymmetric: { ...BOX, left: side('asymmetric.left'), right: side('box.vertical') },
  parallelogram: { ...BOX, left: side('slant.forward'), right: side('slant.forward') },
  trapezoid: { ...BOX, left: side('slant.forward'), right: side('slant.back') },
};

// Three-row decision box: ◆ corners on a plain frame.
const BOX_DIAMOND: ShapeFrame = {
  topLeft: 'diamond.corner',
  topRight: 'diamond.corner',
  bottomLeft: 'diamond.corner',
  bottomRight: 'diamond.corner',
  horizontal: 'box.horizontal',
  left: side('box.vertical'),
  right: side('box.vertical'),
};

const FLOW_BITS: Record<Direction, number> = { TD: DOWN, BT: UP, LR: RIGHT, RL: LEFT };
const OPPOSITE: Record<number, number> = { [UP]: DOWN, [DOWN]: UP, [LEFT]: RIGHT, [RIGHT]: LEFT };

function lineStyle(kind: EdgeKind): LineStyle {
  return kind === 'dotted' ? 'dotted' : kind === 'thick' ? 'thick' : 'solid';
}

/** Direction bit of the step from `a` to `b` (axis-aligned, distinct points). */
function stepBit(a: Point, b: Point): number {
  if (b.x > a.x) return RIGHT;
  if (b.x < a.x) return LEFT;
  return b.y > a.y ? DOWN : UP;
}

function arrowRole(bit: number): GlyphRole {
  switch (bit) {
    case UP: return 'arrow.up';
    case DOWN: return 'arrow.down';
    case LEFT: return 'arrow.left';
    default: return 'arrow.right';
  }
}

function triangleRole(bit: number): GlyphRole {
  switch (bit) {
    case UP: return 'marker.triangleUp';
    case DOWN: return 'marker.triangleDown';
    case LEFT: return 'marker.triangleLeft';
    default: return 'marker.triangleRight';
  }
}

/** `bit` is the direction of travel into the node the marker touches. */
function markerRole(marker: EdgeMarker, bit: number): GlyphRole | undefined {
  switch (marker) {
    case 'arrow': return arrowRole(bit);
    case 'triangle': return triangleRole(bit);
    case 'circle': return 'marker.circle';
    case 'cross': return 'marker.cross';
    case 'diamond': return 'marker.diamond';
    case 'hollowDiamond': return 'marker.hollowDiamond';
    case 'none': return undefined;
  }
}

/** Cell `distance` steps along the polyline from its first point. */
function pointAlong(points: Point[], distance: number): Point {
  let left = distance;
  for (let i = 1; i < points.length; i++) {
    const a = points[i - 1];
    const b = points[i];
    const len = Math.abs(b.x - a.x) + Math.abs(b.y - a.y);
    if (left <= len) {
      return { x: a.x + Math.sign(b.x - a.x) * left, y: a.y + Math.sign(b.y - a.y) * left };
    }
    left -= len;
  }
  return points[points.length - 1] ?? { x: 0, y: 0 };
}

function pathLength(points: Point[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += Math.abs(points[i].x - points[i - 1].x) + Math.abs(points[i].y - points[i - 1].y);
  }
  return total;
}

export interface TextRendererOptions {
  /** Must match the `diamondStyle` the layout was sized with. */
  diamondStyle?: DiamondStyle;
  /** Paint labels of nodes that carry a `fill`. */
  color?: boolean;
}

/**
 * Draws a layout onto a character canvas: groups, nodes, edge strokes,
 * arrowheads and markers, then edge labels.
 */
export class TextRenderer implements IRenderer {
  constructor(
    private readonly charset?: CharacterSet,
    private readonly options: TextRendererOptions = {},
  ) {}

  render(layout: LayoutResult, charset?: CharacterSet): string {
    const set = charset ?? this.charset ?? getCharacterSet('unicode');
    const canvas = new Canvas(layout.width, layout.height, set);

    for (const group of layout.groups) this.drawGroup(canvas, group);
    for (const node of layout.nodes) this.drawNode(canvas, node);

    const visible = layout.edges.filter((e) => e.kind !== 'invisible' && e.waypoints.length > 0);
    const flow = FLOW_BITS[layout.direction];
    for (const edge of visible) this.strokeEdge(canvas, edge, flow);
    canvas.resolveLinks();
    for (const edge of visible) this.drawMarkers(canvas, edge, flow);
    for (const edge of visible) this.drawEdgeLabel(canvas, edge);

    return canvas.toString();
  }

  private drawGroup(canvas: Canvas, group: PositionedGroup): void {
    const { x, y, width: w, height: h } = group;
    if (w < 2 || h < 2) return;
    for (let col = x + 1; col < x + w - 1; col++) {
      canvas.draw(col, y, 'group.horizontal');
      canvas.draw(col, y + h - 1, 'group.horizontal');
    }
    for (let row = y + 1; row < y + h - 1; row++) {
      canvas.draw(x, row, 'group.vertical');
      canvas.draw(x + w - 1, row, 'group.vertical');
    }
    canvas.draw(x, y, 'group.topLeft');
    canvas.draw(x + w - 1, y, 'group.topRight');
    canvas.draw(x, y + h - 1, 'group.bottomLeft');
    canvas.draw(x + w - 1, y + h - 1, 'group.bottomRight');
    if (group.label) canvas.text(x + 2, y, group.label.replace(/\s*\n\s*/g, ' '));
  }

  private drawNode(canvas: Canvas, node: PositionedNode): void {
    const { x, y, width: w, height: h } = node;
    canvas.reserve(x, y, w, h);
    const code = this.options.color && node.fill ? ansiColor(node.fill) : undefined;
    const diamond = node.shape === 'diamond' ? (this.options.diamondStyle ?? 'tall') : undefined;

    if (diamond === 'inline') {
      const row = y + Math.floor(h / 2);
      const label = inlineLabel(node.label);
      canvas.draw(x, row, 'diamond.corner');
      canvas.draw(x + w - 1, row, 'diamond.corner');
      canvas.text(x + Math.floor((w - displayWidth(label)) / 2), row, label, { paint: code });
      return;
    }
    this.drawFrame(canvas, node, diamond === 'box' ? BOX_DIAMOND : FRAMES[node.shape]);

    if (node.shape === 'subroutine') {
      for (let row = y + 1; row < y + h - 1; row++) {
        canvas.draw(x + 1, row, 'box.vertical');
        canvas.draw(x + w - 2, row, 'box.vertical');
      }
    }
    if (node.shape === 'cylinder' && h > 3) {
      for (let col = x + 1; col < x + w - 1; col++) canvas.draw(col, y + 1, 'box.horizontal');
    }

    const lines = labelLines(node.label);
    if (node.compartments) {
      this.drawCompartments(canvas, node, lines, code);
      return;
    }
    const top = y + Math.floor((h - lines.length) / 2);
    lines.forEach((line, i) => {
      canvas.text(x + Math.floor((w - displayWidth(line)) / 2), top + i, line, { paint: code });
    });
  }

  private drawFrame(canvas: Canvas, node: PositionedNode, frame: ShapeFrame): void {
    const { x, y, width: w, height: h } = node;
    for (let col = x + 1; col < x + w - 1; col++) {
      canvas.draw(col, y, frame.horizontal);
      canvas.draw(col, y + h - 1, frame.horizontal);
    }
    for (let row = 1; row < h - 1; row++) {
      canvas.draw(x, y + row, frame.left(row, h));
      canvas.draw(x + w - 1, y + row, frame.right(row, h));
    }
    canvas.draw(x, y, frame.topLeft);
    canvas.draw(x + w - 1, y, frame.topRight);
    canvas.draw(x, y + h - 1, frame.bottomLeft);
    canvas.draw(x + w - 1, y + h - 1, frame.bottomRight);
  }

  /** Name centred under the top border, then each section after a separator, left-aligned. */
  private drawCompartments(canvas: Canvas, node: PositionedNode, lines: string[], code: string | undefined): void {
    const { x, y, width: w } = node;
    let row = y + 1;
    for (const line of lines) {
      canvas.text(x + Math.floor((w - displayWidth(line)) / 2), row++, line, { paint: code });
    }
    for (const section of node.compartments ?? []) {
      canvas.draw(x, row, 'box.separatorLeft');
      for (let col = x + 1; col < x + w - 1; col++) canvas.draw(col, row, 'box.horizontal');
      canvas.draw(x + w - 1, row++, 'box.separatorRight');
      for (const member of labelLines(section)) canvas.text(x + 2, row++, member);
    }
  }

  private strokeEdge(canvas: Canvas, edge: PositionedEdge, flow: number): void {
    const style = lineStyle(edge.kind);
    const points = edge.waypoints;
    for (let i = 1; i < points.length; i++) {
      const a = points[i - 1];
      const b = points[i];
      const bit = stepBit(a, b);
      const back = OPPOSITE[bit] ?? 0;
      const steps = Math.abs(b.x - a.x) + Math.abs(b.y - a.y);
      const dx = Math.sign(b.x - a.x);
      const dy = Math.sign(b.y - a.y);
      for (let s = 0; s <= steps; s++) {
        const mask = (s < steps ? bit : 0) | (s > 0 ? back : 0);
        canvas.link(a.x + dx * s, a.y + dy * s, mask, style);
      }
    }
    // Arms reaching the borders: toward the source at the start, the target at the end.
    const first = points[0];
    const last = points[points.length - 1];
    canvas.link(first.x, first.y, OPPOSITE[flow] ?? 0, style);
    canvas.link(last.x, last.y, flow, style);
  }

  private drawMarkers(canvas: Canvas, edge: PositionedEdge, flow: number): void {
    const points = edge.waypoints;
    const first = points[0];
    const last = points[points.length - 1];
    const endBit = points.length > 1 ? stepBit(points[points.length - 2], last) : flow;
    const startBit = points.length > 1 ? stepBit(points[1], first) : (OPPOSITE[flow] ?? UP);

    const end = markerRole(edge.markerEnd, endBit);
    if (end) canvas.draw(last.x, last.y, end);
    const start = markerRole(edge.markerStart, startBit);
    if (start) canvas.draw(first.x, first.y, start);
  }

  private drawEdgeLabel(canvas: Canvas, edge: PositionedEdge): void {
    if (!edge.label) return;
    const mid = pointAlong(edge.waypoints, Math.floor(pathLength(edge.waypoints) / 2));
    const lines = labelLines(edge.label);
    const top = mid.y - Math.floor((lines.length - 1) / 2);
    lines.forEach((line, i) => {
      canvas.text(mid.x - Math.floor(displayWidth(line) / 2), top + i, line, { skipReserved: true });
    });
  }
}
