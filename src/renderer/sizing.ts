import { displayWidth, labelLines, labelWidth } from '../core/text.js';
import type { LayoutConfig } from '../core/config.js';
import type { Direction, NodeRecord, NodeShape } from './types.js';

export interface Size {
  width: number;
  height: number;
}

/** Size on the canonical axes: `cross` runs across layers, `flow` along them. */
export interface AxisSize {
  cross: number;
  flow: number;
}

// Extra cells around the label: border plus at least one blank cell per side.
const SHAPE_PADDING: Record<NodeShape, { x: number; y: number }> = {
  rectangle: { x: 4, y: 0 },
  rounded: { x: 4, y: 0 },
  terminal: { x: 4, y: 0 },
  circle: { x: 4, y: 0 },
  subroutine: { x: 6, y: 0 },
  hexagon: { x: 6, y: 0 },
  asymmetric: { x: 6, y: 0 },
  parallelogram: { x: 6, y: 0 },
  trapezoid: { x: 6, y: 0 },
  diamond: { x: 6, y: 2 },
  cylinder: { x: 6, y: 2 },
};

/** Cells left blank between an arrowhead and the node border. */
export function entryClearance(shape: NodeShape): number {
  return shape === 'cylinder' ? 1 : 0;
}

/** Label of an inline diamond: every line on one row. */
export function inlineLabel(label: string): string {
  return labelLines(label).join(' ');
}

export function measureNode(node: NodeRecord, config: LayoutConfig): Size {
  if (node.shape === 'diamond' && config.diamondStyle === 'inline') {
    // ◆ label ◆
    return { width: Math.max(displayWidth(inlineLabel(node.label)) + 4, config.minNodeWidth), height: 1 };
  }
  const pad = node.shape === 'diamond' && config.diamondStyle === 'box' ? { x: 4, y: 0 } : SHAPE_PADDING[node.shape];
  const sections = node.compartments ?? [];
  const widest = Math.max(labelWidth(node.label), ...sections.map(labelWidth));
  // Each compartment adds a separator row above its lines.
  const extra = sections.reduce((rows, c) => rows + 1 + labelLines(c).length, 0);
  const lines = labelLines(node.label).length;
  return {
    width: Math.max(widest + pad.x, config.minNodeWidth),
    height: Math.max(lines + 2 + pad.y + extra, config.minNodeHeight),
  };
}

export function isHorizontal(direction: Direction): boolean {
  return direction === 'LR' || direction === 'RL';
}

export function toAxes(size: Size, direction: Direction): AxisSize {
  return isHorizontal(direction)
    ? { cross: size.height, flow: size.width }
    : { cross: size.width, flow: size.height };
}

export function fromAxes(size: AxisSize, direction: Direction): Size {
  return isHorizontal(direction)
    ? { width: size.flow, height: size.cross }
    : { width: size.cross, height: size.flow };
}

/**
 * Stretch every node of a layer to the layer's largest flow size: equal
 * heights for TD/BT, equal widths for LR/RL.
 */
export function normalizeLayers(
  layers: string[][],
  sizes: Map<string, Size>,
  direction: Direction,
): Map<string, AxisSize> {
  const out = new Map<string, AxisSize>();
  for (const layer of layers) {
    const axes = layer.map((id) => toAxes(sizes.get(id) ?? { width: 1, height: 1 }, direction));
    const flow = Math.max(0, ...axes.map((a) => a.flow));
    layer.forEach((id, i) => out.set(id, { cross: axes[i].cross, flow }));
  }
  return out;
}
