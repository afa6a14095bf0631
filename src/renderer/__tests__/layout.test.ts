import { describe, it, expect, vi } from 'vitest';
import { GridLayoutEngine } from '../layout.js';
import { DIRECTIONS, type GraphModel, type LayoutResult, type Point } from '../types.js';
import { DanglingReferenceError, InvalidConfigError } from '../../core/errors.js';
import { silentLogger } from '../../core/logger.js';
import { chain, edge, node } from './fixtures.js';

const sample: GraphModel = {
  direction: 'TD',
  nodes: [node('A', 'Start'), node('B', 'Check?', 'diamond'), node('C', 'Yes'), node('D', 'No path\nsecond line'), node('E', 'Done', 'rounded')],
  edges: [
    edge('A', 'B'),
    edge('B', 'C', 'arrow', { label: 'yes' }),
    edge('B', 'D', 'dotted', { label: 'no' }),
    edge('C', 'E'),
    edge('D', 'E', 'thick'),
    edge('E', 'A', 'line'),
  ],
  groups: [{ id: 'g', label: 'Branches', members: ['C', 'D'] }],
};

function overlaps(a: { x: number; y: number; width: number; height: number }, b: typeof a): boolean {
  return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
}

function axisAligned(points: Point[]): boolean {
  return points.every((p, i) => i === 0 || p.x === points[i - 1].x || p.y === points[i - 1].y);
}

/** Every cell a polyline passes through. */
function cellsOf(points: Point[]): Point[] {
  const out: Point[] = points.slice(0, 1);
  for (let i = 1; i < points.length; i++) {
    const a = points[i - 1];
    const b = points[i];
    const steps = Math.abs(b.x - a.x) + Math.abs(b.y - a.y);
    for (let s = 1; s <= steps; s++) {
      out.push({ x: a.x + Math.sign(b.x - a.x) * s, y: a.y + Math.sign(b.y - a.y) * s });
    }
  }
  return out;
}

function inside(p: Point, r: { x: number; y: number; width: number; height: number }): boolean {
  return p.x >= r.x && p.x < r.x + r.width && p.y >= r.y && p.y < r.y + r.height;
}

const shapes: GraphModel = {
  direction: 'TD',
  nodes: [node('A', 'Load', 'cylinder'), node('B', 'Valid?', 'diamond'), node('C', 'Store', 'cylinder')],
  edges: [
    edge('A', 'B', 'arrow', { label: 'read' }),
    edge('B', 'C'),
    edge('B', 'A', 'dotted', { label: 'retry' }),
    edge('A', 'C', 'thick'),
  ],
};

const FIXTURES: Array<[string, GraphModel]> = [
  ['branching sample', sample],
  ['three-node cycle', chain(['A>B', 'B>C', 'C>A'])],
  ['self-loop', chain(['A>A', 'A>B'])],
  ['parallel edges', chain(['A>B', 'A>B', 'B>C'])],
  ['skip edges', chain(['A>B', 'B>C', 'A>C', 'C>D', 'A>D'])],
  ['shapes and labels', shapes],
];

const CASES = FIXTURES.flatMap(([name, graph]) => DIRECTIONS.map((direction) => [name, direction, graph] as const));

describe.each(CASES)('GridLayoutEngine on %s (%s)', (_name, direction, graph) => {
  const layout: LayoutResult = new GridLayoutEngine().layout(graph, direction);

  it('places every node once with a positive size', () => {
    expect(layout.nodes.map((n) => n.id)).toEqual(graph.nodes.map((n) => n.id));
    for (const n of layout.nodes) {
      expect(n.width).toBeGreaterThanOrEqual(1);
      expect(n.height).toBeGreaterThanOrEqual(1);
    }
  });

  it('gives every node of a layer the same flow size', () => {
    const horizontal = direction === 'LR' || direction === 'RL';
    const byLayer = new Map<number, Set<number>>();
    for (const n of layout.nodes) {
      const set = byLayer.get(n.layer) ?? new Set<number>();
      set.add(horizontal ? n.width : n.height);
      byLayer.set(n.layer, set);
    }
    for (const sizes of byLayer.values()) expect(sizes.size).toBe(1);
  });

  it('keeps boxes apart and inside the canvas', () => {
    for (const [i, a] of layout.nodes.entries()) {
      expect(a.x).toBeGreaterThanOrEqual(0);
      expect(a.y).toBeGreaterThanOrEqual(0);
      expect(a.x + a.width).toBeLessThanOrEqual(layout.width);
      expect(a.y + a.height).toBeLessThanOrEqual(layout.height);
      for (const b of layout.nodes.slice(i + 1)) expect(overlaps(a, b)).toBe(false);
    }
  });

  it('routes every edge with axis-aligned segments on the canvas', () => {
    expect(layout.edges).toHaveLength(graph.edges.length);
    for (const e of layout.edges) {
      expect(e.waypoints.length).toBeGreaterThanOrEqual(2);
      expect(axisAligned(e.waypoints)).toBe(true);
      for (const p of e.waypoints) {
        expect(inside(p, { x: 0, y: 0, width: layout.width, height: layout.height })).toBe(true);
      }
    }
  });

  it('never runs a stroke through a node box', () => {
    for (const e of layout.edges) {
      for (const cell of cellsOf(e.waypoints)) {
        expect(layout.nodes.filter((n) => inside(cell, n)).map((n) => n.id)).toEqual([]);
      }
    }
  });

  it('branches every edge of a multi-edge source from one junction', () => {
    for (const n of layout.nodes) {
      const fan = layout.edges.filter((e) => e.from === n.id);
      if (fan.length < 2) continue;
      for (const e of fan) {
        expect(e.junction).toEqual(fan[0].junction);
        expect(e.waypoints[0]).toEqual(e.junction);
        expect(e.groupSize).toBe(fan.length);
      }
      expect(new Set(fan.map((e) => e.groupIndex)).size).toBe(fan.length);
    }
  });

  it('is deterministic', () => {
    expect(new GridLayoutEngine().layout(graph, direction)).toEqual(layout);
  });
});

describe.each(DIRECTIONS)('GridLayoutEngine on the branching sample (%s)', (direction) => {
  const layout: LayoutResult = new GridLayoutEngine().layout(sample, direction);

  it('shares one junction between the two edges leaving B', () => {
    const fan = layout.edges.filter((e) => e.from === 'B');
    expect(fan).toHaveLength(2);
    expect(fan[0].junction).toEqual(fan[1].junction);
    expect(fan.map((e) => e.groupSize)).toEqual([2, 2]);
    expect(new Set(fan.map((e) => e.groupIndex))).toEqual(new Set([0, 1]));
  });

  it('warns about the edge closing the cycle and still routes it', () => {
    expect(layout.warnings.map((w) => w.edgeIndex)).toEqual([5]);
    expect(layout.edges[5].waypoints.length).toBeGreaterThan(2);
  });

  it('frames the group around its members', () => {
    const [group] = layout.groups;
    for (const id of ['C', 'D']) {
      const n = layout.nodes.find((m) => m.id === id);
      expect(n).toBeDefined();
      if (!n) continue;
      expect(group.x).toBeLessThan(n.x);
      expect(group.y).toBeLessThan(n.y);
      expect(group.x + group.width).toBeGreaterThan(n.x + n.width);
      expect(group.y + group.height).toBeGreaterThan(n.y + n.height);
    }
  });
});

describe('GridLayoutEngine', () => {
  const engine = new GridLayoutEngine();

  it('applies the rank gap once between layers', () => {
    const layout = engine.layout(chain(['A>B']));
    const [a, b] = layout.nodes;
    expect(b.y).toBe(a.y + a.height + 4);
    expect(engine.layout(chain(['A>B']), undefined, { rankSep: 6 }).nodes[1].y).toBe(a.y + a.height + 6);
  });

  it('fills edge defaults from the kind', () => {
    const graph: GraphModel = {
      direction: 'TD',
      nodes: [node('A'), node('B')],
      edges: [edge('A', 'B', 'line'), edge('A', 'B', 'dotted', { markerStart: 'circle', label: '' })],
    };
    const [line, dotted] = engine.layout(graph).edges;
    expect([line.markerStart, line.markerEnd]).toEqual(['none', 'none']);
    expect([dotted.markerStart, dotted.markerEnd]).toEqual(['circle', 'arrow']);
    expect('label' in dotted).toBe(false);
  });

  it('lays out an empty graph as a zero-size canvas', () => {
    expect(engine.layout({ direction: 'LR', nodes: [], edges: [] })).toEqual({
      direction: 'LR',
      width: 0,
      height: 0,
      nodes: [],
      edges: [],
      groups: [],
      warnings: [],
    });
  });

  it('rejects dangling references before layout', () => {
    const graph = { direction: 'TD' as const, nodes: [node('A')], edges: [edge('A', 'B')] };
    expect(() => engine.layout(graph)).toThrow(DanglingReferenceError);
  });

  it('puts a back edge on the junction its source shares with a forward edge', () => {
    const layout = engine.layout(chain(['A>B', 'B>A', 'B>C']));
    const [, back, forward] = layout.edges;
    expect(back.junction).toEqual({ x: 3, y: 13 });
    expect(forward.junction).toEqual({ x: 3, y: 13 });
    expect([back.groupIndex, back.groupSize]).toEqual([0, 2]);
    expect([forward.groupIndex, forward.groupSize]).toEqual([1, 2]);
  });

  it('groups a self-loop with the other edge leaving its node', () => {
    const layout = engine.layout(chain(['A>A', 'A>B']));
    const [loop, forward] = layout.edges;
    expect(loop.junction).toEqual({ x: 3, y: 6 });
    expect(forward.junction).toEqual({ x: 3, y: 6 });
    expect([loop.groupIndex, forward.groupIndex]).toEqual([0, 1]);
  });

  it('detours an edge that skips a layer around the box in its way', () => {
    const layout = engine.layout(chain(['A>B', 'B>C', 'A>C']));
    expect([layout.width, layout.height]).toEqual([9, 19]);
    expect(layout.edges[0].waypoints).toEqual([{ x: 3, y: 4 }, { x: 3, y: 7 }]);
    expect(layout.edges[2].waypoints).toEqual([
      { x: 3, y: 4 },
      { x: 7, y: 4 },
      { x: 7, y: 13 },
      { x: 3, y: 13 },
      { x: 3, y: 14 },
    ]);
    expect(layout.warnings).toEqual([]);
  });

  it('keeps a skip edge straight when it passes between boxes', () => {
    const layout = engine.layout(chain(['A>B', 'A>C', 'B>D', 'A>D']));
    expect(layout.width).toBe(13);
    expect(layout.edges[3].waypoints).toEqual([{ x: 6, y: 4 }, { x: 6, y: 14 }]);
  });

  it('rejects invalid configuration', () => {
    expect(() => new GridLayoutEngine({ config: { padding: -1 } })).toThrow(InvalidConfigError);
  });

  it('widens the layer gap for labels in horizontal layouts', () => {
    const graph: GraphModel = { direction: 'LR', nodes: [node('A'), node('B')], edges: [edge('A', 'B', 'arrow', { label: 'a long label' })] };
    const [a, b] = engine.layout(graph).nodes;
    expect(b.x - (a.x + a.width)).toBe(14);
  });

  it('reports phases and cycle warnings to its logger', () => {
    const logger = silentLogger('test');
    const warn = vi.spyOn(logger, 'warn');
    const debug = vi.spyOn(logger, 'debug');
    new GridLayoutEngine({ logger }).layout(chain(['A>B', 'B>A']));
    expect(warn).toHaveBeenCalledWith(
      'Edge B -> A closes a cycle; it is drawn but does not constrain layers',
      { phase: 'layering', code: 'CYCLE_EXCLUDED' },
    );
    expect(debug).toHaveBeenCalledWith('Edges routed', { phase: 'routing', count: 2 });
  });
});
