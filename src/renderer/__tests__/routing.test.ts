import { describe, it, expect } from 'vitest';
import { resolveLayoutConfig } from '../../core/config.js';
import { assignCoordinates } from '../coordinates.js';
import { assignLayers } from '../layering.js';
import { backEdgeIndices, blockedSkipEdges, routeEdges } from '../routing.js';
import type { AxisSize } from '../sizing.js';
import { chain } from './fixtures.js';

const config = resolveLayoutConfig();
const square: AxisSize = { cross: 5, flow: 3 };

function frameFor(pairs: string[]) {
  const graph = chain(pairs);
  const layering = assignLayers(graph);
  const back = backEdgeIndices(graph, layering.layerOf);
  const sizes = new Map(graph.nodes.map((n) => [n.id, square] as const));
  const frame = assignCoordinates(layering.layers, sizes, config, { backEdges: back.length });
  return { graph, back, frame };
}

describe('routeEdges', () => {
  it('drops straight down between aligned nodes', () => {
    const { graph, back, frame } = frameFor(['A>B']);
    const [route] = routeEdges(graph, frame, back, () => 0);
    expect(route.points).toEqual([{ u: 3, v: 4 }, { u: 3, v: 7 }]);
    expect(route.back).toBe(false);
    expect(route.junction).toBeUndefined();
  });

  it('keeps a cell clear before a target that asks for it', () => {
    const { graph, back, frame } = frameFor(['A>B']);
    const [route] = routeEdges(graph, frame, back, (id) => (id === 'B' ? 1 : 0));
    expect(route.points).toEqual([{ u: 3, v: 4 }, { u: 3, v: 6 }]);
  });

  it('sends a back edge through its lane above the target', () => {
    const { graph, back, frame } = frameFor(['A>B', 'B>A']);
    expect(back).toEqual([1]);
    const routes = routeEdges(graph, frame, back, () => 0);
    expect(routes[0].points).toEqual([{ u: 3, v: 6 }, { u: 3, v: 9 }]);
    expect(routes[1]).toMatchObject({ back: true });
    expect(routes[1].points).toEqual([
      { u: 3, v: 13 },
      { u: 7, v: 13 },
      { u: 7, v: 1 },
      { u: 3, v: 1 },
      { u: 3, v: 2 },
    ]);
  });

  it('groups fan-out edges on one junction, ordered by target position', () => {
    const { graph, back, frame } = frameFor(['D>N', 'D>Y']);
    const routes = routeEdges(graph, frame, back, () => 0);
    const junction = { u: 6, v: 4 };
    expect(routes.map((r) => r.junction)).toEqual([junction, junction]);
    expect(routes.map((r) => [r.groupIndex, r.groupSize])).toEqual([[0, 2], [1, 2]]);
    expect(routes[0].points).toEqual([{ u: 6, v: 4 }, { u: 3, v: 4 }, { u: 3, v: 7 }]);
  });

  it('puts back edges on the junction of their source', () => {
    const { graph, back, frame } = frameFor(['A>B', 'B>A', 'B>C']);
    const routes = routeEdges(graph, frame, back, () => 0);
    expect(routes[1]).toMatchObject({ back: true, junction: { u: 3, v: 13 }, groupIndex: 0, groupSize: 2 });
    expect(routes[2]).toMatchObject({ back: false, junction: { u: 3, v: 13 }, groupIndex: 1, groupSize: 2 });
  });

  it('finds forward edges whose descent would cross a box', () => {
    const { graph, frame } = frameFor(['A>B', 'B>C', 'A>C']);
    expect(blockedSkipEdges(graph, frame)).toEqual([2]);
  });

  it('sends a blocked skip edge through a lane without marking it as a back edge', () => {
    const graph = chain(['A>B', 'B>C', 'A>C']);
    const layering = assignLayers(graph);
    const sizes = new Map(graph.nodes.map((n) => [n.id, square] as const));
    const frame = assignCoordinates(layering.layers, sizes, config, { backEdges: 0, skipEdges: 1 });
    const routes = routeEdges(graph, frame, [], () => 0, [2]);
    expect(frame.lanes).toEqual([7]);
    expect(routes[2].back).toBe(false);
    expect(routes[2].points).toEqual([
      { u: 3, v: 4 },
      { u: 7, v: 4 },
      { u: 7, v: 13 },
      { u: 3, v: 13 },
      { u: 3, v: 14 },
    ]);
  });

  it('leaves fan-in edges independent', () => {
    const { graph, back, frame } = frameFor(['A>C', 'B>C']);
    const routes = routeEdges(graph, frame, back, () => 0);
    expect(routes.every((r) => r.junction === undefined)).toBe(true);
    expect(routes.map((r) => r.points[r.points.length - 1])).toEqual([{ u: 6, v: 7 }, { u: 6, v: 7 }]);
  });
});
