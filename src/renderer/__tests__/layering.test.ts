import { describe, it, expect } from 'vitest';
import { assignLayers, buildAdjacency, outEdgeIndices } from '../layering.js';
import { chain, edge, node } from './fixtures.js';
import type { GraphModel } from '../types.js';

describe('assignLayers', () => {
  it('puts a chain on consecutive layers', () => {
    expect(assignLayers(chain(['A>B', 'B>C'])).layers).toEqual([['A'], ['B'], ['C']]);
  });

  it('places a node one past its deepest predecessor', () => {
    const { layerOf } = assignLayers(chain(['A>B', 'B>C', 'A>C']));
    expect(layerOf.get('C')).toBe(2);
  });

  it('keeps unconnected nodes on layer 0 in insertion order', () => {
    const graph: GraphModel = { direction: 'TD', nodes: [node('X'), node('A'), node('B')], edges: [edge('A', 'B')] };
    expect(assignLayers(graph).layers).toEqual([['X', 'A'], ['B']]);
  });

  it('excludes the edge closing a cycle and warns about it', () => {
    const result = assignLayers(chain(['A>B', 'B>C', 'C>A']));
    expect(result.layers).toEqual([['A'], ['B'], ['C']]);
    expect([...result.excluded]).toEqual([2]);
    expect(result.warnings).toEqual([
      {
        code: 'CYCLE_EXCLUDED',
        message: 'Edge C -> A closes a cycle; it is drawn but does not constrain layers',
        edgeIndex: 2,
        from: 'C',
        to: 'A',
      },
    ]);
  });

  it('treats a self-loop as a cycle', () => {
    const graph: GraphModel = { direction: 'TD', nodes: [node('A')], edges: [edge('A', 'A')] };
    const result = assignLayers(graph);
    expect(result.layers).toEqual([['A']]);
    expect([...result.excluded]).toEqual([0]);
  });

  it('returns no layers for an empty graph', () => {
    expect(assignLayers({ direction: 'TD', nodes: [], edges: [] }).layers).toEqual([]);
  });
});

describe('buildAdjacency', () => {
  it('keeps parallel edges apart', () => {
    const graph = chain(['A>B', 'A>B']);
    expect(outEdgeIndices(buildAdjacency(graph), 'A')).toEqual([0, 1]);
  });
});
