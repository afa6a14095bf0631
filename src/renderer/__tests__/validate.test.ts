import { describe, it, expect } from 'vitest';
import { validateGraph } from '../validate.js';
import { DanglingReferenceError, DuplicateNodeError, InvalidGraphError } from '../../core/errors.js';
import { edge, node } from './fixtures.js';

describe('validateGraph', () => {
  it('returns a well-formed graph unchanged', () => {
    const graph = { direction: 'LR', nodes: [node('A'), node('B')], edges: [edge('A', 'B')] };
    expect(validateGraph(graph)).toEqual(graph);
  });

  it('reports an edge to a missing node', () => {
    const graph = { direction: 'TD', nodes: [node('A')], edges: [edge('A', 'Z')] };
    expect(() => validateGraph(graph)).toThrow(DanglingReferenceError);
    expect(() => validateGraph(graph)).toThrow('Edge #0 (A -> Z) references unknown node "Z"');
  });

  it('reports a group member that is not a node', () => {
    const graph = {
      direction: 'TD',
      nodes: [node('A')],
      edges: [],
      groups: [{ id: 'g', label: 'G', members: ['A', 'Q'] }],
    };
    expect(() => validateGraph(graph)).toThrow('Group "g" references unknown node "Q"');
  });

  it('rejects duplicate node ids', () => {
    const graph = { direction: 'TD', nodes: [node('A'), node('A', 'again')], edges: [] };
    expect(() => validateGraph(graph)).toThrow(DuplicateNodeError);
  });

  it('rejects unknown shapes with the field path', () => {
    try {
      validateGraph({ direction: 'TD', nodes: [{ id: 'A', label: 'A', shape: 'star' }], edges: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidGraphError);
      if (error instanceof InvalidGraphError) expect(error.issues[0]).toMatch(/^nodes\.0\.shape: /);
    }
  });
});
