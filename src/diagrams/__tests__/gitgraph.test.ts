import { describe, it, expect } from 'vitest';
import { parseGitGraph } from '../gitgraph/index.js';

function graphOf(text: string) {
  const outcome = parseGitGraph(text);
  expect(outcome.errors).toEqual([]);
  if (!outcome.graph) throw new Error('expected a graph');
  return outcome.graph;
}

describe('git graph front end', () => {
  it('links commits along branches and merges them back', () => {
    const graph = graphOf([
      'gitGraph',
      '  commit',
      '  commit id: "Alpha" tag: "v1.0"',
      '  branch develop',
      '  checkout develop',
      '  commit type: HIGHLIGHT',
      '  checkout main',
      '  merge develop',
    ].join('\n'));

    expect(graph).toEqual({
      direction: 'TD',
      nodes: [
        { id: 'c1', label: 'c1', shape: 'circle' },
        { id: 'Alpha', label: 'Alpha\nv1.0', shape: 'circle' },
        { id: 'c2', label: 'c2', shape: 'hexagon' },
        { id: 'c3', label: 'c3', shape: 'circle' },
      ],
      edges: [
        { from: 'c1', to: 'Alpha', kind: 'line' },
        { from: 'Alpha', to: 'c2', kind: 'line', label: 'develop' },
        { from: 'Alpha', to: 'c3', kind: 'line' },
        { from: 'c2', to: 'c3', kind: 'dotted' },
      ],
    });
  });

  it('reads the direction from the header', () => {
    const graph = graphOf('gitGraph LR:\n  commit\n  commit');

    expect(graph.direction).toBe('LR');
    expect(graph.edges).toEqual([{ from: 'c1', to: 'c2', kind: 'line' }]);
  });

  it('skips automatic ids that are already taken', () => {
    expect(graphOf('gitGraph\n  commit id: "c1"\n  commit').nodes.map((n) => n.id)).toEqual(['c1', 'c2']);
  });

  it('accepts quoted branch names, switch and reverse commits', () => {
    const graph = graphOf([
      'gitGraph',
      '  commit',
      '  branch "hot fix" order: 2',
      '  commit type: REVERSE',
      '  switch main',
      '  commit',
    ].join('\n'));

    expect(graph.nodes.map((n) => [n.id, n.shape])).toEqual([
      ['c1', 'circle'],
      ['c2', 'subroutine'],
      ['c3', 'circle'],
    ]);
    expect(graph.edges).toEqual([
      { from: 'c1', to: 'c2', kind: 'line', label: 'hot fix' },
      { from: 'c1', to: 'c3', kind: 'line' },
    ]);
  });

  it('warns about unknown branches, existing branches and self merges', () => {
    const outcome = parseGitGraph([
      'gitGraph',
      '  commit',
      '  checkout release',
      '  branch main',
      '  merge main',
    ].join('\n'));

    expect(outcome.errors).toEqual([]);
    expect(outcome.warnings).toEqual([
      {
        line: 3,
        column: 12,
        severity: 'warning',
        code: 'GG-UNKNOWN-BRANCH',
        message: 'Branch "release" does not exist; the statement is ignored',
        hint: "Create it first with 'branch release'.",
        length: 7,
      },
      {
        line: 4,
        column: 10,
        severity: 'warning',
        code: 'GG-BRANCH-EXISTS',
        message: 'Branch "main" already exists; checking it out instead',
        length: 4,
      },
      {
        line: 5,
        column: 9,
        severity: 'warning',
        code: 'GG-MERGE-SELF',
        message: 'Cannot merge branch "main" into itself',
        length: 4,
      },
    ]);
  });

  it('skips merging a branch without commits of its own', () => {
    const outcome = parseGitGraph('gitGraph\n  commit\n  branch topic\n  checkout main\n  merge topic');

    expect(outcome.graph?.nodes.map((n) => n.id)).toEqual(['c1']);
    expect(outcome.warnings.map((w) => w.code)).toEqual(['GG-MERGE-EMPTY']);
  });

  it('rejects a commit id used twice', () => {
    const outcome = parseGitGraph('gitGraph\n  commit id: "a"\n  commit id: "a"');

    expect(outcome.graph).toBeUndefined();
    expect(outcome.errors).toEqual([
      {
        line: 3,
        column: 14,
        severity: 'error',
        code: 'GG-DUPLICATE-COMMIT',
        message: 'Commit id "a" is used twice',
        length: 3,
      },
    ]);
  });

  it('reports an unknown command as a parser error', () => {
    const outcome = parseGitGraph('gitGraph\n  commit\n  rebase main');

    expect(outcome.graph).toBeUndefined();
    expect(outcome.errors[0]).toMatchObject({ code: 'PARSER_ERROR', severity: 'error', line: 3 });
  });
});
