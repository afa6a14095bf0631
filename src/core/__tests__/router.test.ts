import { describe, it, expect } from 'vitest';
import { detectDiagramType, diagramKind, parseDiagram } from '../router.js';
import { extractDiagramBlocks, offsetErrors } from '../markdown.js';

describe('detectDiagramType', () => {
  it('reads the first line that is not blank or a comment', () => {
    expect(detectDiagramType('graph LR\nA-->B')).toBe('flowchart');
    expect(detectDiagramType('Flowchart TD')).toBe('flowchart');
    expect(detectDiagramType('%% heading\n\nstateDiagram-v2\n[*] --> A')).toBe('state');
    expect(detectDiagramType('stateDiagram')).toBe('state');
    expect(detectDiagramType('classDiagram-v2\nclass A')).toBe('class');
    expect(detectDiagramType('gitGraph LR:\n  commit')).toBe('gitgraph');
  });

  it('returns unknown for other headers and empty input', () => {
    expect(detectDiagramType('sequenceDiagram')).toBe('unknown');
    expect(detectDiagramType('')).toBe('unknown');
    expect(detectDiagramType('%% only a comment')).toBe('unknown');
  });
});

describe('parseDiagram', () => {
  it('dispatches to the front end named by the header', () => {
    const outcome = parseDiagram('stateDiagram-v2\nA --> B');

    expect(outcome.type).toBe('state');
    expect(outcome.graph?.nodes.map((n) => n.id)).toEqual(['A', 'B']);
  });

  it('honours an explicit type', () => {
    expect(diagramKind('flowchart')?.type).toBe('flowchart');
    expect(diagramKind('unknown')).toBeUndefined();
    expect(parseDiagram('graph TD\nA-->B', 'flowchart').type).toBe('flowchart');
  });

  it('dispatches git graphs and class diagrams', () => {
    expect(parseDiagram('gitGraph\n  commit\n  commit').graph?.edges).toEqual([{ from: 'c1', to: 'c2', kind: 'line' }]);
    expect(parseDiagram('classDiagram\n  class Shape').graph?.nodes).toEqual([{ id: 'Shape', label: 'Shape', shape: 'rectangle' }]);
  });

  it('reports an unsupported header as an error entry', () => {
    const outcome = parseDiagram('pie title Pets');

    expect(outcome.graph).toBeUndefined();
    expect(outcome.type).toBe('unknown');
    expect(outcome.errors).toEqual([
      {
        line: 1,
        column: 1,
        severity: 'error',
        code: 'UNSUPPORTED_TYPE',
        message: 'Unsupported diagram header: "pie title Pets"',
        hint: "Start with 'flowchart TD', 'stateDiagram-v2', 'classDiagram' or 'gitGraph'.",
        length: 14,
      },
    ]);
  });

  it('reports empty input', () => {
    expect(parseDiagram('  \n').errors[0]).toMatchObject({
      code: 'UNSUPPORTED_TYPE',
      message: 'Empty input: no diagram header found',
      length: 1,
    });
  });
});

describe('extractDiagramBlocks', () => {
  const markdown = [
    '# Title',
    '',
    '```mermaid',
    'graph TD',
    'A-->B',
    '```',
    '',
    '```js',
    'const x = 1;',
    '```',
    '~~~mmd',
    'stateDiagram',
    '~~~',
  ].join('\n');

  it('finds mermaid and mmd fences with their line numbers', () => {
    expect(extractDiagramBlocks(markdown)).toEqual([
      { content: 'graph TD\nA-->B', startLine: 4, endLine: 6, info: 'mermaid', fence: '```' },
      { content: 'stateDiagram', startLine: 12, endLine: 13, info: 'mmd', fence: '~~~' },
    ]);
  });

  it('runs an unclosed fence to the end of the file', () => {
    expect(extractDiagramBlocks('```mermaid\ngraph TD')).toEqual([
      { content: 'graph TD', startLine: 2, endLine: 3, info: 'mermaid', fence: '```' },
    ]);
  });

  it('shifts line numbers by an offset', () => {
    const errors = [{ line: 2, column: 3, severity: 'error' as const, message: 'bad' }];

    expect(offsetErrors(errors, 3)).toEqual([{ line: 5, column: 3, severity: 'error', message: 'bad' }]);
    expect(offsetErrors(errors, 0)).toBe(errors);
  });
});
