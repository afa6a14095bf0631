import { describe, it, expect } from 'vitest';
import { parseClass } from '../class/index.js';
import { renderDiagram } from '../../renderer/index.js';

function graphOf(text: string) {
  const outcome = parseClass(text);
  expect(outcome.errors).toEqual([]);
  if (!outcome.graph) throw new Error('expected a graph');
  return outcome.graph;
}

describe('class diagram front end', () => {
  it('builds boxes with member compartments and relation edges', () => {
    const graph = graphOf([
      'classDiagram',
      '  class Animal {',
      '    +String name',
      '    +eat() void',
      '  }',
      '  class Duck',
      '  Animal <|-- Duck',
      '  Duck : +swim()',
      '  <<interface>> Swimmer',
      '  Swimmer <|.. Duck : realizes',
    ].join('\n'));

    expect(graph).toEqual({
      direction: 'TD',
      nodes: [
        { id: 'Animal', label: 'Animal', shape: 'rectangle', compartments: ['+String name', '+eat() void'] },
        { id: 'Duck', label: 'Duck', shape: 'rectangle', compartments: ['', '+swim()'] },
        { id: 'Swimmer', label: '<<interface>>\nSwimmer', shape: 'rectangle' },
      ],
      edges: [
        { from: 'Animal', to: 'Duck', kind: 'line', markerStart: 'triangle' },
        { from: 'Swimmer', to: 'Duck', kind: 'dotted', label: 'realizes', markerStart: 'triangle', markerEnd: 'none' },
      ],
    });
  });

  it('turns relations around so the decorated end is the source', () => {
    const graph = graphOf([
      'classDiagram',
      '  direction LR',
      '  Order "*" --o "1" Customer : places',
      '  Dog --|> Animal',
      '  Car *-- Wheel',
      '  Client ..> Service',
      '  A <-- B',
    ].join('\n'));

    expect(graph.direction).toBe('LR');
    expect(graph.edges).toEqual([
      { from: 'Customer', to: 'Order', kind: 'line', label: '1 places *', markerStart: 'hollowDiamond' },
      { from: 'Animal', to: 'Dog', kind: 'line', markerStart: 'triangle' },
      { from: 'Car', to: 'Wheel', kind: 'line', markerStart: 'diamond' },
      { from: 'Client', to: 'Service', kind: 'dotted' },
      { from: 'A', to: 'B', kind: 'line', markerStart: 'arrow' },
    ]);
    expect(graph.nodes.map((n) => n.id)).toEqual(['Order', 'Customer', 'Dog', 'Animal', 'Car', 'Wheel', 'Client', 'Service', 'A', 'B']);
  });

  it('shows generics with angle brackets', () => {
    const graph = graphOf('classDiagram\n  class List~T~ {\n    +get(int i) T\n    -List~T~ items\n  }');

    expect(graph.nodes).toEqual([
      { id: 'List', label: 'List<T>', shape: 'rectangle', compartments: ['-List<T> items', '+get(int i) T'] },
    ]);
  });

  it('takes an annotation from the class line or the body', () => {
    const graph = graphOf('classDiagram\n  class Shape <<abstract>>\n  class Pen {\n    <<service>>\n  }');

    expect(graph.nodes.map((n) => n.label)).toEqual(['<<abstract>>\nShape', '<<service>>\nPen']);
    expect(graph.nodes[1]).not.toHaveProperty('compartments');
  });

  it('skips notes, styling, interaction lines and comments', () => {
    const graph = graphOf([
      'classDiagram',
      '  note "a free note"',
      '  %% comment',
      '  class A',
      '  style A fill:#f9f',
      '  cssClass "A" highlight',
      '  click A call showDetails()',
    ].join('\n'));

    expect(graph).toEqual({ direction: 'TD', nodes: [{ id: 'A', label: 'A', shape: 'rectangle' }], edges: [] });
  });

  it('reports a relation without a target as a parser error', () => {
    const outcome = parseClass('classDiagram\n  A --> --> B');

    expect(outcome.graph).toBeUndefined();
    expect(outcome.errors[0]).toMatchObject({ code: 'PARSER_ERROR', severity: 'error', line: 2 });
  });

  it('draws members under the class name', () => {
    const result = renderDiagram('classDiagram\n  class Shape {\n    +x: int\n    +area()\n  }');

    expect(result.errors).toEqual([]);
    expect(result.type).toBe('class');
    expect(result.output).toBe(
      ['┌─────────┐', '│  Shape  │', '├─────────┤', '│ +x: int │', '├─────────┤', '│ +area() │', '└─────────┘'].join('\n'),
    );
  });
});
