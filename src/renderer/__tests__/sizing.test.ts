import { describe, it, expect } from 'vitest';
import { resolveLayoutConfig } from '../../core/config.js';
import { entryClearance, fromAxes, measureNode, normalizeLayers, toAxes } from '../sizing.js';
import { node } from './fixtures.js';

const config = resolveLayoutConfig();

describe('measureNode', () => {
  it('adds a border and one blank cell each side of the label', () => {
    expect(measureNode(node('s', 'Start'), config)).toEqual({ width: 9, height: 3 });
  });

  it('respects the minimum width', () => {
    expect(measureNode(node('a', 'a'), config)).toEqual({ width: 5, height: 3 });
  });

  it('grows with label lines', () => {
    expect(measureNode(node('m', 'one\nthree'), config)).toEqual({ width: 9, height: 4 });
  });

  it('gives diamonds extra room on both axes', () => {
    expect(measureNode(node('d', 'Ok?', 'diamond'), config)).toEqual({ width: 9, height: 5 });
  });

  it('keeps box diamonds to three rows and inline diamonds to one', () => {
    const diamond = node('d', 'Ok?', 'diamond');

    expect(measureNode(diamond, { ...config, diamondStyle: 'box' })).toEqual({ width: 7, height: 3 });
    expect(measureNode(diamond, { ...config, diamondStyle: 'inline' })).toEqual({ width: 7, height: 1 });
    expect(measureNode(node('q', 'is it\nok?', 'diamond'), { ...config, diamondStyle: 'inline' })).toEqual({ width: 13, height: 1 });
  });

  it('adds a separator row and the member lines of each compartment', () => {
    const shape = { ...node('Shape', 'Shape'), compartments: ['+x: int\n+y: int', '+area() double'] };

    expect(measureNode(shape, config)).toEqual({ width: 18, height: 8 });
  });

  it('measures wide characters by display width', () => {
    expect(measureNode(node('c', '中文'), config)).toEqual({ width: 8, height: 3 });
  });
});

describe('axes', () => {
  it('swaps width and height for horizontal directions', () => {
    expect(toAxes({ width: 9, height: 3 }, 'TD')).toEqual({ cross: 9, flow: 3 });
    expect(toAxes({ width: 9, height: 3 }, 'RL')).toEqual({ cross: 3, flow: 9 });
    expect(fromAxes({ cross: 3, flow: 9 }, 'LR')).toEqual({ width: 9, height: 3 });
  });

  it('only cylinders keep a gap before the arrowhead', () => {
    expect(entryClearance('cylinder')).toBe(1);
    expect(entryClearance('rectangle')).toBe(0);
  });
});

describe('normalizeLayers', () => {
  const sizes = new Map([
    ['a', { width: 9, height: 3 }],
    ['b', { width: 7, height: 5 }],
  ]);

  it('equalizes heights within a layer for vertical flow', () => {
    const axes = normalizeLayers([['a', 'b']], sizes, 'TD');
    expect(axes.get('a')).toEqual({ cross: 9, flow: 5 });
    expect(axes.get('b')).toEqual({ cross: 7, flow: 5 });
  });

  it('equalizes widths within a layer for horizontal flow', () => {
    const axes = normalizeLayers([['a', 'b']], sizes, 'LR');
    expect(axes.get('a')).toEqual({ cross: 3, flow: 9 });
    expect(axes.get('b')).toEqual({ cross: 5, flow: 9 });
  });
});
