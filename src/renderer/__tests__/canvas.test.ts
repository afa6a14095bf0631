import { describe, it, expect } from 'vitest';
import { Canvas, DOWN, LEFT, RIGHT, UP, roleForMask } from '../canvas.js';
import { getCharacterSet } from '../charset.js';

const unicode = getCharacterSet('unicode');

describe('roleForMask', () => {
  it('maps straight runs to the line style', () => {
    expect(roleForMask(UP | DOWN)).toBe('line.vertical');
    expect(roleForMask(LEFT, 'dotted')).toBe('line.dottedHorizontal');
    expect(roleForMask(UP, 'thick')).toBe('line.thickVertical');
  });

  it('maps bends and junctions to solid glyphs', () => {
    expect(roleForMask(DOWN | RIGHT, 'thick')).toBe('corner.downRight');
    expect(roleForMask(UP | LEFT)).toBe('corner.upLeft');
    expect(roleForMask(LEFT | RIGHT | UP)).toBe('junction.teeUp');
    expect(roleForMask(UP | DOWN | LEFT | RIGHT)).toBe('junction.cross');
  });

  it('returns nothing for an empty mask', () => {
    expect(roleForMask(0)).toBeUndefined();
  });
});

describe('Canvas', () => {
  it('ignores writes outside the grid', () => {
    const canvas = new Canvas(2, 1, unicode);
    canvas.put(-1, 0, 'x');
    canvas.put(2, 0, 'x');
    canvas.put(1, 0, 'y');
    expect(canvas.rows()).toEqual([' y']);
  });

  it('gives wide characters a continuation cell', () => {
    const canvas = new Canvas(5, 1, unicode);
    canvas.text(0, 0, '中a');
    expect(canvas.get(0, 0)).toBe('中');
    expect(canvas.get(1, 0)).toBe('');
    expect(canvas.get(2, 0)).toBe('a');
    expect(canvas.toString()).toBe('中a');
  });

  it('keeps text out of reserved cells when asked', () => {
    const canvas = new Canvas(4, 1, unicode);
    canvas.reserve(1, 0, 2, 1);
    canvas.text(0, 0, 'abcd', { skipReserved: true });
    expect(canvas.rows()).toEqual(['a  d']);
  });

  it('merges link masks into corners and junctions', () => {
    const canvas = new Canvas(3, 2, unicode);
    canvas.link(1, 0, LEFT | RIGHT, 'solid');
    canvas.link(1, 0, DOWN, 'solid');
    canvas.link(0, 0, RIGHT, 'solid');
    canvas.link(2, 0, LEFT, 'solid');
    canvas.link(1, 1, UP, 'solid');
    canvas.resolveLinks();
    expect(canvas.rows()).toEqual(['─┬─', ' │ ']);
  });

  it('does not link reserved cells', () => {
    const canvas = new Canvas(1, 1, unicode);
    canvas.reserve(0, 0, 1, 1);
    canvas.link(0, 0, UP | DOWN, 'solid');
    expect(canvas.linkMask(0, 0)).toBe(0);
  });

  it('trims blank borders and common indentation', () => {
    const canvas = new Canvas(6, 4, unicode);
    canvas.text(2, 1, 'ab');
    canvas.text(3, 2, 'c');
    expect(canvas.toString()).toBe('ab\n c');
  });

  it('renders an empty grid as an empty string', () => {
    expect(new Canvas(0, 0, unicode).toString()).toBe('');
  });

  it('wraps painted text in escapes after trimming and removing the indent', () => {
    const canvas = new Canvas(6, 2, unicode);
    canvas.text(2, 0, 'ab', { paint: '31' });
    canvas.text(1, 1, 'x');

    expect(canvas.toString()).toBe(' \x1b[31mab\x1b[0m\nx');
  });
});
