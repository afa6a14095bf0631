import { describe, it, expect } from 'vitest';
import { charWidth, displayWidth, labelLines, labelWidth } from '../text.js';

describe('display width', () => {
  it('counts ASCII as one cell per character', () => {
    expect(displayWidth('Start')).toBe(5);
  });

  it('counts CJK ideographs as two cells', () => {
    expect(charWidth('中')).toBe(2);
    expect(displayWidth('中文')).toBe(4);
  });

  it('ignores combining marks and zero-width joiners', () => {
    expect(displayWidth('e\u0301')).toBe(1);
    expect(charWidth('\u200d')).toBe(0);
  });
});

describe('labels', () => {
  it('splits on explicit breaks only', () => {
    expect(labelLines('one\r\ntwo\rthree\nfour')).toEqual(['one', 'two', 'three', 'four']);
  });

  it('measures the widest line', () => {
    expect(labelWidth('ab\nabcd\nabc')).toBe(4);
    expect(labelWidth('')).toBe(0);
  });
});
