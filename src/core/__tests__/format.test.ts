import { describe, it, expect } from 'vitest';
import { textReport, toJsonResult } from '../format.js';
import type { ValidationError } from '../types.js';

const content = 'flowchart TD\nA[oops) --> B';

const mismatch: ValidationError = {
  line: 2,
  column: 7,
  severity: 'error',
  code: 'FL-SHAPE-MISMATCH',
  message: 'Node shape opened with "[" cannot be closed with ")"',
  length: 1,
};

const cycle: ValidationError = {
  line: 1,
  column: 1,
  severity: 'warning',
  code: 'CYCLE_EXCLUDED',
  message: 'Edge B -> A closes a cycle',
  hint: 'Reverse the edge to draw it downwards.',
  length: 3,
};

describe('textReport', () => {
  it('says Valid when there is nothing to report', () => {
    expect(textReport('a.mmd', content, [])).toBe('Valid');
  });

  it('prints the line, its neighbours and a caret', () => {
    expect(textReport('a.mmd', content, [mismatch])).toBe(
      [
        'error[FL-SHAPE-MISMATCH]: Node shape opened with "[" cannot be closed with ")"',
        'at a.mmd:2:7',
        '  1 | flowchart TD',
        '  2 | A[oops) --> B',
        '    |       ^',
        '',
      ].join('\n'),
    );
  });

  it('lists errors before warnings and prints hints', () => {
    const report = textReport('a.mmd', content, [cycle, mismatch]);
    const lines = report.split('\n');

    expect(lines[0]).toBe('error[FL-SHAPE-MISMATCH]: Node shape opened with "[" cannot be closed with ")"');
    expect(lines.slice(6)).toEqual([
      'warning[CYCLE_EXCLUDED]: Edge B -> A closes a cycle',
      'at a.mmd:1:1',
      '  1 | flowchart TD',
      '    | ^^^',
      '  2 | A[oops) --> B',
      'hint: Reverse the edge to draw it downwards.',
      '',
    ]);
  });

  it('colours the kind and caret on request', () => {
    const report = textReport('a.mmd', content, [mismatch], { color: true });

    expect(report.split('\n')[0]).toBe('\x1b[31merror\x1b[0m[FL-SHAPE-MISMATCH]: Node shape opened with "[" cannot be closed with ")"');
    expect(report.split('\n')[4]).toBe('    |       \x1b[31m^\x1b[0m');
  });
});

describe('toJsonResult', () => {
  it('splits entries by severity', () => {
    expect(toJsonResult('a.mmd', [cycle, mismatch])).toEqual({
      file: 'a.mmd',
      valid: false,
      errorCount: 1,
      warningCount: 1,
      errors: [mismatch],
      warnings: [cycle],
    });
  });
});
