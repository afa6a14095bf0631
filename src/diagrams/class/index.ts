import { parseWithChevrotain, type ParseOutcome } from '../../core/pipeline.js';
import { ClassBuilder } from './builder.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';

export function parseClass(text: string): ParseOutcome {
  const builder = new ClassBuilder();
  return parseWithChevrotain(text, { tokenize, parse, build: (cst) => builder.build(cst) });
}
