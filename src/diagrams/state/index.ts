import { parseWithChevrotain, type ParseOutcome } from '../../core/pipeline.js';
import { StateBuilder } from './builder.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';

export function parseState(text: string): ParseOutcome {
  const builder = new StateBuilder();
  return parseWithChevrotain(text, { tokenize, parse, build: (cst) => builder.build(cst) });
}
