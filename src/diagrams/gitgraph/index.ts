import { parseWithChevrotain, type ParseOutcome } from '../../core/pipeline.js';
import { GitGraphBuilder } from './builder.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';

export function parseGitGraph(text: string): ParseOutcome {
  const builder = new GitGraphBuilder();
  return parseWithChevrotain(text, { tokenize, parse, build: (cst) => builder.build(cst) });
}
