import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ValidationError } from './types.js';
import type { GraphModel } from '../renderer/types.js';
import { fromLexerError, fromParserError } from './diagnostics.js';

export interface ParseOutcome {
  /** Absent when lexing or parsing failed. */
  graph?: GraphModel;
  errors: ValidationError[];
  warnings: ValidationError[];
}

export interface FrontEndAdapters {
  tokenize: (text: string) => { tokens: IToken[]; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode; errors: IRecognitionException[] };
  build: (cst: CstNode, text: string) => { graph: GraphModel; diagnostics: ValidationError[] };
  postLex?: (text: string, tokens: IToken[]) => ValidationError[];
}

function split(diagnostics: ValidationError[], outcome: ParseOutcome): void {
  for (const d of diagnostics) {
    if (d.severity === 'warning') outcome.warnings.push(d);
    else outcome.errors.push(d);
  }
}

/**
 * Lex, parse and build a graph. Any lexer or parser error stops the pipeline
 * before the builder runs, so a returned graph always comes from a clean CST.
 */
export function parseWithChevrotain(text: string, adapters: FrontEndAdapters): ParseOutcome {
  const outcome: ParseOutcome = { errors: [], warnings: [] };

  const lex = adapters.tokenize(text);
  outcome.errors.push(...lex.errors.map(fromLexerError));

  // Diagram-specific token checks
  if (adapters.postLex) split(adapters.postLex(text, lex.tokens), outcome);

  if (lex.errors.length > 0) return outcome;

  const parsed = adapters.parse(lex.tokens);
  if (parsed.errors.length > 0) {
    outcome.errors.push(...parsed.errors.map((e) => fromParserError(e, text)));
    return outcome;
  }
  if (outcome.errors.length > 0) return outcome;

  const built = adapters.build(parsed.cst, text);
  split(built.diagnostics, outcome);
  if (outcome.errors.length === 0) outcome.graph = built.graph;
  return outcome;
}
