import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ValidationError } from './types.js';

function validPos(n: number | null | undefined): n is number {
  return typeof n === 'number' && Number.isFinite(n) && n > 0;
}

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  return {
    line: validPos(line) ? line : fallbackLine,
    column: validPos(column) ? column : fallbackColumn,
  };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const last = lines[lines.length - 1] ?? '';
  return { line: lines.length, column: Math.max(1, last.length + 1) };
}

export function fromLexerError(e: ILexingError): ValidationError {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    message: e.message,
    code: 'LEXER_ERROR',
    length: e.length,
  };
}

function tokenImage(t?: IToken | null) {
  const img = t?.image ?? '';
  return img === '\n' ? '\\n' : img;
}

// Chevrotain reports EOF with NaN positions; point at the end of the text instead.
export function fromParserError(err: IRecognitionException, text: string): ValidationError {
  const tok = err.token;
  const eof = endOfTextPos(text);
  const { line, column } = coercePos(tok?.startLine, tok?.startColumn, eof.line, eof.column);
  const found = tokenImage(tok);
  return {
    line,
    column,
    severity: 'error',
    code: 'PARSER_ERROR',
    message: found ? `Unexpected "${found}": ${err.message}` : err.message,
    length: found.length || 1,
  };
}
