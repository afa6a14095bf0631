import type { CstElement, CstNode, IToken } from 'chevrotain';

export function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

export function tokensOf(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

export function nodesOf(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter((el): el is CstNode => !isToken(el));
}

/** Every token under `node`, in source order. */
export function allTokens(node: CstNode): IToken[] {
  const out: IToken[] = [];
  for (const list of Object.values(node.children)) {
    for (const el of list) {
      if (isToken(el)) out.push(el);
      else out.push(...allTokens(el));
    }
  }
  return out.sort((a, b) => a.startOffset - b.startOffset);
}

function tokenEnd(tok: IToken): number {
  return tok.startOffset + tok.image.length;
}

/** Source text strictly between two tokens. Whitespace is kept, unlike the token stream. */
export function sliceBetween(text: string, open: IToken, close: IToken): string {
  return text.slice(tokenEnd(open), close.startOffset);
}

/** Source text from the first to the last of `tokens`, inclusive. */
export function sliceSpan(text: string, tokens: IToken[]): string {
  if (tokens.length === 0) return '';
  const sorted = [...tokens].sort((a, b) => a.startOffset - b.startOffset);
  return text.slice(sorted[0].startOffset, tokenEnd(sorted[sorted.length - 1]));
}

export function unquote(s: string): string {
  if (s.length >= 2 && ((s.startsWith('"') && s.endsWith('"')) || (s.startsWith("'") && s.endsWith("'")))) {
    return s.slice(1, -1);
  }
  return s;
}

/**
 * Label text as drawn: quotes and markdown backticks removed, `<br>` turned
 * into a line break, each line trimmed.
 */
export function cleanLabel(raw: string): string {
  let s = unquote(raw.trim());
  if (s.length >= 2 && s.startsWith('`') && s.endsWith('`')) s = s.slice(1, -1);
  return s
    .replace(/<br\s*\/?>/gi, '\n')
    .split('\n')
    .map((line) => line.trim().replace(/\s+/g, ' '))
    .join('\n');
}
