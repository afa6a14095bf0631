import { createToken, Lexer } from 'chevrotain';

export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z0-9_]+(?:[.-][A-Za-z0-9_]+)*/ });

export const StateDiagramV2 = createToken({ name: 'StateDiagramV2', pattern: /stateDiagram-v2/ });
export const StateDiagram = createToken({ name: 'StateDiagram', pattern: /stateDiagram/, longer_alt: Identifier });
export const StateKw = createToken({ name: 'StateKw', pattern: /state/, longer_alt: Identifier });
export const AsKw = createToken({ name: 'AsKw', pattern: /as/, longer_alt: Identifier });
export const DirectionKw = createToken({ name: 'DirectionKw', pattern: /direction/, longer_alt: Identifier });
export const Direction = createToken({ name: 'Direction', pattern: /LR|RL|TB|BT|TD/, longer_alt: Identifier });
// Markers like <<choice>>, <<fork>>, <<join>>
export const AngleAngleOpen = createToken({ name: 'AngleAngleOpen', pattern: /<</ });
export const AngleAngleClose = createToken({ name: 'AngleAngleClose', pattern: />>/ });
// Concurrency separator inside composite states
export const Dashes = createToken({ name: 'Dashes', pattern: /--(?!>)-*/ });

// Notes and styling have no effect on the drawing; they are dropped by the lexer
export const NoteBlock = createToken({
  name: 'NoteBlock',
  pattern: /note\s+(?:left|right)\s+of\s+[^\n\r:]+[\n\r][\s\S]*?end note/,
  line_breaks: true,
  group: Lexer.SKIPPED,
});
export const NoteLine = createToken({ name: 'NoteLine', pattern: /note\b[^\n\r]*/, group: Lexer.SKIPPED });
export const StyleLine = createToken({
  name: 'StyleLine',
  pattern: /(?:classDef|class|style)[ \t][^\n\r]*/,
  group: Lexer.SKIPPED,
});

export const Start = createToken({ name: 'Start', pattern: /\[\*\]/ });
export const Arrow = createToken({ name: 'Arrow', pattern: /-->/ });

export const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
export const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
// The colon takes the rest of the line with it: transition labels and descriptions are free text
export const ColonLabel = createToken({ name: 'ColonLabel', pattern: /:[^\n\r]*/ });

export const QuotedString = createToken({ name: 'QuotedString', pattern: /"[^"\n\r]*"/ });
export const Comment = createToken({ name: 'Comment', pattern: /%%[^\n\r]*/, group: Lexer.SKIPPED });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Newline = createToken({ name: 'Newline', pattern: /[\n\r]+/, line_breaks: true });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });

export const allTokens = [
  Comment,
  WhiteSpace,
  Newline,
  QuotedString,
  NoteBlock,
  NoteLine,
  StyleLine,
  StateDiagramV2,
  StateDiagram,
  StateKw,
  AsKw,
  DirectionKw,
  Direction,
  AngleAngleOpen, AngleAngleClose,
  Start,
  Arrow,
  Dashes,
  LCurly, RCurly,
  ColonLabel,
  Semicolon,
  Identifier,
];

export const StateLexer = new Lexer(allTokens);
export function tokenize(text: string) { return StateLexer.tokenize(text); }
