import { createToken, Lexer } from 'chevrotain';

export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z0-9_]+(?:[.-][A-Za-z0-9_]+)*/ });

export const ClassDiagram = createToken({ name: 'ClassDiagram', pattern: /classDiagram(?:-v2)?/, longer_alt: Identifier });
export const ClassKw = createToken({ name: 'ClassKw', pattern: /class/, longer_alt: Identifier });
export const DirectionKw = createToken({ name: 'DirectionKw', pattern: /direction/, longer_alt: Identifier });
export const Direction = createToken({ name: 'Direction', pattern: /LR|RL|TB|BT|TD/, longer_alt: Identifier });

// Notes, styling and interaction lines have no effect on the drawing
export const SkippedLine = createToken({
  name: 'SkippedLine',
  pattern: /(?:note|classDef|cssClass|style|click|link|callback)\b[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// <<interface>>, <<abstract>>
export const Annotation = createToken({ name: 'Annotation', pattern: /<<[^<>\n\r]+>>/ });
// Shape~T~
export const Generic = createToken({ name: 'Generic', pattern: /~[^~\n\r]+~/ });
// The whole member block; the builder splits it into lines
export const Body = createToken({ name: 'Body', pattern: /\{[^}]*\}/, line_breaks: true });

// <|-- *-- o-- --> ..> ..|> -- .. and their mirrored forms
export const Relation = createToken({ name: 'Relation', pattern: /(?:<\||\*|o|<)?(?:--|\.\.)(?:\|>|\*|o|>)?/ });

// Member declarations and relation labels run to the end of the line
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
  SkippedLine,
  ClassDiagram,
  ClassKw,
  DirectionKw,
  Direction,
  Annotation,
  Generic,
  Body,
  // Before Identifier, so "o--" is an aggregation and not a class named "o"
  Relation,
  ColonLabel,
  Semicolon,
  Identifier,
];

export const ClassLexer = new Lexer(allTokens);
export function tokenize(text: string) { return ClassLexer.tokenize(text); }
