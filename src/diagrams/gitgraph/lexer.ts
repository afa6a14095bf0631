import { createToken, Lexer } from 'chevrotain';

// Branch names such as feature/login or release-1.2
export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z0-9_]+(?:[./-][A-Za-z0-9_]+)*/ });

export const GitGraph = createToken({ name: 'GitGraph', pattern: /gitGraph/, longer_alt: Identifier });
export const HeaderDirection = createToken({ name: 'HeaderDirection', pattern: /(?:LR|RL|TB|BT|TD):/ });

export const Commit = createToken({ name: 'Commit', pattern: /commit/, longer_alt: Identifier });
export const BranchKw = createToken({ name: 'BranchKw', pattern: /branch/, longer_alt: Identifier });
export const Checkout = createToken({ name: 'Checkout', pattern: /checkout|switch/, longer_alt: Identifier });
export const Merge = createToken({ name: 'Merge', pattern: /merge/, longer_alt: Identifier });

// Attribute keys carry their colon, so a branch may still be called "tag" or "id"
export const IdKey = createToken({ name: 'IdKey', pattern: /id:/ });
export const TypeKey = createToken({ name: 'TypeKey', pattern: /type:/ });
export const TagKey = createToken({ name: 'TagKey', pattern: /tag:/ });
export const OrderKey = createToken({ name: 'OrderKey', pattern: /order:/ });
export const CommitType = createToken({ name: 'CommitType', pattern: /NORMAL|REVERSE|HIGHLIGHT/, longer_alt: Identifier });

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
  GitGraph,
  HeaderDirection,
  IdKey,
  TypeKey,
  TagKey,
  OrderKey,
  CommitType,
  Commit,
  BranchKw,
  Checkout,
  Merge,
  Semicolon,
  Identifier,
];

export const GitGraphLexer = new Lexer(allTokens);
export function tokenize(text: string) { return GitGraphLexer.tokenize(text); }
