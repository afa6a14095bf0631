import { CstParser, type CstNode, type IRecognitionException, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class ClassParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public diagram = this.RULE('diagram', () => {
    this.MANY(() => this.CONSUME(t.Newline));
    this.CONSUME(t.ClassDiagram);
    this.MANY2(() => this.SUBRULE(this.statement));
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.classStmt) },
      { ALT: () => this.SUBRULE(this.annotationStmt) },
      { ALT: () => this.SUBRULE(this.directionStmt) },
      { ALT: () => this.SUBRULE(this.classRefStmt) },
      { ALT: () => this.CONSUME(t.Newline) },
      { ALT: () => this.CONSUME(t.Semicolon) },
    ]);
  });

  // class Shape~T~ <<interface>> { ... }
  private classStmt = this.RULE('classStmt', () => {
    this.CONSUME(t.ClassKw);
    this.CONSUME(t.Identifier, { LABEL: 'name' });
    this.OPTION(() => this.CONSUME(t.Generic));
    this.OPTION2(() => this.CONSUME(t.Annotation));
    this.OPTION3(() => this.CONSUME(t.Body));
  });

  // <<interface>> Shape
  private annotationStmt = this.RULE('annotationStmt', () => {
    this.CONSUME(t.Annotation);
    this.CONSUME(t.Identifier, { LABEL: 'name' });
  });

  private directionStmt = this.RULE('directionStmt', () => {
    this.CONSUME(t.DirectionKw);
    this.CONSUME(t.Direction);
  });

  // Shape : +area() double | Shape "1" <|-- "*" Circle : label | Shape
  private classRefStmt = this.RULE('classRefStmt', () => {
    this.CONSUME(t.Identifier, { LABEL: 'from' });
    this.OPTION(() => this.CONSUME(t.Generic, { LABEL: 'fromGeneric' }));
    this.OPTION2(() => {
      this.OR([
        { ALT: () => this.CONSUME(t.ColonLabel, { LABEL: 'member' }) },
        { ALT: () => this.SUBRULE(this.relationTail) },
      ]);
    });
  });

  private relationTail = this.RULE('relationTail', () => {
    this.OPTION(() => this.CONSUME(t.QuotedString, { LABEL: 'fromCard' }));
    this.CONSUME(t.Relation);
    this.OPTION2(() => this.CONSUME2(t.QuotedString, { LABEL: 'toCard' }));
    this.CONSUME(t.Identifier, { LABEL: 'to' });
    this.OPTION3(() => this.CONSUME(t.Generic, { LABEL: 'toGeneric' }));
    this.OPTION4(() => this.CONSUME(t.ColonLabel, { LABEL: 'label' }));
  });
}

export const parserInstance = new ClassParser();
export function parse(tokens: IToken[]): { cst: CstNode; errors: IRecognitionException[] } {
  parserInstance.input = tokens;
  const cst = parserInstance.diagram();
  return { cst, errors: parserInstance.errors };
}
