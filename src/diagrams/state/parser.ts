import { CstParser, type CstNode, type IRecognitionException, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class StateParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public diagram = this.RULE('diagram', () => {
    this.MANY(() => this.CONSUME(t.Newline));
    this.OR([
      { ALT: () => this.CONSUME(t.StateDiagramV2) },
      { ALT: () => this.CONSUME(t.StateDiagram) },
    ]);
    this.MANY2(() => this.SUBRULE(this.statement));
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.directionStmt) },
      { ALT: () => this.SUBRULE(this.transitionStmt) },
      { ALT: () => this.SUBRULE(this.stateStmt) },
      { ALT: () => this.SUBRULE(this.stateDescriptionStmt) },
      { ALT: () => this.CONSUME(t.Dashes) },
      { ALT: () => this.CONSUME(t.Newline) },
      { ALT: () => this.CONSUME(t.Semicolon) },
    ]);
  });

  private directionStmt = this.RULE('directionStmt', () => {
    this.CONSUME(t.DirectionKw);
    this.CONSUME(t.Direction);
  });

  private stateRef = this.RULE('stateRef', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Start) },
      { ALT: () => this.CONSUME(t.Identifier) },
    ]);
  });

  // A --> B [: label]
  private transitionStmt = this.RULE('transitionStmt', () => {
    this.SUBRULE(this.stateRef, { LABEL: 'from' });
    this.CONSUME(t.Arrow);
    this.SUBRULE2(this.stateRef, { LABEL: 'to' });
    this.OPTION(() => this.CONSUME(t.ColonLabel));
  });

  // state "desc" as s2 | state s2 <<choice>> | state Foo { ... }
  private stateStmt = this.RULE('stateStmt', () => {
    this.CONSUME(t.StateKw);
    this.OR([
      {
        ALT: () => {
          this.CONSUME(t.QuotedString, { LABEL: 'description' });
          this.CONSUME(t.AsKw);
          this.CONSUME(t.Identifier, { LABEL: 'id' });
        }
      },
      { ALT: () => this.CONSUME2(t.Identifier, { LABEL: 'id' }) },
    ]);
    this.OPTION(() => {
      this.CONSUME(t.AngleAngleOpen);
      this.CONSUME3(t.Identifier, { LABEL: 'marker' });
      this.CONSUME(t.AngleAngleClose);
    });
    this.OPTION2(() => this.CONSUME(t.ColonLabel));
    this.OPTION3(() => {
      this.CONSUME(t.LCurly);
      this.MANY(() => this.SUBRULE(this.statement));
      this.CONSUME(t.RCurly);
    });
  });

  // S1 : description
  private stateDescriptionStmt = this.RULE('stateDescriptionStmt', () => {
    this.CONSUME(t.Identifier, { LABEL: 'id' });
    this.OPTION(() => this.CONSUME(t.ColonLabel));
  });
}

export const parserInstance = new StateParser();
export function parse(tokens: IToken[]): { cst: CstNode; errors: IRecognitionException[] } {
  parserInstance.input = tokens;
  const cst = parserInstance.diagram();
  return { cst, errors: parserInstance.errors };
}
