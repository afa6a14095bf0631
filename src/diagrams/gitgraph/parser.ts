import { CstParser, type CstNode, type IRecognitionException, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class GitGraphParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public diagram = this.RULE('diagram', () => {
    this.MANY(() => this.CONSUME(t.Newline));
    this.CONSUME(t.GitGraph);
    this.OPTION(() => this.CONSUME(t.HeaderDirection));
    this.MANY2(() => this.SUBRULE(this.statement));
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.commitStmt) },
      { ALT: () => this.SUBRULE(this.branchStmt) },
      { ALT: () => this.SUBRULE(this.checkoutStmt) },
      { ALT: () => this.SUBRULE(this.mergeStmt) },
      { ALT: () => this.CONSUME(t.Newline) },
      { ALT: () => this.CONSUME(t.Semicolon) },
    ]);
  });

  // id: "x" | type: HIGHLIGHT | tag: "v1"
  private commitAttr = this.RULE('commitAttr', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(t.IdKey);
          this.CONSUME(t.QuotedString, { LABEL: 'id' });
        }
      },
      {
        ALT: () => {
          this.CONSUME(t.TypeKey);
          this.CONSUME(t.CommitType);
        }
      },
      {
        ALT: () => {
          this.CONSUME(t.TagKey);
          this.CONSUME2(t.QuotedString, { LABEL: 'tag' });
        }
      },
    ]);
  });

  private branchName = this.RULE('branchName', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Identifier) },
      { ALT: () => this.CONSUME(t.QuotedString) },
    ]);
  });

  private commitStmt = this.RULE('commitStmt', () => {
    this.CONSUME(t.Commit);
    this.MANY(() => this.SUBRULE(this.commitAttr));
  });

  // branch develop [order: 2]
  private branchStmt = this.RULE('branchStmt', () => {
    this.CONSUME(t.BranchKw);
    this.SUBRULE(this.branchName);
    this.OPTION(() => {
      this.CONSUME(t.OrderKey);
      this.CONSUME(t.Identifier, { LABEL: 'order' });
    });
  });

  private checkoutStmt = this.RULE('checkoutStmt', () => {
    this.CONSUME(t.Checkout);
    this.SUBRULE(this.branchName);
  });

  private mergeStmt = this.RULE('mergeStmt', () => {
    this.CONSUME(t.Merge);
    this.SUBRULE(this.branchName);
    this.MANY(() => this.SUBRULE(this.commitAttr));
  });
}

export const parserInstance = new GitGraphParser();
export function parse(tokens: IToken[]): { cst: CstNode; errors: IRecognitionException[] } {
  parserInstance.input = tokens;
  const cst = parserInstance.diagram();
  return { cst, errors: parserInstance.errors };
}
