import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class DotParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  // strict? (graph | digraph) ID? { stmt_list }
  public dotGraph = this.RULE('dotGraph', () => {
    this.OPTION(() => this.CONSUME(t.StrictKeyword));
    this.OR([
      { ALT: () => this.CONSUME(t.GraphKeyword) },
      { ALT: () => this.CONSUME(t.DigraphKeyword) },
    ]);
    this.OPTION2(() => this.SUBRULE(this.id));
    this.CONSUME(t.LCurly);
    this.SUBRULE(this.stmtList);
    this.CONSUME(t.RCurly);
  });

  private stmtList = this.RULE('stmtList', () => {
    this.MANY(() => {
      this.SUBRULE(this.statement);
      this.OPTION(() => this.CONSUME(t.Semicolon));
    });
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.attrStatement) },
      { ALT: () => this.SUBRULE(this.subgraphStatement) },
      { ALT: () => this.SUBRULE(this.idStatement) },
    ]);
  });

  // graph [..] | node [..] | edge [..]
  private attrStatement = this.RULE('attrStatement', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.GraphKeyword) },
      { ALT: () => this.CONSUME(t.NodeKeyword) },
      { ALT: () => this.CONSUME(t.EdgeKeyword) },
    ]);
    this.SUBRULE(this.attrList);
  });

  // A subgraph on its own, or as the first operand of an edge chain
  private subgraphStatement = this.RULE('subgraphStatement', () => {
    this.SUBRULE(this.subgraph);
    this.OPTION(() => this.SUBRULE(this.edgeRhs));
    this.OPTION2(() => this.SUBRULE(this.attrList));
  });

  // ID = ID, a node statement, or an edge chain starting at a node
  private idStatement = this.RULE('idStatement', () => {
    this.SUBRULE(this.nodeId);
    this.OR([
      {
        ALT: () => {
          this.CONSUME(t.Equals);
          this.SUBRULE(this.id, { LABEL: 'value' });
        }
      },
      {
        ALT: () => {
          this.OPTION(() => this.SUBRULE(this.edgeRhs));
          this.OPTION2(() => this.SUBRULE(this.attrList));
        }
      },
    ]);
  });

  private edgeRhs = this.RULE('edgeRhs', () => {
    this.AT_LEAST_ONE(() => {
      this.CONSUME(t.EdgeOp);
      this.SUBRULE(this.endpoint);
    });
  });

  private endpoint = this.RULE('endpoint', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.subgraph) },
      { ALT: () => this.SUBRULE(this.nodeId) },
    ]);
  });

  private subgraph = this.RULE('subgraph', () => {
    this.OPTION(() => {
      this.CONSUME(t.SubgraphKeyword);
      this.OPTION2(() => this.SUBRULE(this.id));
    });
    this.CONSUME(t.LCurly);
    this.SUBRULE(this.stmtList);
    this.CONSUME(t.RCurly);
  });

  private nodeId = this.RULE('nodeId', () => {
    this.SUBRULE(this.id);
    this.OPTION(() => this.SUBRULE(this.port));
  });

  // :port or :port:compass
  private port = this.RULE('port', () => {
    this.CONSUME(t.Colon);
    this.SUBRULE(this.id);
    this.OPTION(() => {
      this.CONSUME2(t.Colon);
      this.SUBRULE2(this.id);
    });
  });

  private attrList = this.RULE('attrList', () => {
    this.AT_LEAST_ONE(() => {
      this.CONSUME(t.LSquare);
      this.MANY(() => {
        this.SUBRULE(this.attribute);
        this.OPTION(() => this.OR([
          { ALT: () => this.CONSUME(t.Comma) },
          { ALT: () => this.CONSUME(t.Semicolon) },
        ]));
      });
      this.CONSUME(t.RSquare);
    });
  });

  private attribute = this.RULE('attribute', () => {
    this.SUBRULE(this.id, { LABEL: 'name' });
    this.CONSUME(t.Equals);
    this.SUBRULE2(this.id, { LABEL: 'value' });
  });

  private id = this.RULE('id', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Identifier) },
      { ALT: () => this.CONSUME(t.Numeral) },
      { ALT: () => this.CONSUME(t.HtmlString) },
      {
        ALT: () => {
          // "a" + "b" concatenation
          this.CONSUME(t.QuotedString);
          this.MANY(() => {
            this.CONSUME(t.Plus);
            this.CONSUME2(t.QuotedString);
          });
        }
      },
    ]);
  });
}

export const parserInstance = new DotParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.dotGraph();
  return { cst, errors: parserInstance.errors };
}
