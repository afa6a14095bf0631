import { CstParser, type CstNode, type IRecognitionException, type IToken } from "chevrotain";
import * as tokens from "./lexer.js";

const SHAPE_OPENERS = [
    tokens.SquareOpen,
    tokens.RoundOpen,
    tokens.StadiumOpen,
    tokens.DoubleSquareOpen,
    tokens.DoubleRoundOpen,
    tokens.DiamondOpen,
    tokens.HexagonOpen,
    tokens.CylinderOpen,
    tokens.AngleOpen,
    tokens.SlashOpen,
    tokens.BackslashOpen
];

const SHAPE_CLOSERS = [
    tokens.SquareClose,
    tokens.RoundClose,
    tokens.StadiumClose,
    tokens.DoubleSquareClose,
    tokens.DoubleRoundClose,
    tokens.DiamondClose,
    tokens.HexagonClose,
    tokens.CylinderClose,
    tokens.SlashClose,
    tokens.BackslashClose
];

export class FlowchartParser extends CstParser {
    constructor() {
        super(tokens.allTokens);
        this.performSelfAnalysis();
    }

    // Main rule - a flowchart diagram
    public diagram = this.RULE("diagram", () => {
        this.MANY(() => this.CONSUME(tokens.Newline));
        this.SUBRULE(this.header);
        this.MANY2(() => {
            this.OR([
                { ALT: () => this.SUBRULE(this.statement) },
                { ALT: () => this.CONSUME2(tokens.Newline) },
                { ALT: () => this.CONSUME(tokens.Semicolon) }
            ]);
        });
    });

    private header = this.RULE("header", () => {
        this.OR([
            { ALT: () => this.CONSUME(tokens.FlowchartKeyword) },
            { ALT: () => this.CONSUME(tokens.GraphKeyword) }
        ]);
        this.OPTION(() => this.CONSUME(tokens.DirectionValue));
    });

    private statement = this.RULE("statement", () => {
        this.OR([
            { ALT: () => this.SUBRULE(this.nodeStatement) },
            { ALT: () => this.SUBRULE(this.subgraph) },
            { ALT: () => this.SUBRULE(this.directionStatement) },
            { ALT: () => this.CONSUME(tokens.StyleLine) }
        ]);
    });

    // A --> B & C -- label --> D
    private nodeStatement = this.RULE("nodeStatement", () => {
        this.SUBRULE(this.nodeGroup);
        this.MANY(() => {
            this.SUBRULE(this.link);
            this.SUBRULE2(this.nodeGroup);
        });
    });

    private nodeGroup = this.RULE("nodeGroup", () => {
        this.SUBRULE(this.node);
        this.MANY(() => {
            this.CONSUME(tokens.Ampersand);
            this.SUBRULE2(this.node);
        });
    });

    private node = this.RULE("node", () => {
        this.OR([
            { ALT: () => this.CONSUME(tokens.Identifier, { LABEL: "nodeId" }) },
            { ALT: () => this.CONSUME(tokens.DirectionValue, { LABEL: "nodeId" }) }
        ]);
        this.OPTION(() => this.SUBRULE(this.shape));
        this.OPTION2(() => {
            this.CONSUME(tokens.TripleColon);
            this.CONSUME2(tokens.Identifier, { LABEL: "className" });
        });
    });

    // Open and close are matched up by the builder, which also slices the label text
    private shape = this.RULE("shape", () => {
        this.OR(SHAPE_OPENERS.map((open) => ({ ALT: () => this.CONSUME(open, { LABEL: "open" }) })));
        this.SUBRULE(this.labelText);
        this.OR2(SHAPE_CLOSERS.map((close) => ({ ALT: () => this.CONSUME(close, { LABEL: "close" }) })));
    });

    private labelText = this.RULE("labelText", () => {
        this.MANY(() => this.CONSUME(tokens.LabelPart));
    });

    private link = this.RULE("link", () => {
        this.OR([
            {
                ALT: () => {
                    this.CONSUME(tokens.LinkToken, { LABEL: "linkEnd" });
                    this.OPTION(() => {
                        this.CONSUME(tokens.Pipe, { LABEL: "open" });
                        this.SUBRULE(this.labelText);
                        this.CONSUME2(tokens.Pipe, { LABEL: "close" });
                    });
                }
            },
            {
                ALT: () => {
                    this.CONSUME(tokens.TwoDashes, { LABEL: "open" });
                    this.SUBRULE2(this.labelText);
                    this.OR2([
                        { ALT: () => this.CONSUME(tokens.Arrow, { LABEL: "linkEnd" }) },
                        { ALT: () => this.CONSUME(tokens.Line, { LABEL: "linkEnd" }) },
                        { ALT: () => this.CONSUME(tokens.CircleEnd, { LABEL: "linkEnd" }) },
                        { ALT: () => this.CONSUME(tokens.CrossEnd, { LABEL: "linkEnd" }) }
                    ]);
                }
            },
            {
                ALT: () => {
                    this.CONSUME(tokens.TwoEquals, { LABEL: "open" });
                    this.SUBRULE3(this.labelText);
                    this.OR3([
                        { ALT: () => this.CONSUME(tokens.ThickArrow, { LABEL: "linkEnd" }) },
                        { ALT: () => this.CONSUME(tokens.ThickLine, { LABEL: "linkEnd" }) }
                    ]);
                }
            }
        ]);
    });

    private subgraph = this.RULE("subgraph", () => {
        this.CONSUME(tokens.SubgraphKeyword);
        this.SUBRULE(this.subgraphTitle);
        this.MANY(() => {
            this.OR([
                { ALT: () => this.SUBRULE(this.statement) },
                { ALT: () => this.CONSUME(tokens.Newline) },
                { ALT: () => this.CONSUME(tokens.Semicolon) }
            ]);
        });
        this.CONSUME(tokens.EndKeyword);
    });

    private subgraphTitle = this.RULE("subgraphTitle", () => {
        this.MANY(() => {
            this.OR([
                { GATE: () => this.LA(1).tokenType !== tokens.Semicolon, ALT: () => this.CONSUME(tokens.LabelPart, { LABEL: "part" }) },
                { ALT: () => this.CONSUME(tokens.SquareOpen, { LABEL: "part" }) },
                { ALT: () => this.CONSUME(tokens.SquareClose, { LABEL: "part" }) }
            ]);
        });
    });

    private directionStatement = this.RULE("directionStatement", () => {
        this.CONSUME(tokens.DirectionKeyword);
        this.CONSUME(tokens.DirectionValue);
    });
}

export const parserInstance = new FlowchartParser();

export function parse(input: IToken[]): { cst: CstNode; errors: IRecognitionException[] } {
    parserInstance.input = input;
    const cst = parserInstance.diagram();
    return { cst, errors: parserInstance.errors };
}
